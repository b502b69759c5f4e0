import { ConfigurationError } from "../errors/errors.js";
import { DEFAULT_UTILIZATION_CURVE, UtilizationCurve, type CurvePoint } from "../curve/UtilizationCurve.js";

export type StorageMedia = "ssd" | "hdd";
export type StorageMediaKey = StorageMedia | "unknown";

export const STORAGE_MEDIA_KEYS: readonly StorageMediaKey[] = ["ssd", "hdd", "unknown"];

export interface StorageCoefficients {
    powerWPerGb: number;
    embodiedGPerGb: number;
}

export interface DeviceCoefficients {
    embodiedG: number;
    lifespanHours: number;
}

export interface CoefficientSet {
    readonly curve: UtilizationCurve;
    readonly memoryCoefficientWPerGb: number;
    readonly storage: Readonly<Record<StorageMediaKey, Readonly<StorageCoefficients>>>;
    readonly storageLifespanHours: number;
    readonly device: Readonly<DeviceCoefficients>;
    readonly pue: number;
    /** region (lower case) -> gCO2e/kWh */
    readonly gridIntensity: Readonly<Record<string, number>>;
    readonly defaultGridIntensity?: number;
}

export interface CoefficientOverrides {
    curve?: readonly CurvePoint[];
    memoryCoefficientWPerGb?: number;
    storage?: Partial<Record<StorageMediaKey, Partial<StorageCoefficients>>>;
    storageLifespanHours?: number;
    device?: Partial<DeviceCoefficients>;
    pue?: number;
    gridIntensity?: Record<string, number>;
    /** null disables the fallback: unknown regions then fail per sample */
    defaultGridIntensity?: number | null;
}

const FOUR_YEARS_HOURS = 35_064;

// 2024 yearly averages, gCO2e/kWh
export const DEFAULT_GRID_INTENSITY: Readonly<Record<string, number>> = Object.freeze({
    australiaeast: 552,
    centralus: 384,
    eastasia: 560,
    eastus: 384,
    eastus2: 384,
    francecentral: 44,
    francesouth: 44,
    germanywestcentral: 344,
    northcentralus: 384,
    northeurope: 280,
    southeastasia: 499,
    swedencentral: 36,
    uaenorth: 493,
    uksouth: 211,
    westeurope: 253,
    westus: 384,
    westus2: 384,
    centralindia: 708,
});

// European average
export const EUROPEAN_AVERAGE_GRID_INTENSITY = 281;

export const DEFAULT_COEFFICIENTS = {
    memoryCoefficientWPerGb: 0.392,
    storage: {
        ssd: { powerWPerGb: 0.0012, embodiedGPerGb: 160 },
        hdd: { powerWPerGb: 0.00065, embodiedGPerGb: 20 },
        unknown: { powerWPerGb: 0.000925, embodiedGPerGb: 90 },
    },
    storageLifespanHours: FOUR_YEARS_HOURS,
    device: { embodiedG: 1_672_000, lifespanHours: FOUR_YEARS_HOURS },
    pue: 1.185,
    defaultGridIntensity: EUROPEAN_AVERAGE_GRID_INTENSITY,
} as const;

function requireNonNegative(name: string, value: number): number {
    if (!Number.isFinite(value) || value < 0) {
        throw new ConfigurationError(`${name} must be a finite number >= 0`, { [name]: value });
    }
    return value;
}

function requirePositive(name: string, value: number): number {
    if (!Number.isFinite(value) || value <= 0) {
        throw new ConfigurationError(`${name} must be a finite number > 0`, { [name]: value });
    }
    return value;
}

/**
 * Merges overrides onto the defaults and validates every coefficient the
 * pipeline divides by or multiplies with. The result is deeply frozen.
 */
export function createCoefficientSet(overrides: CoefficientOverrides = {}): CoefficientSet {
    const curve = new UtilizationCurve(overrides.curve ?? DEFAULT_UTILIZATION_CURVE);

    const storageFor = (media: StorageMediaKey): Readonly<StorageCoefficients> => {
        const defaults = DEFAULT_COEFFICIENTS.storage[media];
        const override = overrides.storage?.[media];
        return Object.freeze({
            powerWPerGb: requireNonNegative(`storage.${media}.powerWPerGb`, override?.powerWPerGb ?? defaults.powerWPerGb),
            embodiedGPerGb: requireNonNegative(`storage.${media}.embodiedGPerGb`, override?.embodiedGPerGb ?? defaults.embodiedGPerGb),
        });
    };
    const storage = Object.freeze({ ssd: storageFor("ssd"), hdd: storageFor("hdd"), unknown: storageFor("unknown") });

    const device = {
        embodiedG: overrides.device?.embodiedG ?? DEFAULT_COEFFICIENTS.device.embodiedG,
        lifespanHours: overrides.device?.lifespanHours ?? DEFAULT_COEFFICIENTS.device.lifespanHours,
    };

    const gridIntensity: Record<string, number> = {};
    for (const [region, value] of Object.entries(overrides.gridIntensity ?? DEFAULT_GRID_INTENSITY)) {
        gridIntensity[region.toLowerCase()] = requireNonNegative(`gridIntensity.${region}`, value);
    }

    const fallback = overrides.defaultGridIntensity === undefined
        ? DEFAULT_COEFFICIENTS.defaultGridIntensity
        : overrides.defaultGridIntensity;

    const pue = requirePositive("pue", overrides.pue ?? DEFAULT_COEFFICIENTS.pue);
    if (pue < 1) {
        throw new ConfigurationError("pue must be >= 1", { pue });
    }

    return Object.freeze({
        curve,
        memoryCoefficientWPerGb: requireNonNegative(
            "memoryCoefficientWPerGb",
            overrides.memoryCoefficientWPerGb ?? DEFAULT_COEFFICIENTS.memoryCoefficientWPerGb,
        ),
        storage,
        storageLifespanHours: requirePositive(
            "storageLifespanHours",
            overrides.storageLifespanHours ?? DEFAULT_COEFFICIENTS.storageLifespanHours,
        ),
        device: Object.freeze({
            embodiedG: requireNonNegative("device.embodiedG", device.embodiedG),
            lifespanHours: requirePositive("device.lifespanHours", device.lifespanHours),
        }),
        pue,
        gridIntensity: Object.freeze(gridIntensity),
        defaultGridIntensity: fallback === null ? undefined : requireNonNegative("defaultGridIntensity", fallback),
    });
}
