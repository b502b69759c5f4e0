import type { CoefficientSet, StorageMedia } from "../config/coefficients.js";

const SECONDS_PER_HOUR = 3600;
const WATTS_PER_KW = 1000;

export interface PowerRecord {
    readonly cpuPowerKw: number;
    readonly memoryPowerKw: number;
    readonly storagePowerKw: number;
}

export interface EnergyRecord {
    readonly cpuEnergyKwh: number;
    readonly memoryEnergyKwh: number;
    readonly storageEnergyKwh: number;
    readonly totalEnergyKwh: number;
    /** totalEnergyKwh x PUE */
    readonly energyAdjustedKwh: number;
}

export interface EnergyInput {
    cpuUtilizationPct: number;
    tdpWatts: number;
    /**
     * Share of the TDP attributed to the workload: 1 for a whole VM,
     * vcpusAllocated / vcpusTotal for reserved cores.
     */
    cpuShare: number;
    memoryGb: number;
    storageGb: number;
    storageMedia?: StorageMedia;
    durationS: number;
}

export interface PowerEnergy {
    readonly power: PowerRecord;
    readonly energy: EnergyRecord;
}

export function computePower(input: EnergyInput, coeffs: CoefficientSet): PowerRecord {
    const ratio = coeffs.curve.interpolate(input.cpuUtilizationPct);
    const storage = coeffs.storage[input.storageMedia ?? "unknown"];
    return Object.freeze({
        cpuPowerKw: ratio * input.tdpWatts / WATTS_PER_KW * input.cpuShare,
        memoryPowerKw: input.memoryGb * coeffs.memoryCoefficientWPerGb / WATTS_PER_KW,
        storagePowerKw: input.storageGb * storage.powerWPerGb / WATTS_PER_KW,
    });
}

export function computeEnergy(input: EnergyInput, coeffs: CoefficientSet): PowerEnergy {
    const power = computePower(input, coeffs);
    const hours = input.durationS / SECONDS_PER_HOUR;

    const cpuEnergyKwh = power.cpuPowerKw * hours;
    const memoryEnergyKwh = power.memoryPowerKw * hours;
    const storageEnergyKwh = power.storagePowerKw * hours;
    const totalEnergyKwh = cpuEnergyKwh + memoryEnergyKwh + storageEnergyKwh;

    return Object.freeze({
        power,
        energy: Object.freeze({
            cpuEnergyKwh,
            memoryEnergyKwh,
            storageEnergyKwh,
            totalEnergyKwh,
            energyAdjustedKwh: totalEnergyKwh * coeffs.pue,
        }),
    });
}
