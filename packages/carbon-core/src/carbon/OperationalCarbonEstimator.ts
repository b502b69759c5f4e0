import type { CoefficientSet } from "../config/coefficients.js";
import { UnknownGridIntensity } from "../errors/errors.js";

export interface OperationalEstimate {
    readonly operationalG: number;
    readonly gridIntensity: number;
    /** true when the region was missing and the configured default was used */
    readonly fallback: boolean;
}

export class OperationalCarbonEstimator {
    private readonly table: Readonly<Record<string, number>>;
    private readonly defaultIntensity?: number;

    constructor(coeffs: Pick<CoefficientSet, "gridIntensity" | "defaultGridIntensity">) {
        this.table = coeffs.gridIntensity;
        this.defaultIntensity = coeffs.defaultGridIntensity;
    }

    gridIntensity(region: string): { value: number; fallback: boolean } {
        const key = region.trim().toLowerCase();
        if (Object.hasOwn(this.table, key)) {
            return { value: this.table[key], fallback: false };
        }
        if (this.defaultIntensity !== undefined) {
            return { value: this.defaultIntensity, fallback: true };
        }
        throw new UnknownGridIntensity(region);
    }

    estimate(energyAdjustedKwh: number, region: string): OperationalEstimate {
        const { value, fallback } = this.gridIntensity(region);
        return Object.freeze({
            operationalG: energyAdjustedKwh * value,
            gridIntensity: value,
            fallback,
        });
    }
}
