import type { CoefficientSet, StorageMedia } from "../config/coefficients.js";
import { ConfigurationError } from "../errors/errors.js";

export interface EmbodiedInput {
    vcpusAllocated: number;
    vcpusTotal: number;
    storageGb: number;
    storageMedia?: StorageMedia;
    durationS: number;
}

export interface EmbodiedEstimate {
    readonly embodiedCpuG: number;
    readonly embodiedStorageG: number;
    readonly embodiedTotalG: number;
}

/**
 * Manufacturing emissions prorated by the share of the host in use and the
 * share of the device lifetime the sample covers.
 */
export function estimateEmbodied(input: EmbodiedInput, coeffs: CoefficientSet): EmbodiedEstimate {
    if (!(input.vcpusTotal > 0)) {
        throw new ConfigurationError("vcpusTotal must be > 0 to prorate embodied emissions", {
            vcpusTotal: input.vcpusTotal,
        });
    }
    const hours = input.durationS / 3600;
    const { embodiedG, lifespanHours } = coeffs.device;
    const storage = coeffs.storage[input.storageMedia ?? "unknown"];

    const embodiedCpuG = embodiedG * (input.vcpusAllocated / input.vcpusTotal) * (hours / lifespanHours);
    const embodiedStorageG = input.storageGb * storage.embodiedGPerGb * (hours / coeffs.storageLifespanHours);

    return Object.freeze({
        embodiedCpuG,
        embodiedStorageG,
        embodiedTotalG: embodiedCpuG + embodiedStorageG,
    });
}
