import type { ProcessedSample } from "../pipeline/types.js";

export const METRIC_NAMES = [
    "energyKwh",
    "cpuEnergyKwh",
    "memoryEnergyKwh",
    "storageEnergyKwh",
    "operationalG",
    "embodiedCpuG",
    "embodiedStorageG",
    "embodiedG",
    "totalG",
    "cpuPowerKw",
    "memoryPowerKw",
    "requestedCpu",
    "requestedMemoryGb",
    "cpuUtilizationPct",
] as const;

export type MetricName = typeof METRIC_NAMES[number];

// summed on both axes; utilization is averaged instead
export type ExtensiveMetric = Exclude<MetricName, "cpuUtilizationPct">;

export type MetricValues = Record<MetricName, number>;
export type ExtensiveValues = Record<ExtensiveMetric, number>;

export function zeroExtensive(): ExtensiveValues {
    return {
        energyKwh: 0,
        cpuEnergyKwh: 0,
        memoryEnergyKwh: 0,
        storageEnergyKwh: 0,
        operationalG: 0,
        embodiedCpuG: 0,
        embodiedStorageG: 0,
        embodiedG: 0,
        totalG: 0,
        cpuPowerKw: 0,
        memoryPowerKw: 0,
        requestedCpu: 0,
        requestedMemoryGb: 0,
    };
}

export function zeroMetrics(): MetricValues {
    return { ...zeroExtensive(), cpuUtilizationPct: 0 };
}

/** energyKwh is the PUE-adjusted figure */
export function contributionOf(processed: ProcessedSample): ExtensiveValues {
    const { energy, carbon, power } = processed;
    return {
        energyKwh: energy.energyAdjustedKwh,
        cpuEnergyKwh: energy.cpuEnergyKwh,
        memoryEnergyKwh: energy.memoryEnergyKwh,
        storageEnergyKwh: energy.storageEnergyKwh,
        operationalG: carbon.operationalG,
        embodiedCpuG: carbon.embodiedCpuG,
        embodiedStorageG: carbon.embodiedStorageG,
        embodiedG: carbon.embodiedTotalG,
        totalG: carbon.totalG,
        cpuPowerKw: power.cpuPowerKw,
        memoryPowerKw: power.memoryPowerKw,
        requestedCpu: processed.vcpusAllocated,
        requestedMemoryGb: processed.memoryGb,
    };
}

export const EXTENSIVE_METRICS: readonly ExtensiveMetric[] = METRIC_NAMES.filter(
    (name): name is ExtensiveMetric => name !== "cpuUtilizationPct",
);
