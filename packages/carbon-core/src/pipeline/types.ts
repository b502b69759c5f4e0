import type { StorageMedia } from "../config/coefficients.js";
import type { EnergyRecord, PowerRecord } from "../energy/PowerEnergyConverter.js";

export interface UsageSample {
    /** ISO-8601 start of the observation */
    timestamp: string;
    resourceId: string;
    instanceClass: string;
    region: string;
    /** 0..100, clamped before use */
    cpuUtilizationPct: number;
    memoryRequestedGb: number;
    storageRequestedGb: number;
    vcpusAllocated: number;
    durationS: number;
    /** app / namespace / partition the resource rolls up to */
    groupingKey: string;
    storageMedia?: StorageMedia;
}

export const PIPELINE_VARIANTS = ["infrastructure", "application"] as const;
export type PipelineVariant = typeof PIPELINE_VARIANTS[number];

export function isPipelineVariant(value: unknown): value is PipelineVariant {
    return PIPELINE_VARIANTS.some((variant) => variant === value);
}

export interface CarbonRecord {
    readonly operationalG: number;
    readonly embodiedCpuG: number;
    readonly embodiedStorageG: number;
    readonly embodiedTotalG: number;
    /** operational + embodied */
    readonly totalG: number;
}

export interface ProcessedSample {
    readonly sample: Readonly<UsageSample>;
    readonly variant: PipelineVariant;
    readonly timestampMs: number;
    readonly power: PowerRecord;
    readonly energy: EnergyRecord;
    readonly carbon: CarbonRecord;
    readonly gridIntensity: number;
    readonly gridIntensityFallback: boolean;
    /** vCPUs and memory the figures were computed for */
    readonly vcpusAllocated: number;
    readonly memoryGb: number;
}
