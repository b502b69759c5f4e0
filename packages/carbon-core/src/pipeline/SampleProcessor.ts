import type { Logger } from "@carbonmeter/shared";
import type { CoefficientSet } from "../config/coefficients.js";
import { estimateEmbodied } from "../carbon/EmbodiedCarbonEstimator.js";
import { OperationalCarbonEstimator } from "../carbon/OperationalCarbonEstimator.js";
import { computeEnergy } from "../energy/PowerEnergyConverter.js";
import { ConfigurationError, InvalidSample, isRecoverable, type CarbonErrorCode } from "../errors/errors.js";
import type { HardwareProfile, HardwareProfileResolver } from "../hardware/HardwareProfileResolver.js";
import {
    isPipelineVariant,
    PIPELINE_VARIANTS,
    type CarbonRecord,
    type PipelineVariant,
    type ProcessedSample,
    type UsageSample,
} from "./types.js";

export interface CarbonPipeline {
    readonly variant: PipelineVariant;
    readonly coefficients: CoefficientSet;
    readonly profiles: HardwareProfileResolver;
    readonly operational: OperationalCarbonEstimator;
}

/**
 * Checked once per run: the variant must be one of PIPELINE_VARIANTS. The
 * coefficient set and profile table are validated when they are built.
 */
export function createPipeline(
    coefficients: CoefficientSet,
    profiles: HardwareProfileResolver,
    variant: PipelineVariant,
): CarbonPipeline {
    if (!isPipelineVariant(variant)) {
        throw new ConfigurationError(`unknown pipeline variant '${String(variant)}', expected ${PIPELINE_VARIANTS.join(" | ")}`);
    }
    return Object.freeze({
        variant,
        coefficients,
        profiles,
        operational: new OperationalCarbonEstimator(coefficients),
    });
}

function nonNegative(name: keyof UsageSample, value: number): void {
    if (!Number.isFinite(value) || value < 0) {
        throw new InvalidSample(`${name} must be a finite number >= 0`, { [name]: value });
    }
}

/**
 * Checks a sample and returns its timestamp in epoch ms.
 */
export function validateSample(sample: UsageSample): number {
    if (!sample.resourceId) {
        throw new InvalidSample("resourceId is required");
    }
    if (!Number.isFinite(sample.durationS) || sample.durationS <= 0) {
        throw new InvalidSample("durationS must be > 0", { resourceId: sample.resourceId, durationS: sample.durationS });
    }
    nonNegative("cpuUtilizationPct", sample.cpuUtilizationPct);
    nonNegative("memoryRequestedGb", sample.memoryRequestedGb);
    nonNegative("storageRequestedGb", sample.storageRequestedGb);
    nonNegative("vcpusAllocated", sample.vcpusAllocated);

    const timestampMs = Date.parse(sample.timestamp);
    if (Number.isNaN(timestampMs)) {
        throw new InvalidSample(`unparseable timestamp '${sample.timestamp}'`, { resourceId: sample.resourceId });
    }
    return timestampMs;
}

interface VariantShape {
    cpuShare: number;
    vcpusAllocated: number;
    memoryGb: number;
    storageGb: number;
}

// whole VM vs reserved cores
function shapeFor(variant: PipelineVariant, sample: UsageSample, profile: HardwareProfile): VariantShape {
    if (variant === "infrastructure") {
        return {
            cpuShare: 1,
            vcpusAllocated: profile.vcpusAllocated ?? profile.vcpusTotal,
            memoryGb: profile.memoryGb,
            storageGb: sample.storageRequestedGb,
        };
    }
    if (sample.vcpusAllocated > profile.vcpusTotal) {
        throw new InvalidSample(`vcpusAllocated exceeds the ${profile.vcpusTotal} vCPUs of ${profile.instanceClass}`, {
            resourceId: sample.resourceId,
            vcpusAllocated: sample.vcpusAllocated,
        });
    }
    return {
        cpuShare: sample.vcpusAllocated / profile.vcpusTotal,
        vcpusAllocated: sample.vcpusAllocated,
        memoryGb: sample.memoryRequestedGb,
        storageGb: 0,
    };
}

/**
 * One sample in, one energy + carbon record out. Pure: the same sample and
 * pipeline always give the same result.
 */
export function processSample(sample: UsageSample, pipeline: CarbonPipeline): ProcessedSample {
    const timestampMs = validateSample(sample);
    const profile = pipeline.profiles.resolve(sample.instanceClass);
    const coeffs = pipeline.coefficients;

    const cpuUtilizationPct = Math.min(sample.cpuUtilizationPct, 100);
    const shape = shapeFor(pipeline.variant, sample, profile);

    const { power, energy } = computeEnergy({
        cpuUtilizationPct,
        tdpWatts: profile.tdpWatts,
        cpuShare: shape.cpuShare,
        memoryGb: shape.memoryGb,
        storageGb: shape.storageGb,
        storageMedia: sample.storageMedia,
        durationS: sample.durationS,
    }, coeffs);

    const operational = pipeline.operational.estimate(energy.energyAdjustedKwh, sample.region);
    const embodied = estimateEmbodied({
        vcpusAllocated: shape.vcpusAllocated,
        vcpusTotal: profile.vcpusTotal,
        storageGb: shape.storageGb,
        storageMedia: sample.storageMedia,
        durationS: sample.durationS,
    }, coeffs);

    const carbon: CarbonRecord = Object.freeze({
        operationalG: operational.operationalG,
        embodiedCpuG: embodied.embodiedCpuG,
        embodiedStorageG: embodied.embodiedStorageG,
        embodiedTotalG: embodied.embodiedTotalG,
        totalG: operational.operationalG + embodied.embodiedTotalG,
    });

    return Object.freeze({
        sample: Object.freeze({ ...sample, cpuUtilizationPct }),
        variant: pipeline.variant,
        timestampMs,
        power,
        energy,
        carbon,
        gridIntensity: operational.gridIntensity,
        gridIntensityFallback: operational.fallback,
        vcpusAllocated: shape.vcpusAllocated,
        memoryGb: shape.memoryGb,
    });
}

export class RunStats {
    processed = 0;
    skipped = 0;
    readonly skippedByCode = new Map<CarbonErrorCode, number>();
    readonly unknownInstanceClasses = new Map<string, number>();
    /** regions that used the default grid intensity, with their sample count */
    readonly gridFallbackRegions = new Map<string, number>();

    recordProcessed(processed: ProcessedSample): void {
        this.processed++;
        if (processed.gridIntensityFallback) {
            increment(this.gridFallbackRegions, processed.sample.region);
        }
    }

    recordSkipped(code: CarbonErrorCode, sample: UsageSample): void {
        this.skipped++;
        increment(this.skippedByCode, code);
        if (code === "PROFILE_NOT_FOUND") {
            increment(this.unknownInstanceClasses, sample.instanceClass);
        }
    }

    merge(other: RunStats): void {
        this.processed += other.processed;
        this.skipped += other.skipped;
        for (const [code, n] of other.skippedByCode) increment(this.skippedByCode, code, n);
        for (const [k, n] of other.unknownInstanceClasses) increment(this.unknownInstanceClasses, k, n);
        for (const [k, n] of other.gridFallbackRegions) increment(this.gridFallbackRegions, k, n);
    }

    toJSON() {
        return {
            processed: this.processed,
            skipped: this.skipped,
            skippedByCode: Object.fromEntries(this.skippedByCode),
            unknownInstanceClasses: Object.fromEntries(this.unknownInstanceClasses),
            gridFallbackRegions: Object.fromEntries(this.gridFallbackRegions),
        };
    }
}

function increment<K>(map: Map<K, number>, key: K, by = 1): void {
    map.set(key, (map.get(key) ?? 0) + by);
}

/**
 * Streams samples through the pipeline. Recoverable per-sample failures are
 * counted in `stats` and logged at debug level; anything else is rethrown.
 */
export function* processSamples(
    samples: Iterable<UsageSample>,
    pipeline: CarbonPipeline,
    stats: RunStats = new RunStats(),
    logger?: Logger,
): Generator<ProcessedSample, RunStats> {
    for (const sample of samples) {
        let processed: ProcessedSample;
        try {
            processed = processSample(sample, pipeline);
        } catch (error) {
            if (!isRecoverable(error)) throw error;
            stats.recordSkipped(error.code, sample);
            logger?.debug({ resourceId: sample.resourceId, code: error.code }, error.message);
            continue;
        }
        stats.recordProcessed(processed);
        yield processed;
    }
    return stats;
}
