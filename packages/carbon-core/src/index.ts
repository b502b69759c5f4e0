export * from "./errors/errors.js";

export { createCoefficientSet, DEFAULT_COEFFICIENTS, DEFAULT_GRID_INTENSITY, EUROPEAN_AVERAGE_GRID_INTENSITY, STORAGE_MEDIA_KEYS } from "./config/coefficients.js";
export type { CoefficientOverrides, CoefficientSet, DeviceCoefficients, StorageCoefficients, StorageMedia, StorageMediaKey } from "./config/coefficients.js";

export { DEFAULT_UTILIZATION_CURVE, interpolate, UtilizationCurve, validateCurvePoints } from "./curve/UtilizationCurve.js";
export type { CurvePoint } from "./curve/UtilizationCurve.js";

export { DEFAULT_HARDWARE_PROFILES_PATH, HardwareProfileResolver, loadHardwareProfiles, parseHardwareProfile } from "./hardware/HardwareProfileResolver.js";
export type { HardwareProfile } from "./hardware/HardwareProfileResolver.js";

export { computeEnergy, computePower } from "./energy/PowerEnergyConverter.js";
export type { EnergyInput, EnergyRecord, PowerEnergy, PowerRecord } from "./energy/PowerEnergyConverter.js";

export { OperationalCarbonEstimator } from "./carbon/OperationalCarbonEstimator.js";
export type { OperationalEstimate } from "./carbon/OperationalCarbonEstimator.js";
export { estimateEmbodied } from "./carbon/EmbodiedCarbonEstimator.js";
export type { EmbodiedEstimate, EmbodiedInput } from "./carbon/EmbodiedCarbonEstimator.js";

export { createPipeline, processSample, processSamples, RunStats, validateSample } from "./pipeline/SampleProcessor.js";
export type { CarbonPipeline } from "./pipeline/SampleProcessor.js";
export { isPipelineVariant, PIPELINE_VARIANTS } from "./pipeline/types.js";
export type { CarbonRecord, PipelineVariant, ProcessedSample, UsageSample } from "./pipeline/types.js";

export * from "./aggregate/metrics.js";
export { createTimeBuckets, singleBucket, TimeBuckets } from "./aggregate/TimeBuckets.js";
export { clusterTotal, perGroup, perResource } from "./aggregate/grouping.js";
export type { GroupingStrategy } from "./aggregate/grouping.js";
export { dedupeSamples, dedupeSamplesAsync } from "./aggregate/dedupe.js";
export { aggregateInPartitions, Aggregator, DEFAULT_EMPTY_BUCKET_POLICY, planAggregation } from "./aggregate/Aggregator.js";
export type { AggregatedSeries, AggregationAxis, AggregationPlan, BucketValues, EmptyBucketPolicy, PartitionOptions, PartitionResult, PlanOptions } from "./aggregate/Aggregator.js";

export { composeSeries, roundTo } from "./compose/ResultComposer.js";
export type { ComposeOptions, GroupSeries } from "./compose/ResultComposer.js";
export { composeReportRows } from "./compose/reportRows.js";
export type { ReportRow, ResourceMetadata } from "./compose/reportRows.js";
