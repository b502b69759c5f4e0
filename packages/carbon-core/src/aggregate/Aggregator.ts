import type { Logger } from "@carbonmeter/shared";
import { InvalidInput } from "../errors/errors.js";
import { processSamples, RunStats, type CarbonPipeline } from "../pipeline/SampleProcessor.js";
import type { ProcessedSample, UsageSample } from "../pipeline/types.js";
import { clusterTotal, perGroup, perResource, type GroupingStrategy } from "./grouping.js";
import {
    contributionOf,
    EXTENSIVE_METRICS,
    zeroExtensive,
    zeroMetrics,
    type ExtensiveValues,
    type MetricValues,
} from "./metrics.js";
import { createTimeBuckets, singleBucket, type TimeBuckets } from "./TimeBuckets.js";

export type AggregationAxis = "horizontal" | "vertical" | "both";

/**
 * What an empty bucket becomes in the output:
 * - zero-fill: a bucket of zeros (series length == number of sampling points)
 * - carry-forward: a copy of the previous bucket's values
 * - omit: dropped from the series
 */
export type EmptyBucketPolicy = "zero-fill" | "carry-forward" | "omit";

export const DEFAULT_EMPTY_BUCKET_POLICY: EmptyBucketPolicy = "zero-fill";

export interface AggregationPlan {
    readonly axis: AggregationAxis;
    readonly buckets: TimeBuckets;
    readonly grouping: GroupingStrategy;
    readonly emptyBuckets: EmptyBucketPolicy;
}

export interface PlanOptions {
    axis: AggregationAxis;
    start: string | number;
    end: string | number;
    granularityS: number;
    /** ignored for the horizontal axis, which always groups per resource */
    grouping?: GroupingStrategy;
    emptyBuckets?: EmptyBucketPolicy;
}

export function planAggregation(options: PlanOptions): AggregationPlan {
    const emptyBuckets = options.emptyBuckets ?? DEFAULT_EMPTY_BUCKET_POLICY;
    switch (options.axis) {
        case "horizontal":
            return {
                axis: "horizontal",
                buckets: createTimeBuckets(options.start, options.end, options.granularityS),
                grouping: perResource(),
                emptyBuckets,
            };
        case "vertical":
            return {
                axis: "vertical",
                buckets: singleBucket(options.start, options.end),
                grouping: options.grouping ?? clusterTotal(),
                emptyBuckets,
            };
        case "both":
            return {
                axis: "both",
                buckets: createTimeBuckets(options.start, options.end, options.granularityS),
                grouping: options.grouping ?? perGroup(),
                emptyBuckets,
            };
    }
}

interface BucketAccumulator {
    sums: ExtensiveValues;
    cpuUtilizationSum: number;
    samples: number;
}

export interface BucketValues {
    readonly startMs: number;
    /** contributing samples; 0 for filled buckets */
    readonly samples: number;
    readonly filled: boolean;
    readonly values: Readonly<MetricValues>;
}

export interface AggregatedSeries {
    readonly groupKey: string;
    readonly buckets: readonly BucketValues[];
}

function emptyAccumulator(): BucketAccumulator {
    return { sums: zeroExtensive(), cpuUtilizationSum: 0, samples: 0 };
}

/**
 * Reduction keyed by (group, time bucket). Holds at most groups x buckets
 * accumulators. Partial aggregators built over disjoint partitions are
 * combined with merge().
 */
export class Aggregator {
    readonly plan: AggregationPlan;
    added = 0;
    outOfWindow = 0;

    private readonly groups = new Map<string, Array<BucketAccumulator | undefined>>();

    constructor(plan: AggregationPlan) {
        this.plan = plan;
    }

    get groupCount(): number {
        return this.groups.size;
    }

    /** Registers a group so it shows up even without samples. */
    ensureGroup(key: string): void {
        this.bucketsFor(key);
    }

    add(processed: ProcessedSample): boolean {
        const index = this.plan.buckets.indexOf(processed.timestampMs);
        if (index < 0) {
            this.outOfWindow++;
            return false;
        }
        const buckets = this.bucketsFor(this.plan.grouping.keyOf(processed));
        const acc = buckets[index] ?? (buckets[index] = emptyAccumulator());

        const contribution = contributionOf(processed);
        for (const metric of EXTENSIVE_METRICS) {
            acc.sums[metric] += contribution[metric];
        }
        acc.cpuUtilizationSum += processed.sample.cpuUtilizationPct;
        acc.samples++;
        this.added++;
        return true;
    }

    addAll(processed: Iterable<ProcessedSample>): this {
        for (const item of processed) this.add(item);
        return this;
    }

    merge(other: Aggregator): this {
        if (!this.plan.buckets.sameGeometry(other.plan.buckets) || this.plan.grouping.name !== other.plan.grouping.name) {
            throw new InvalidInput("cannot merge aggregators built on different plans");
        }
        for (const [key, theirs] of other.groups) {
            const ours = this.bucketsFor(key);
            theirs.forEach((acc, index) => {
                if (!acc) return;
                const target = ours[index] ?? (ours[index] = emptyAccumulator());
                for (const metric of EXTENSIVE_METRICS) {
                    target.sums[metric] += acc.sums[metric];
                }
                target.cpuUtilizationSum += acc.cpuUtilizationSum;
                target.samples += acc.samples;
            });
        }
        this.added += other.added;
        this.outOfWindow += other.outOfWindow;
        return this;
    }

    /**
     * Per-group bucket series, groups sorted by key, empty buckets handled by
     * the plan's policy.
     */
    snapshot(): AggregatedSeries[] {
        const { buckets, emptyBuckets } = this.plan;
        const keys = [...this.groups.keys()].sort();

        return keys.map((groupKey) => {
            const accs = this.bucketsFor(groupKey);
            const series: BucketValues[] = [];
            let previous: Readonly<MetricValues> = zeroMetrics();

            for (let i = 0; i < buckets.count; i++) {
                const acc = accs[i];
                const startMs = buckets.startOf(i);
                if (acc && acc.samples > 0) {
                    const values: MetricValues = {
                        ...acc.sums,
                        cpuUtilizationPct: acc.cpuUtilizationSum / acc.samples,
                    };
                    previous = Object.freeze(values);
                    series.push(Object.freeze({ startMs, samples: acc.samples, filled: false, values: previous }));
                    continue;
                }
                if (emptyBuckets === "omit") continue;
                const values = emptyBuckets === "carry-forward" ? previous : Object.freeze(zeroMetrics());
                series.push(Object.freeze({ startMs, samples: 0, filled: true, values }));
            }
            return Object.freeze({ groupKey, buckets: Object.freeze(series) });
        });
    }

    private bucketsFor(key: string): Array<BucketAccumulator | undefined> {
        let buckets = this.groups.get(key);
        if (!buckets) {
            buckets = new Array<BucketAccumulator | undefined>(this.plan.buckets.count).fill(undefined);
            this.groups.set(key, buckets);
        }
        return buckets;
    }
}

export interface PartitionOptions {
    /** samples per partition */
    partitionSize?: number;
    stats?: RunStats;
    logger?: Logger;
    /** called for every processed sample, before aggregation */
    onProcessed?: (processed: ProcessedSample) => void;
}

export interface PartitionResult {
    aggregator: Aggregator;
    stats: RunStats;
    partitions: number;
}

function reducePartition(
    partition: UsageSample[],
    pipeline: CarbonPipeline,
    plan: AggregationPlan,
    options: PartitionOptions,
): { partial: Aggregator; stats: RunStats } {
    const stats = new RunStats();
    const partial = new Aggregator(plan);
    for (const processed of processSamples(partition, pipeline, stats, options.logger)) {
        options.onProcessed?.(processed);
        partial.add(processed);
    }
    return { partial, stats };
}

/**
 * Streams samples in fixed-size partitions; each partition is reduced into
 * its own aggregator and then merged into the result.
 */
export async function aggregateInPartitions(
    samples: Iterable<UsageSample> | AsyncIterable<UsageSample>,
    pipeline: CarbonPipeline,
    plan: AggregationPlan,
    options: PartitionOptions = {},
): Promise<PartitionResult> {
    const partitionSize = options.partitionSize ?? 430;
    if (!Number.isInteger(partitionSize) || partitionSize < 1) {
        throw new InvalidInput("partitionSize must be a positive integer", { partitionSize });
    }
    const aggregator = new Aggregator(plan);
    const stats = options.stats ?? new RunStats();
    let partitions = 0;
    let partition: UsageSample[] = [];

    const flush = () => {
        if (partition.length === 0) return;
        const { partial, stats: partialStats } = reducePartition(partition, pipeline, plan, options);
        aggregator.merge(partial);
        stats.merge(partialStats);
        partitions++;
        partition = [];
    };

    for await (const sample of samples) {
        partition.push(sample);
        if (partition.length >= partitionSize) flush();
    }
    flush();

    return { aggregator, stats, partitions };
}
