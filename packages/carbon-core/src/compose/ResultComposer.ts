import type { AggregatedSeries } from "../aggregate/Aggregator.js";
import { METRIC_NAMES, zeroMetrics, type MetricName } from "../aggregate/metrics.js";

export interface GroupSeries {
    groupKey: string;
    /** ISO start of every emitted bucket */
    timestamps: string[];
    samples: number[];
    series: Record<MetricName, number[]>;
    /**
     * Horizon totals over the buckets that received samples, taken from the
     * unrounded values: the sum for every metric except cpuUtilizationPct,
     * which is the sample-weighted mean. Filled buckets never contribute.
     */
    totals: Record<MetricName, number>;
}

export interface ComposeOptions {
    /** decimal places kept in the output */
    precision?: number;
}

export function roundTo(value: number, precision: number): number {
    const factor = 10 ** precision;
    return Math.round(value * factor) / factor;
}

function emptySeries(): Record<MetricName, number[]> {
    return {
        energyKwh: [],
        cpuEnergyKwh: [],
        memoryEnergyKwh: [],
        storageEnergyKwh: [],
        operationalG: [],
        embodiedCpuG: [],
        embodiedStorageG: [],
        embodiedG: [],
        totalG: [],
        cpuPowerKw: [],
        memoryPowerKw: [],
        requestedCpu: [],
        requestedMemoryGb: [],
        cpuUtilizationPct: [],
    };
}

function sum(values: readonly number[]): number {
    let total = 0;
    for (const v of values) total += v;
    return total;
}

/**
 * Parallel per-bucket series plus horizon totals for each group. Every metric
 * is present whatever the pipeline variant, so the shape is the same for VM
 * and pod results.
 */
export function composeSeries(aggregated: readonly AggregatedSeries[], options: ComposeOptions = {}): GroupSeries[] {
    const precision = options.precision ?? 4;

    return aggregated.map(({ groupKey, buckets }) => {
        const series = emptySeries();
        for (const bucket of buckets) {
            for (const metric of METRIC_NAMES) {
                series[metric].push(roundTo(bucket.values[metric], precision));
            }
        }

        const samples = buckets.map((bucket) => bucket.samples);
        const sampleCount = sum(samples);

        const sums = zeroMetrics();
        for (const bucket of buckets) {
            if (bucket.samples === 0) continue;
            for (const metric of METRIC_NAMES) {
                sums[metric] += metric === "cpuUtilizationPct"
                    ? bucket.values.cpuUtilizationPct * bucket.samples
                    : bucket.values[metric];
            }
        }

        const totals = zeroMetrics();
        for (const metric of METRIC_NAMES) {
            const total = metric === "cpuUtilizationPct"
                ? (sampleCount > 0 ? sums.cpuUtilizationPct / sampleCount : 0)
                : sums[metric];
            totals[metric] = roundTo(total, precision);
        }

        return {
            groupKey,
            timestamps: buckets.map((bucket) => new Date(bucket.startMs).toISOString()),
            samples,
            series,
            totals,
        };
    });
}
