import type { AggregatedSeries } from "../aggregate/Aggregator.js";
import { roundTo } from "./ResultComposer.js";

export interface ResourceMetadata {
    resourceType: "VM";
    id: string;
    name: string;
    region: string;
    subscription: string;
    instanceClass: string;
    service: string;
    instance: string;
    environment: string;
    partition: string;
    component: string;
    /** gCO2e/kWh used for the resource, set once a sample is processed */
    gridIntensity?: number;
}

export interface ReportRow {
    date: string;
    resourceType: "VM";
    id: string;
    name: string;
    region: string;
    subscription: string;
    energyKwh: number;
    operationalG: number;
    embodiedG: number;
    totalG: number;
    gridIntensity: number;
    instanceClass: string;
    service: string;
    instance: string;
    environment: string;
    partition: string;
    component: string;
}

/**
 * One row per resource that received samples, stamped with the report date.
 * Expects series grouped per resource; values of buckets with samples are summed.
 */
export function composeReportRows(
    aggregated: readonly AggregatedSeries[],
    metadata: ReadonlyMap<string, ResourceMetadata>,
    date: string,
    precision = 4,
): ReportRow[] {
    const rows: ReportRow[] = [];
    for (const { groupKey, buckets } of aggregated) {
        const meta = metadata.get(groupKey);
        if (!meta) continue;

        let samples = 0;
        const totals = { energyKwh: 0, operationalG: 0, embodiedG: 0, totalG: 0 };
        for (const bucket of buckets) {
            if (bucket.samples === 0) continue;
            samples += bucket.samples;
            totals.energyKwh += bucket.values.energyKwh;
            totals.operationalG += bucket.values.operationalG;
            totals.embodiedG += bucket.values.embodiedG;
            totals.totalG += bucket.values.totalG;
        }
        if (samples === 0) continue;

        rows.push({
            date,
            resourceType: meta.resourceType,
            id: meta.id,
            name: meta.name,
            region: meta.region,
            subscription: meta.subscription,
            energyKwh: roundTo(totals.energyKwh, precision),
            operationalG: roundTo(totals.operationalG, precision),
            embodiedG: roundTo(totals.embodiedG, precision),
            totalG: roundTo(totals.totalG, precision),
            gridIntensity: meta.gridIntensity ?? 0,
            instanceClass: meta.instanceClass,
            service: meta.service,
            instance: meta.instance,
            environment: meta.environment,
            partition: meta.partition,
            component: meta.component,
        });
    }
    return rows.sort((a, b) => a.id.localeCompare(b.id));
}
