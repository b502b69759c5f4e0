import type { ProcessedSample } from "../pipeline/types.js";

export interface GroupingStrategy {
    readonly name: "cluster" | "group" | "resource";
    keyOf(processed: ProcessedSample): string;
}

export function clusterTotal(label = "total"): GroupingStrategy {
    return { name: "cluster", keyOf: () => label };
}

export function perGroup(): GroupingStrategy {
    return { name: "group", keyOf: (processed) => processed.sample.groupingKey };
}

export function perResource(): GroupingStrategy {
    return { name: "resource", keyOf: (processed) => processed.sample.resourceId };
}
