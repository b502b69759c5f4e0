import type { UsageSample } from "../pipeline/types.js";

function sampleKey(sample: UsageSample): string {
    const ms = Date.parse(sample.timestamp);
    // same instant written with different offsets is the same observation
    return `${sample.resourceId}\u0000${Number.isNaN(ms) ? sample.timestamp : ms}`;
}

/**
 * Drops repeated (resourceId, timestamp) pairs, keeping the first occurrence.
 * Overlapping exports therefore count each observation once.
 */
export function* dedupeSamples(
    samples: Iterable<UsageSample>,
    onDuplicate?: (sample: UsageSample) => void,
): Generator<UsageSample> {
    const seen = new Set<string>();
    for (const sample of samples) {
        const key = sampleKey(sample);
        if (seen.has(key)) {
            onDuplicate?.(sample);
            continue;
        }
        seen.add(key);
        yield sample;
    }
}

export async function* dedupeSamplesAsync(
    samples: AsyncIterable<UsageSample>,
    onDuplicate?: (sample: UsageSample) => void,
): AsyncGenerator<UsageSample> {
    const seen = new Set<string>();
    for await (const sample of samples) {
        const key = sampleKey(sample);
        if (seen.has(key)) {
            onDuplicate?.(sample);
            continue;
        }
        seen.add(key);
        yield sample;
    }
}
