import { InvalidInput } from "../errors/errors.js";

/**
 * Fixed-width buckets over [startMs, startMs + count * granularityS).
 */
export class TimeBuckets {
    readonly startMs: number;
    readonly granularityS: number;
    readonly count: number;

    constructor(startMs: number, granularityS: number, count: number) {
        if (!Number.isFinite(startMs)) throw new InvalidInput("bucket start must be a finite epoch ms");
        if (!Number.isFinite(granularityS) || granularityS <= 0) {
            throw new InvalidInput("granularity must be > 0 seconds", { granularityS });
        }
        if (!Number.isInteger(count) || count < 1) {
            throw new InvalidInput("bucket count must be a positive integer", { count });
        }
        this.startMs = startMs;
        this.granularityS = granularityS;
        this.count = count;
    }

    get endMs(): number {
        return this.startMs + this.count * this.granularityS * 1000;
    }

    /** -1 when the instant falls outside the window */
    indexOf(timestampMs: number): number {
        if (timestampMs < this.startMs || timestampMs >= this.endMs) return -1;
        return Math.min(Math.floor((timestampMs - this.startMs) / (this.granularityS * 1000)), this.count - 1);
    }

    startOf(index: number): number {
        return this.startMs + index * this.granularityS * 1000;
    }

    sameGeometry(other: TimeBuckets): boolean {
        return this.startMs === other.startMs
            && this.granularityS === other.granularityS
            && this.count === other.count;
    }
}

function toMs(value: string | number, name: string): number {
    const ms = typeof value === "number" ? value : Date.parse(value);
    if (!Number.isFinite(ms)) throw new InvalidInput(`${name} is not a valid timestamp`, { [name]: value });
    return ms;
}

/**
 * Buckets covering [start, end): one per sampling point, the last one possibly partial.
 */
export function createTimeBuckets(start: string | number, end: string | number, granularityS: number): TimeBuckets {
    const startMs = toMs(start, "start");
    const endMs = toMs(end, "end");
    if (endMs <= startMs) {
        throw new InvalidInput("time window end must be after its start", { start, end });
    }
    if (!Number.isFinite(granularityS) || granularityS <= 0) {
        throw new InvalidInput("granularity must be > 0 seconds", { granularityS });
    }
    const count = Math.max(1, Math.ceil((endMs - startMs) / (granularityS * 1000)));
    return new TimeBuckets(startMs, granularityS, count);
}

/** A single bucket spanning the whole window (vertical-only aggregation). */
export function singleBucket(start: string | number, end: string | number): TimeBuckets {
    const startMs = toMs(start, "start");
    const endMs = toMs(end, "end");
    if (endMs <= startMs) {
        throw new InvalidInput("time window end must be after its start", { start, end });
    }
    return new TimeBuckets(startMs, (endMs - startMs) / 1000, 1);
}
