import { ConfigurationError } from "../errors/errors.js";

export interface CurvePoint {
    x: number;
    y: number;
}

// cpu utilization (%) -> fraction of TDP drawn
export const DEFAULT_UTILIZATION_CURVE: readonly CurvePoint[] = Object.freeze([
    Object.freeze({ x: 0, y: 0.12 }),
    Object.freeze({ x: 10, y: 0.32 }),
    Object.freeze({ x: 50, y: 0.75 }),
    Object.freeze({ x: 100, y: 1.02 }),
]);

export function validateCurvePoints(points: readonly CurvePoint[]): void {
    if (points.length < 2) {
        throw new ConfigurationError("utilization curve needs at least two points", { points: points.length });
    }
    if (points[0].x !== 0) {
        throw new ConfigurationError("utilization curve must start at x=0", { x0: points[0].x });
    }
    for (let i = 0; i < points.length; i++) {
        const { x, y } = points[i];
        if (!Number.isFinite(x) || !Number.isFinite(y)) {
            throw new ConfigurationError(`utilization curve point ${i} is not finite`, { index: i });
        }
        if (i > 0 && x <= points[i - 1].x) {
            throw new ConfigurationError("utilization curve x values must be strictly increasing", { index: i });
        }
    }
}

/**
 * Piecewise-linear map from CPU utilization to TDP ratio.
 * Inputs outside the first/last control point clamp to the boundary ratio.
 */
export class UtilizationCurve {
    readonly points: readonly CurvePoint[];

    constructor(points: readonly CurvePoint[] = DEFAULT_UTILIZATION_CURVE) {
        validateCurvePoints(points);
        this.points = Object.freeze(points.map((p) => Object.freeze({ x: p.x, y: p.y })));
    }

    interpolate(utilizationPct: number): number {
        const points = this.points;
        const first = points[0];
        const last = points[points.length - 1];
        const u = Number.isFinite(utilizationPct) ? utilizationPct : 0;

        if (u <= first.x) return first.y;
        if (u >= last.x) return last.y;

        for (let i = 0; i < points.length - 1; i++) {
            const lo = points[i];
            const hi = points[i + 1];
            if (u <= hi.x) {
                return lo.y + (hi.y - lo.y) * (u - lo.x) / (hi.x - lo.x);
            }
        }
        return last.y;
    }
}

export function interpolate(curve: UtilizationCurve, utilizationPct: number): number {
    return curve.interpolate(utilizationPct);
}
