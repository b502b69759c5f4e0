import fastify, { type FastifyError } from "fastify";
import { z, ZodError } from "zod";
import {
    aggregateInPartitions,
    CarbonMeterError,
    clusterTotal,
    composeSeries,
    createPipeline,
    dedupeSamples,
    InvalidInput,
    perGroup,
    perResource,
    planAggregation,
    RunStats,
    type AggregationPlan,
    type GroupingStrategy,
    type UsageSample,
} from "@carbonmeter/core";
import type { Logger } from "@carbonmeter/shared";
import type { PipelineContext } from "../config/config.js";
import { DEFAULT_REGION } from "../daemon/readers/usageReader.js";
import { SCOPE_KINDS, type TelemetrySource } from "../telemetry/TelemetrySource.js";

export const MAX_BUCKETS = 10_000;

const timestamp = z.union([z.string(), z.number()]).refine(
    (value) => Number.isFinite(typeof value === "number" ? value : Date.parse(value)),
    "must be an ISO-8601 timestamp or epoch milliseconds",
);

export const QueryBodySchema = z.object({
    scope: z.object({
        kind: z.enum(SCOPE_KINDS),
        name: z.string().min(1),
    }),
    granularityS: z.number().positive(),
    start: timestamp,
    end: timestamp,
    axis: z.enum(["horizontal", "vertical", "both"]).default("both"),
    breakdown: z.enum(["total", "group", "resource"]).optional(),
    emptyBuckets: z.enum(["zero-fill", "carry-forward", "omit"]).optional(),
}).strict();

export type QueryBody = z.infer<typeof QueryBodySchema>;

// a query key given once arrives as a string, repeated as an array
const toArray = (value: unknown): unknown[] => (Array.isArray(value) ? value : [value]);

export const HardwareQuerySchema = z.object({
    instanceClass: z.string().min(1),
    cpuLoad: z.preprocess(toArray, z.array(z.coerce.number().min(0).max(100)).min(1)),
    storageGb: z.preprocess(toArray, z.array(z.coerce.number().nonnegative())).optional(),
    durationS: z.coerce.number().positive().default(3600),
    region: z.string().min(1).default(DEFAULT_REGION),
}).strict();

export type HardwareQuery = z.infer<typeof HardwareQuerySchema>;

export interface ServerOptions {
    context: PipelineContext;
    telemetry: TelemetrySource;
    logger: Logger;
}

function groupingFor(body: QueryBody): GroupingStrategy | undefined {
    switch (body.breakdown) {
        case "total":
            return clusterTotal(body.scope.name);
        case "group":
            return perGroup();
        case "resource":
            return perResource();
        default:
            return undefined;
    }
}

export function planQuery(body: QueryBody): AggregationPlan {
    const plan = planAggregation({
        axis: body.axis,
        start: body.start,
        end: body.end,
        granularityS: body.granularityS,
        grouping: groupingFor(body),
        emptyBuckets: body.emptyBuckets,
    });
    if (plan.buckets.count > MAX_BUCKETS) {
        throw new InvalidInput(`time window holds more than ${MAX_BUCKETS} buckets`, { buckets: plan.buckets.count });
    }
    return plan;
}

/**
 * One sample per data point of durationS / n seconds, starting at offset 0.
 */
export function hardwareSamples(query: HardwareQuery): { stepS: number; samples: UsageSample[] } {
    const storage = query.storageGb ?? query.cpuLoad.map(() => 0);
    if (storage.length !== query.cpuLoad.length) {
        throw new InvalidInput("cpuLoad and storageGb must have the same length", {
            cpuLoad: query.cpuLoad.length,
            storageGb: storage.length,
        });
    }
    const stepS = Math.round(query.durationS / query.cpuLoad.length);
    if (stepS <= 0) {
        throw new InvalidInput("durationS is too short for the number of data points", { durationS: query.durationS });
    }
    const samples = query.cpuLoad.map((cpuUtilizationPct, i): UsageSample => ({
        timestamp: new Date(i * stepS * 1000).toISOString(),
        resourceId: query.instanceClass,
        instanceClass: query.instanceClass,
        region: query.region,
        cpuUtilizationPct,
        memoryRequestedGb: 0,
        storageRequestedGb: storage[i] ?? 0,
        vcpusAllocated: 0,
        durationS: stepS,
        groupingKey: query.instanceClass,
    }));
    return { stepS, samples };
}

function statusFor(error: FastifyError | CarbonMeterError): number {
    if (error instanceof CarbonMeterError) {
        switch (error.code) {
            case "PROFILE_NOT_FOUND":
                return 404;
            case "INVALID_INPUT":
            case "INVALID_SAMPLE":
            case "UNKNOWN_GRID_INTENSITY":
                return 400;
            default:
                return 500;
        }
    }
    return error.statusCode !== undefined && error.statusCode < 500 ? error.statusCode : 500;
}

export async function buildServer(options: ServerOptions) {
    const { context, telemetry, logger } = options;
    const app = fastify({ logger });

    const applicationPipeline = createPipeline(context.coefficients, context.profiles, "application");
    const infrastructurePipeline = createPipeline(context.coefficients, context.profiles, "infrastructure");

    app.setErrorHandler((error, request, reply) => {
        if (error instanceof ZodError) {
            const message = error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
            return reply.status(400).send({ error: "INVALID_INPUT", message });
        }
        const status = statusFor(error);
        if (status >= 500) {
            request.log.error({ err: error }, "request failed");
            return reply.status(500).send({ error: "INTERNAL", message: "internal server error" });
        }
        const code = error instanceof CarbonMeterError ? error.code : "INVALID_INPUT";
        return reply.status(status).send({ error: code, message: error.message });
    });

    app.get("/status", async () => {
        return {
            status: "OK",
            timestamp: new Date().toISOString(),
        };
    });

    app.post("/v1/carbon/query", async (request) => {
        const body = QueryBodySchema.parse(request.body);
        const plan = planQuery(body);

        const samples = await telemetry.fetchSamples({
            scope: body.scope,
            startMs: plan.buckets.startMs,
            endMs: plan.buckets.endMs,
            granularityS: body.granularityS,
        });

        const { aggregator, stats } = await aggregateInPartitions(
            dedupeSamples(samples),
            applicationPipeline,
            plan,
            { logger: logger.child({ reqId: request.id }) },
        );

        return {
            scope: body.scope,
            axis: plan.axis,
            granularityS: plan.buckets.granularityS,
            groups: composeSeries(aggregator.snapshot()),
            stats: stats.toJSON(),
        };
    });

    app.get("/v1/carbon/hardware", async (request) => {
        const query = HardwareQuerySchema.parse(request.query);
        const { stepS, samples } = hardwareSamples(query);
        // profile and region errors surface as 404/400 rather than being skipped
        context.profiles.resolve(query.instanceClass);
        infrastructurePipeline.operational.gridIntensity(query.region);

        const plan = planAggregation({
            axis: "horizontal",
            start: 0,
            end: samples.length * stepS * 1000,
            granularityS: stepS,
        });
        const stats = new RunStats();
        const { aggregator } = await aggregateInPartitions(samples, infrastructurePipeline, plan, { stats });
        const [series] = composeSeries(aggregator.snapshot());

        return {
            instanceClass: query.instanceClass,
            region: query.region,
            durationS: query.durationS,
            stepS,
            offsetsS: samples.map((_, i) => i * stepS),
            series: series?.series,
            totals: series?.totals,
            stats: stats.toJSON(),
        };
    });

    return app;
}
