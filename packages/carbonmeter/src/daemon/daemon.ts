import process from "node:process";
import { performance } from "node:perf_hooks";
import {
    aggregateInPartitions,
    CarbonMeterError,
    composeReportRows,
    createPipeline,
    dedupeSamplesAsync,
    InvalidInput,
    perResource,
    planAggregation,
    RunStats,
    type ResourceMetadata,
    type UsageSample,
} from "@carbonmeter/core";
import { errorMessage, silentLogger, type Logger } from "@carbonmeter/shared";
import type { PipelineContext } from "../config/config.js";
import { createReadSummary, readUsageFiles, ROW_DURATION_S, type ReadSummary } from "./readers/usageReader.js";
import { writeReport } from "./writers/reportWriter.js";

const DAY_MS = 86_400_000;
const DATE_FORMAT = /^\d{4}-\d{2}-\d{2}$/;

export interface DaemonOptions {
    files: readonly string[];
    outDir: string;
    context: PipelineContext;
    /** YYYY-MM-DD; defaults to EXECUTION_DATE, then today - 2 days */
    date?: string;
    logger?: Logger;
    partitionSize?: number;
    env?: NodeJS.ProcessEnv;
    now?: Date;
}

export interface DaemonResult {
    success: boolean;
    resourceCount: number;
    executionTimeS: number;
    stats: ReturnType<RunStats["toJSON"]>;
    read: ReadSummary;
    duplicates: number;
    date?: string;
    outFile?: string;
    errorMessage: string;
}

export function isValidDate(value: string): boolean {
    if (!DATE_FORMAT.test(value)) return false;
    const ms = Date.parse(`${value}T00:00:00Z`);
    return !Number.isNaN(ms) && new Date(ms).toISOString().slice(0, 10) === value;
}

/**
 * --date, then EXECUTION_DATE, then two days before `now` (UTC).
 */
export function resolveExecutionDate(explicit?: string, env: NodeJS.ProcessEnv = process.env, now: Date = new Date()): string {
    const value = explicit || env.EXECUTION_DATE || new Date(now.getTime() - 2 * DAY_MS).toISOString().slice(0, 10);
    if (!isValidDate(value)) {
        throw new InvalidInput(`invalid execution date '${value}', expected YYYY-MM-DD`, { date: value });
    }
    return value;
}

interface TimeWindow {
    startMs: number;
    endMs: number;
}

// first pass: timestamps for the aggregation window; missing and empty files are recorded here
async function scanWindow(files: readonly string[], read: ReadSummary, logger: Logger): Promise<TimeWindow | undefined> {
    let startMs = Infinity;
    let endMs = -Infinity;
    for await (const { sample } of readUsageFiles(files, read, logger)) {
        const ms = Date.parse(sample.timestamp);
        if (Number.isNaN(ms)) continue;
        startMs = Math.min(startMs, ms);
        endMs = Math.max(endMs, ms + sample.durationS * 1000);
    }
    return Number.isFinite(startMs) ? { startMs, endMs } : undefined;
}

/**
 * Reads the usage exports, runs the infrastructure pipeline over every VM and
 * writes CO2_<date>.csv with one row per VM.
 */
export async function runDaemon(options: DaemonOptions): Promise<DaemonResult> {
    const logger = options.logger ?? silentLogger;
    const started = performance.now();
    const stats = new RunStats();
    const read = createReadSummary();
    let duplicates = 0;

    const elapsed = () => (performance.now() - started) / 1000;

    try {
        const date = resolveExecutionDate(options.date, options.env, options.now);
        logger.info({ date, files: options.files.length }, "carbon daemon starting");

        const window = await scanWindow(options.files, read, logger);
        if (!window) {
            throw new InvalidInput("no usage rows found in the input files", { files: options.files });
        }

        const plan = planAggregation({
            axis: "vertical",
            start: window.startMs,
            end: Math.max(window.endMs, window.startMs + ROW_DURATION_S * 1000),
            granularityS: ROW_DURATION_S,
            grouping: perResource(),
        });
        const pipeline = createPipeline(options.context.coefficients, options.context.profiles, "infrastructure");

        const metadata = new Map<string, ResourceMetadata>();
        const fallbackVms = new Map<string, Set<string>>();

        async function* samples(): AsyncGenerator<UsageSample> {
            for await (const row of readUsageFiles(options.files)) {
                if (!metadata.has(row.sample.resourceId)) {
                    metadata.set(row.sample.resourceId, row.metadata);
                }
                yield row.sample;
            }
        }

        const { aggregator } = await aggregateInPartitions(
            dedupeSamplesAsync(samples(), () => duplicates++),
            pipeline,
            plan,
            {
                partitionSize: options.partitionSize,
                stats,
                logger,
                onProcessed: (processed) => {
                    const { resourceId, region } = processed.sample;
                    const meta = metadata.get(resourceId);
                    if (meta && meta.gridIntensity === undefined) meta.gridIntensity = processed.gridIntensity;
                    if (processed.gridIntensityFallback) {
                        const vms = fallbackVms.get(region) ?? new Set<string>();
                        vms.add(resourceId);
                        fallbackVms.set(region, vms);
                    }
                },
            },
        );

        for (const [region, vms] of fallbackVms) {
            logger.warn(
                { region, vms: vms.size, gridIntensity: options.context.coefficients.defaultGridIntensity },
                "unknown region, using the default grid carbon intensity",
            );
        }
        for (const [instanceClass, samplesSkipped] of stats.unknownInstanceClasses) {
            logger.warn({ instanceClass, samples: samplesSkipped }, "no hardware profile, samples skipped");
        }
        if (duplicates > 0) {
            logger.info({ duplicates }, "duplicate usage rows dropped");
        }

        const rows = composeReportRows(aggregator.snapshot(), metadata, date);
        const outFile = await writeReport(options.outDir, date, rows);

        const totalG = rows.reduce((acc, row) => acc + row.totalG, 0);
        const energyKwh = rows.reduce((acc, row) => acc + row.energyKwh, 0);
        const executionTimeS = elapsed();
        logger.info(
            { outFile, vms: rows.length, totalG, energyKwh, executionTimeS, stats: stats.toJSON() },
            "carbon report written",
        );

        return {
            success: true,
            resourceCount: rows.length,
            executionTimeS,
            stats: stats.toJSON(),
            read,
            duplicates,
            date,
            outFile,
            errorMessage: "",
        };
    } catch (error) {
        if (error instanceof CarbonMeterError) {
            logger.error({ code: error.code, details: error.details }, error.message);
        } else {
            logger.error({ err: error }, "carbon daemon failed");
        }
        return {
            success: false,
            resourceCount: 0,
            executionTimeS: elapsed(),
            stats: stats.toJSON(),
            read,
            duplicates,
            errorMessage: errorMessage(error),
        };
    }
}
