import fs from "node:fs";
import readline from "node:readline/promises";
import path from "node:path";
import { InvalidInput, type ResourceMetadata, type UsageSample } from "@carbonmeter/core";
import { accessReadable, type Logger } from "@carbonmeter/shared";

export const USAGE_HEADERS = [
    "Time",
    "Id",
    "Size",
    "Region",
    "Service",
    "Component",
    "Subscription",
    "Name",
    "Instance",
    "Environment",
    "Partition",
    "AverageCpuPercentage",
    "DiskSizeGb",
] as const;

export type UsageHeader = typeof USAGE_HEADERS[number];
export type UsageRecord = Record<UsageHeader, string>;

export const DEFAULT_REGION = "germanywestcentral";
// every exported row covers one hour
export const ROW_DURATION_S = 3600;

export interface UsageRow {
    sample: UsageSample;
    metadata: ResourceMetadata;
}

export interface ReadSummary {
    filesRead: number;
    rows: number;
    missingFiles: string[];
    emptyFiles: string[];
}

export function createReadSummary(): ReadSummary {
    return { filesRead: 0, rows: 0, missingFiles: [], emptyFiles: [] };
}

/**
 * Splits one CSV line. Handles quoted fields, commas inside quotes and "" escapes.
 */
export function splitCsvLine(line: string): string[] {
    const fields: string[] = [];
    let buf = "";
    let quoted = false;

    for (let i = 0; i < line.length; i++) {
        const c = line[i];
        if (quoted) {
            if (c === '"') {
                if (line[i + 1] === '"') {
                    buf += '"';
                    i++;
                } else {
                    quoted = false;
                }
                continue;
            }
            buf += c;
            continue;
        }
        if (c === '"') {
            quoted = true;
            continue;
        }
        if (c === ",") {
            fields.push(buf);
            buf = "";
            continue;
        }
        buf += c;
    }
    if (quoted) {
        throw new InvalidInput("unclosed quote in CSV line");
    }
    fields.push(buf);
    return fields;
}

function clean(value: string): string {
    const trimmed = value.trim();
    return trimmed === "-" ? "" : trimmed;
}

// empty cells count as 0, anything unparseable becomes NaN and is rejected per sample
function toNumber(value: string): number {
    const trimmed = value.trim();
    return trimmed === "" ? 0 : Number(trimmed);
}

const ZONE_SUFFIX = /(z|[+-]\d{2}:?\d{2})$/i;

/**
 * Export timestamps without an offset are UTC.
 */
export function normalizeTimestamp(value: string): string {
    const v = value.trim().replace(" ", "T");
    if (v === "" || !v.includes("T") || ZONE_SUFFIX.test(v)) return v;
    return `${v}Z`;
}

export function recordToUsage(record: UsageRecord): UsageRow {
    const region = clean(record.Region) || DEFAULT_REGION;
    const sample: UsageSample = {
        timestamp: normalizeTimestamp(record.Time),
        resourceId: record.Id.trim(),
        instanceClass: record.Size.trim(),
        region,
        cpuUtilizationPct: toNumber(record.AverageCpuPercentage),
        memoryRequestedGb: 0,
        storageRequestedGb: toNumber(record.DiskSizeGb),
        vcpusAllocated: 0,
        durationS: ROW_DURATION_S,
        groupingKey: clean(record.Service),
    };
    const metadata: ResourceMetadata = {
        resourceType: "VM",
        id: sample.resourceId,
        name: record.Name.trim(),
        region,
        subscription: clean(record.Subscription),
        instanceClass: sample.instanceClass,
        service: clean(record.Service),
        instance: clean(record.Instance),
        environment: clean(record.Environment),
        partition: clean(record.Partition),
        component: clean(record.Component),
    };
    return { sample, metadata };
}

type ColumnIndex = ReadonlyMap<UsageHeader, number>;

function headerIndex(header: string[], file: string): ColumnIndex {
    const index = new Map<UsageHeader, number>();
    const missing: string[] = [];
    for (const name of USAGE_HEADERS) {
        const at = header.indexOf(name);
        if (at < 0) missing.push(name);
        else index.set(name, at);
    }
    if (missing.length > 0) {
        throw new InvalidInput(`${path.basename(file)}: missing columns ${missing.join(", ")}`, { file, missing });
    }
    return index;
}

function toRecord(fields: string[], columns: ColumnIndex): UsageRecord {
    const at = (name: UsageHeader) => fields[columns.get(name) ?? -1] ?? "";
    return {
        Time: at("Time"),
        Id: at("Id"),
        Size: at("Size"),
        Region: at("Region"),
        Service: at("Service"),
        Component: at("Component"),
        Subscription: at("Subscription"),
        Name: at("Name"),
        Instance: at("Instance"),
        Environment: at("Environment"),
        Partition: at("Partition"),
        AverageCpuPercentage: at("AverageCpuPercentage"),
        DiskSizeGb: at("DiskSizeGb"),
    };
}

/**
 * Streams the rows of one usage export, line by line.
 */
export async function* readUsageFile(file: string, summary: ReadSummary = createReadSummary(), logger?: Logger): AsyncGenerator<UsageRow> {
    const input = fs.createReadStream(file, { encoding: "utf-8" });
    const rl = readline.createInterface({ input, crlfDelay: Infinity });

    let columns: ColumnIndex | undefined;
    let rows = 0;
    try {
        for await (const line of rl) {
            if (!line.trim()) continue;
            if (!columns) {
                columns = headerIndex(splitCsvLine(line.replace(/^\uFEFF/, "")).map((h) => h.trim()), file);
                continue;
            }
            rows++;
            summary.rows++;
            yield recordToUsage(toRecord(splitCsvLine(line), columns));
        }
    } finally {
        rl.close();
        input.destroy();
    }

    summary.filesRead++;
    if (rows === 0) {
        summary.emptyFiles.push(file);
        logger?.warn({ file }, "usage file has no data rows");
    }
}

/**
 * Concatenates several exports. Unreadable files are logged and skipped.
 */
export async function* readUsageFiles(files: readonly string[], summary: ReadSummary = createReadSummary(), logger?: Logger): AsyncGenerator<UsageRow> {
    for (const file of files) {
        const access = await accessReadable(file);
        if (!access.ok) {
            summary.missingFiles.push(file);
            logger?.warn({ file, reason: access.error }, "usage file skipped");
            continue;
        }
        logger?.debug({ file }, "reading usage file");
        yield* readUsageFile(file, summary, logger);
    }
}
