import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError, type UsageSample } from "@carbonmeter/core";
import { errorMessage, extractErrorCode, reasonFromCode } from "@carbonmeter/shared";

export const SCOPE_KINDS = ["cluster", "application", "namespace"] as const;
export type ScopeKind = typeof SCOPE_KINDS[number];

export interface QueryScope {
    kind: ScopeKind;
    name: string;
}

export interface TelemetryQuery {
    scope: QueryScope;
    startMs: number;
    endMs: number;
    granularityS: number;
}

/**
 * Fetches the usage samples of every resource in scope, one per resource and
 * sampling point. All I/O happens here, before the pipeline runs.
 */
export interface TelemetrySource {
    fetchSamples(query: TelemetryQuery): Promise<UsageSample[]>;
}

export const TelemetryRecordSchema = z.object({
    timestamp: z.string().min(1),
    resourceId: z.string().min(1),
    instanceClass: z.string().min(1),
    region: z.string(),
    cpuUtilizationPct: z.number(),
    memoryRequestedGb: z.number(),
    storageRequestedGb: z.number().default(0),
    vcpusAllocated: z.number(),
    durationS: z.number(),
    storageMedia: z.enum(["ssd", "hdd"]).optional(),
    cluster: z.string().min(1),
    namespace: z.string().min(1),
    application: z.string().min(1),
});

export type TelemetryRecord = z.infer<typeof TelemetryRecordSchema>;

function inScope(record: TelemetryRecord, scope: QueryScope): boolean {
    switch (scope.kind) {
        case "cluster":
            return record.cluster === scope.name;
        case "namespace":
            return record.namespace === scope.name;
        case "application":
            return record.application === scope.name;
    }
}

// the level below the scope: namespaces of a cluster, applications of a namespace
function groupingKeyFor(record: TelemetryRecord, scope: QueryScope): string {
    return scope.kind === "cluster" ? record.namespace : record.application;
}

export function toUsageSample(record: TelemetryRecord, scope: QueryScope): UsageSample {
    return {
        timestamp: record.timestamp,
        resourceId: record.resourceId,
        instanceClass: record.instanceClass,
        region: record.region,
        cpuUtilizationPct: record.cpuUtilizationPct,
        memoryRequestedGb: record.memoryRequestedGb,
        storageRequestedGb: record.storageRequestedGb,
        vcpusAllocated: record.vcpusAllocated,
        durationS: record.durationS,
        groupingKey: groupingKeyFor(record, scope),
        storageMedia: record.storageMedia,
    };
}

function selectSamples(records: readonly TelemetryRecord[], query: TelemetryQuery): UsageSample[] {
    const samples: UsageSample[] = [];
    for (const record of records) {
        if (!inScope(record, query.scope)) continue;
        const ms = Date.parse(record.timestamp);
        if (!(ms >= query.startMs && ms < query.endMs)) continue;
        samples.push(toUsageSample(record, query.scope));
    }
    return samples;
}

export class InMemoryTelemetrySource implements TelemetrySource {
    private readonly records: readonly TelemetryRecord[];

    constructor(records: readonly TelemetryRecord[]) {
        this.records = records;
    }

    async fetchSamples(query: TelemetryQuery): Promise<UsageSample[]> {
        return selectSamples(this.records, query);
    }
}

/**
 * Serves samples from a JSON array of telemetry records. The file is read on
 * first use and kept; a failed read is retried on the next query.
 */
export class JsonFileTelemetrySource implements TelemetrySource {
    readonly path: string;
    private records?: Promise<TelemetryRecord[]>;

    constructor(path: string) {
        this.path = path;
    }

    async fetchSamples(query: TelemetryQuery): Promise<UsageSample[]> {
        this.records ??= this.load().catch((error: unknown) => {
            this.records = undefined;
            throw error;
        });
        return selectSamples(await this.records, query);
    }

    private async load(): Promise<TelemetryRecord[]> {
        let raw: string;
        try {
            raw = await readFile(this.path, "utf-8");
        } catch (error) {
            throw new ConfigurationError(`cannot read samples file ${this.path} (${reasonFromCode(extractErrorCode(error))})`);
        }
        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            throw new ConfigurationError(`invalid JSON in samples file ${this.path}: ${errorMessage(error)}`);
        }
        const result = z.array(TelemetryRecordSchema).safeParse(parsed);
        if (!result.success) {
            const first = result.error.issues[0];
            throw new ConfigurationError(
                `invalid samples file ${this.path}: ${first ? `${first.path.join(".")}: ${first.message}` : "unknown error"}`,
            );
        }
        return result.data;
    }
}
