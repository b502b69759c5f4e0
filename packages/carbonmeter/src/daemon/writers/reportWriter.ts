import { writeFile } from "node:fs/promises";
import path from "node:path";
import type { ReportRow } from "@carbonmeter/core";
import { ensureDirectory } from "@carbonmeter/shared";

export const REPORT_HEADERS = [
    "Date",
    "ResourceType",
    "Id",
    "Name",
    "Region",
    "Subscription",
    "EnergyKWH",
    "OperationalCarbonGramsCO2eq",
    "EmbodiedCarbonGramsCO2eq",
    "TotalCarbonGramsCO2eq",
    "CarbonIntensity",
    "Size",
    "Service",
    "Instance",
    "Environment",
    "Partition",
    "Component",
] as const;

export function reportFileName(date: string): string {
    return `CO2_${date}.csv`;
}

export function escapeCsvField(value: string | number): string {
    const text = String(value);
    return /[",\r\n]/.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

function toFields(row: ReportRow): Array<string | number> {
    return [
        row.date,
        row.resourceType,
        row.id,
        row.name,
        row.region,
        row.subscription,
        row.energyKwh,
        row.operationalG,
        row.embodiedG,
        row.totalG,
        row.gridIntensity,
        row.instanceClass,
        row.service,
        row.instance,
        row.environment,
        row.partition,
        row.component,
    ];
}

export function formatReport(rows: readonly ReportRow[]): string {
    const lines = [REPORT_HEADERS.join(",")];
    for (const row of rows) {
        lines.push(toFields(row).map(escapeCsvField).join(","));
    }
    return `${lines.join("\n")}\n`;
}

/** Writes CO2_<date>.csv into outDir and returns its path. */
export async function writeReport(outDir: string, date: string, rows: readonly ReportRow[]): Promise<string> {
    await ensureDirectory(outDir);
    const outFile = path.join(outDir, reportFileName(date));
    await writeFile(outFile, formatReport(rows), "utf-8");
    return outFile;
}
