import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { ConfigurationError, ProfileNotFound } from "../errors/errors.js";

export interface HardwareProfile {
    readonly instanceClass: string;
    readonly tdpWatts: number;
    readonly vcpusTotal: number;
    /** host vCPUs a whole VM of this class occupies; defaults to vcpusTotal */
    readonly vcpusAllocated?: number;
    readonly memoryGb: number;
}

export const DEFAULT_HARDWARE_PROFILES_PATH = fileURLToPath(
    new URL("../../data/hardware-profiles.json", import.meta.url),
);

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveField(entry: Record<string, unknown>, field: string, index: number): number {
    const value = entry[field];
    if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
        throw new ConfigurationError(`hardware profile #${index}: ${field} must be > 0`, { index, field });
    }
    return value;
}

export function parseHardwareProfile(entry: unknown, index: number): HardwareProfile {
    if (!isRecord(entry) || typeof entry.instanceClass !== "string" || entry.instanceClass.trim() === "") {
        throw new ConfigurationError(`hardware profile #${index}: instanceClass is required`, { index });
    }
    const memoryGb = entry.memoryGb ?? 0;
    if (typeof memoryGb !== "number" || !Number.isFinite(memoryGb) || memoryGb < 0) {
        throw new ConfigurationError(`hardware profile #${index}: memoryGb must be >= 0`, { index });
    }
    const vcpusTotal = positiveField(entry, "vcpusTotal", index);
    const vcpusAllocated = entry.vcpusAllocated === undefined
        ? undefined
        : positiveField(entry, "vcpusAllocated", index);
    if (vcpusAllocated !== undefined && vcpusAllocated > vcpusTotal) {
        throw new ConfigurationError(`hardware profile #${index}: vcpusAllocated exceeds vcpusTotal`, { index });
    }
    return Object.freeze({
        instanceClass: entry.instanceClass,
        tdpWatts: positiveField(entry, "tdpWatts", index),
        vcpusTotal,
        vcpusAllocated,
        memoryGb,
    });
}

/**
 * Read-only instance class -> hardware lookup. Built once at startup.
 */
export class HardwareProfileResolver {
    private readonly profiles: ReadonlyMap<string, HardwareProfile>;

    constructor(profiles: Iterable<HardwareProfile>) {
        const table = new Map<string, HardwareProfile>();
        for (const profile of profiles) {
            const key = profile.instanceClass.toLowerCase();
            if (table.has(key)) {
                throw new ConfigurationError(`duplicate hardware profile '${profile.instanceClass}'`);
            }
            table.set(key, Object.freeze({ ...profile }));
        }
        this.profiles = table;
    }

    get size(): number {
        return this.profiles.size;
    }

    has(instanceClass: string): boolean {
        return this.profiles.has(instanceClass.toLowerCase());
    }

    resolve(instanceClass: string): HardwareProfile {
        const profile = this.profiles.get(instanceClass.toLowerCase());
        if (!profile) throw new ProfileNotFound(instanceClass);
        return profile;
    }
}

export async function loadHardwareProfiles(path: string = DEFAULT_HARDWARE_PROFILES_PATH): Promise<HardwareProfileResolver> {
    let parsed: unknown;
    try {
        parsed = JSON.parse(await readFile(path, "utf-8"));
    } catch (error) {
        throw new ConfigurationError(`cannot read hardware profiles from ${path}`, {
            cause: error instanceof Error ? error.message : String(error),
        });
    }
    if (!Array.isArray(parsed)) {
        throw new ConfigurationError(`hardware profiles in ${path} must be a JSON array`);
    }
    return new HardwareProfileResolver(parsed.map((entry, index) => parseHardwareProfile(entry, index)));
}
