import { readFile } from "node:fs/promises";
import path from "node:path";
import process from "node:process";
import { z } from "zod";
import {
    ConfigurationError,
    createCoefficientSet,
    DEFAULT_HARDWARE_PROFILES_PATH,
    loadHardwareProfiles,
    type CoefficientSet,
    type HardwareProfileResolver,
} from "@carbonmeter/core";
import { errorMessage, extractErrorCode, reasonFromCode } from "@carbonmeter/shared";

export const DEFAULT_CONFIG_FILE = "carbonmeter.config.json";

const StorageSchema = z.object({
    powerWPerGb: z.number().nonnegative().optional(),
    embodiedGPerGb: z.number().nonnegative().optional(),
}).strict();

export const AppConfigSchema = z.object({
    curve: z.array(z.object({ x: z.number(), y: z.number() }).strict()).min(2).optional(),
    memoryCoefficientWPerGb: z.number().nonnegative().optional(),
    storage: z.object({
        ssd: StorageSchema.optional(),
        hdd: StorageSchema.optional(),
        unknown: StorageSchema.optional(),
    }).strict().optional(),
    storageLifespanHours: z.number().positive().optional(),
    device: z.object({
        embodiedG: z.number().nonnegative().optional(),
        lifespanHours: z.number().positive().optional(),
    }).strict().optional(),
    pue: z.number().min(1).optional(),
    gridIntensity: z.record(z.string(), z.number().nonnegative()).optional(),
    // null: unknown regions are skipped instead of using a fallback
    defaultGridIntensity: z.number().nonnegative().nullable().optional(),
    hardwareProfiles: z.string().min(1).optional(),
    logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
}).strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface LoadedConfig {
    /** absolute path of the file read, undefined when defaults are used */
    source?: string;
    config: AppConfig;
}

export function parseConfig(raw: unknown, source = "config"): AppConfig {
    const result = AppConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
        throw new ConfigurationError(`${source}: ${issues.join("; ")}`, { issues });
    }
    return result.data;
}

/**
 * Reads the JSON config. An explicit path must exist; the default
 * carbonmeter.config.json in the working directory is optional.
 */
export async function loadConfig(configPath?: string, cwd: string = process.cwd()): Promise<LoadedConfig> {
    const explicit = configPath !== undefined;
    const file = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);

    let raw: string;
    try {
        raw = await readFile(file, "utf-8");
    } catch (error) {
        const code = extractErrorCode(error);
        if (code === "ENOENT" && !explicit) return { config: {} };
        throw new ConfigurationError(`[--config]: cannot read ${file} (${reasonFromCode(code)})`, { file });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigurationError(`[--config]: invalid JSON in ${file}: ${errorMessage(error)}`, { file });
    }
    return { source: file, config: parseConfig(parsed, file) };
}

export interface PipelineContext {
    coefficients: CoefficientSet;
    profiles: HardwareProfileResolver;
}

/**
 * Builds the frozen coefficient set and the hardware table. A relative
 * hardwareProfiles path is taken from the config file's directory.
 */
export async function loadPipelineContext(loaded: LoadedConfig, cwd: string = process.cwd()): Promise<PipelineContext> {
    const { config } = loaded;
    const coefficients = createCoefficientSet({
        curve: config.curve,
        memoryCoefficientWPerGb: config.memoryCoefficientWPerGb,
        storage: config.storage,
        storageLifespanHours: config.storageLifespanHours,
        device: config.device,
        pue: config.pue,
        gridIntensity: config.gridIntensity,
        defaultGridIntensity: config.defaultGridIntensity,
    });

    const baseDir = loaded.source ? path.dirname(loaded.source) : cwd;
    const profilesPath = config.hardwareProfiles
        ? path.resolve(baseDir, config.hardwareProfiles)
        : DEFAULT_HARDWARE_PROFILES_PATH;

    return { coefficients, profiles: await loadHardwareProfiles(profilesPath) };
}
