import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function isLogLevel(value: unknown): value is LevelWithSilent {
    return typeof value === "string" && LEVELS.some((level) => level === value);
}

/**
 * Root logger for a process. Level resolution: explicit argument, then LOG_LEVEL, then "info".
 */
export function createLogger(name: string, level?: string): Logger {
    const envLevel = process.env.LOG_LEVEL;
    const resolved = isLogLevel(level) ? level : isLogLevel(envLevel) ? envLevel : "info";
    return pino({ name, level: resolved });
}

// Used by library code and tests that do not want output.
export const silentLogger: Logger = pino({ level: "silent" });
