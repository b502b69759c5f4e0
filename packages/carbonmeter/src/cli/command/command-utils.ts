import { InvalidInput } from "@carbonmeter/core";

/**
 * level : 0 | 1 | 2
 * 1 === --verbose or -v (debug logs)
 * 2 === -vv (trace logs)
 */
export function extractVerbosity(args: string[]) {
  let level = 0;
  const rest: string[] = [];

  for (const arg of args) {
    if (arg === "--verbose" || arg === "-v") {
      level += 1;
      continue;
    }

    if (/^-v{2,}$/.test(arg)) {
      level += arg.length - 1; // -vv
      continue;
    }

    rest.push(arg);
  }

  return { level, rest };
}

export function logLevelFor(verbosity: number, configured?: string): string | undefined {
  if (verbosity >= 2) return "trace";
  if (verbosity === 1) return "debug";
  return configured;
}

export function parsePositiveNumberFromCommand(name: string, v: string | undefined, fallback: number) {
  const n = v === undefined ? fallback : Number(v);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidInput(`${name} must be a positive number`, { [name]: v });
  }
  return n;
}

export function parseNonNegativeNumberFromCommand(name: string, v: string | undefined, fallback: number) {
  const n = v === undefined ? fallback : Number(v);
  if (!Number.isFinite(n) || n < 0) {
    throw new InvalidInput(`${name} must be a number >= 0`, { [name]: v });
  }
  return n;
}

/** --files a.csv,b.csv --files c.csv -> [a.csv, b.csv, c.csv] */
export function splitList(values: readonly string[] | undefined): string[] {
  return (values ?? [])
    .flatMap((value) => value.split(","))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}
