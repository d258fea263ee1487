/**
 * level : 0 | 1 | 2
 * 0 === debug-meta only
 * 1 === --verbose or -v (human readable sources)
 * 2 === verbose + engine debug logging
 */
export function extractVerbosity(args: string[]) {
  let level = 0;
  let debugMetaExplicit = false;
  const rest: string[] = [];

  for (const arg of args) {
    if (arg === "--verbose") {
      level += 1;
      continue;
    }

    if (arg === "--debug-meta") {
      debugMetaExplicit = true;
      continue;
    }

    if (arg === "-v") {
      level += 1;
      continue;
    }

    if (/^-v{2,}$/.test(arg)) {
      level += arg.length - 1; // -vv
      continue;
    }

    rest.push(arg);
  }

  return { level, debugMetaExplicit, rest };
}

export function parsePositiveNumberFromCommand(name: string, v: string | undefined, fallback: number) {
  const n = v === undefined ? fallback : Number(v);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} must be a positive number`);
  }
  return n;
}

export type SettingSource = "cli" | "config" | "default";

export interface ResolvedSetting<T> {
  value: T;
  source: SettingSource;
}

// CLIFLAGS > CONFIG > DEFAULT
export function resolveSetting<T>(cli: T | undefined, config: T | undefined, fallback: T): ResolvedSetting<T> {
  if (cli !== undefined) return { value: cli, source: "cli" };
  if (config !== undefined) return { value: config, source: "config" };
  return { value: fallback, source: "default" };
}
