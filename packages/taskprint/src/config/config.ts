import { readFile } from "node:fs/promises";
import { extractErrorCode } from "@taskprint/shared";
import { ConfigurationError } from "@taskprint/footprint-core";
import type { CpuNormalisation, GovernorConfig, NodeConfig, NodeEntry, UsageUnit } from "@taskprint/footprint-core";

export const DEFAULT_POWER_MODEL = "ondemand_minmax";
export const DEFAULT_INTERVAL_MINUTES = 60;

/** A constant factor, a CSV path, or an inline table keyed MM/DD-HH:mm. */
export type IntensitySetting = number | string | Record<string, number>;

export interface ResourceSetting {
    intensity?: IntensitySetting;
    efficiency?: number;
}

export interface AppConfig {
    powerModel?: string;
    intervalMinutes?: number;
    pue?: number;
    memoryCoefficient?: number;
    usageUnit?: UsageUnit;
    cpuNormalisation?: CpuNormalisation;
    applyPueToStatic?: boolean;
    withReservedMemory?: boolean;
    carbonIntensity?: IntensitySetting;
    marginalIntensity?: IntensitySetting;
    water?: ResourceSetting;
    land?: ResourceSetting;
    nodes?: NodeConfig;
}

export interface LoadConfigOptions {
    /** a missing file yields undefined instead of an error */
    optional?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(source: Record<string, unknown>, key: string, path: string): number | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new ConfigurationError(`${path}${key}`, `${path}${key} must be a number`);
    }
    return value;
}

function optionalString(source: Record<string, unknown>, key: string, path: string): string | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value !== "string") {
        throw new ConfigurationError(`${path}${key}`, `${path}${key} must be a string`);
    }
    return value;
}

function optionalBoolean(source: Record<string, unknown>, key: string, path: string): boolean | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value !== "boolean") {
        throw new ConfigurationError(`${path}${key}`, `${path}${key} must be true or false`);
    }
    return value;
}

function optionalNumberList(source: Record<string, unknown>, key: string, path: string): number[] | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value)) {
        throw new ConfigurationError(`${path}${key}`, `${path}${key} must be an array of numbers`);
    }
    const numbers: number[] = [];
    for (const item of value) {
        if (typeof item !== "number" || !Number.isFinite(item)) {
            throw new ConfigurationError(`${path}${key}`, `${path}${key} must be an array of numbers`);
        }
        numbers.push(item);
    }
    return numbers;
}

function optionalChoice<T extends string>(
    source: Record<string, unknown>,
    key: string,
    choices: readonly T[],
    path: string
): T | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    const match = choices.find((choice) => choice === value);
    if (match === undefined) {
        throw new ConfigurationError(`${path}${key}`, `${path}${key} must be one of ${choices.join(", ")}`);
    }
    return match;
}

function parseIntensity(source: Record<string, unknown>, key: string, path: string): IntensitySetting | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value === "number" || typeof value === "string") return value;

    if (isRecord(value)) {
        const table: Record<string, number> = {};
        for (const [entryKey, entryValue] of Object.entries(value)) {
            if (typeof entryValue !== "number") {
                throw new ConfigurationError(`${path}${key}.${entryKey}`, `${path}${key}.${entryKey} must be a number`);
            }
            table[entryKey] = entryValue;
        }
        return table;
    }
    throw new ConfigurationError(`${path}${key}`, `${path}${key} must be a number, a CSV path or a table`);
}

function parseResource(source: Record<string, unknown>, key: string): ResourceSetting | undefined {
    const value = source[key];
    if (value === undefined) return undefined;
    if (!isRecord(value)) {
        throw new ConfigurationError(key, `${key} must be an object with intensity and efficiency`);
    }
    return {
        intensity: parseIntensity(value, "intensity", `${key}.`),
        efficiency: optionalNumber(value, "efficiency", `${key}.`)
    };
}

function parseGovernor(value: unknown, path: string): GovernorConfig {
    if (!isRecord(value)) {
        throw new ConfigurationError(path, `${path} must be an object`);
    }
    const prefix = `${path}.`;
    return {
        minWatts: optionalNumber(value, "minWatts", prefix),
        maxWatts: optionalNumber(value, "maxWatts", prefix),
        linear: optionalNumberList(value, "linear", prefix),
        tdpPerCore: optionalNumber(value, "tdpPerCore", prefix),
        polynomial: optionalNumberList(value, "polynomial", prefix),
        memDraw: optionalNumber(value, "memDraw", prefix),
        systemCores: optionalNumber(value, "systemCores", prefix),
        cpuModel: optionalString(value, "cpuModel", prefix),
        idleWatts: optionalNumber(value, "idleWatts", prefix)
    };
}

export function parseNodeConfig(value: unknown): NodeConfig {
    if (!isRecord(value)) {
        throw new ConfigurationError("nodes", "nodes must be an object keyed by hostname");
    }
    const nodes: NodeConfig = {};
    for (const [hostname, entry] of Object.entries(value)) {
        if (!isRecord(entry) || !isRecord(entry.governors)) {
            throw new ConfigurationError(`nodes.${hostname}`, `nodes.${hostname} must have a governors object`);
        }
        const governors: Record<string, GovernorConfig> = {};
        for (const [governor, params] of Object.entries(entry.governors)) {
            governors[governor] = parseGovernor(params, `nodes.${hostname}.governors.${governor}`);
        }
        const node: NodeEntry = {
            memory: optionalNumber(entry, "memory", `nodes.${hostname}.`),
            governors
        };
        nodes[hostname] = node;
    }
    return nodes;
}

/**
 * Narrows a parsed JSON document to an AppConfig, field by field.
 * Unknown keys are ignored.
 */
export function parseAppConfig(raw: unknown): AppConfig {
    if (!isRecord(raw)) {
        throw new ConfigurationError("config", "config must be a JSON object");
    }
    return {
        powerModel: optionalString(raw, "powerModel", ""),
        intervalMinutes: optionalNumber(raw, "intervalMinutes", ""),
        pue: optionalNumber(raw, "pue", ""),
        memoryCoefficient: optionalNumber(raw, "memoryCoefficient", ""),
        usageUnit: optionalChoice(raw, "usageUnit", ["percent", "fraction"], ""),
        cpuNormalisation: optionalChoice(raw, "cpuNormalisation", ["task", "host"], ""),
        applyPueToStatic: optionalBoolean(raw, "applyPueToStatic", ""),
        withReservedMemory: optionalBoolean(raw, "withReservedMemory", ""),
        carbonIntensity: parseIntensity(raw, "carbonIntensity", ""),
        marginalIntensity: parseIntensity(raw, "marginalIntensity", ""),
        water: parseResource(raw, "water"),
        land: parseResource(raw, "land"),
        nodes: raw.nodes === undefined ? undefined : parseNodeConfig(raw.nodes)
    };
}

export async function loadConfig(configPath: string, options: LoadConfigOptions = {}): Promise<AppConfig | undefined> {
    let raw: string;
    try {
        raw = await readFile(configPath, "utf-8");
    } catch (error) {
        const code = extractErrorCode(error);
        if (code === "ENOENT") {
            if (options.optional) return undefined;
            throw new Error(`[--config]: no such file ${configPath}`);
        }
        throw error;
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new Error(`[--config]: invalid JSON in ${configPath}`);
    }
    return parseAppConfig(parsed);
}
