import { ConfigurationError } from "../errors.js";
import { CurveFn, fittedLinearCurve, minMaxLinearCurve, polynomialCurve } from "./powerCurves.js";
import { GovernorConfig, NodeConfig } from "./nodeConfig.js";

export const POWER_MODEL_TYPES = ["minmax", "linear", "baseline", "polynomial"] as const;
export type PowerModelType = typeof POWER_MODEL_TYPES[number];

export const DEFAULT_MEMORY_POWER_DRAW = 0.392; // W/GB

interface CurveBase {
    readonly governor: string;
    /** idle wattage drawn while the host is active, used for static energy */
    readonly baselineWatts: number;
}

export interface EvaluatedCurve extends CurveBase {
    readonly modelType: "minmax" | "linear" | "polynomial";
    evaluate: CurveFn;
}

/** TDP-per-core model: energy follows raw utilisation, no curve. */
export interface BaselineCurve extends CurveBase {
    readonly modelType: "baseline";
    readonly tdpPerCore: number;
}

export type PowerCurve = EvaluatedCurve | BaselineCurve;

export interface HostProfile {
    hostname: string;
    /** bytes, 0 when not configured */
    memory: number;
    /** W/GB */
    memoryCoefficient: number;
    systemCores?: number;
    cpuModel?: string;
}

export interface PowerModelResolverOptions {
    /** W/GB used when a governor entry has no memDraw */
    memoryCoefficient?: number;
    log?: "silent" | "debug";
}

export interface ParsedModelName {
    governor: string;
    modelType: PowerModelType;
}

function isPowerModelType(value: string): value is PowerModelType {
    return POWER_MODEL_TYPES.some((t) => t === value);
}

/**
 * "<governor>_<modeltype>[_...]" -> { governor, modelType }.
 * Trailing segments are ignored.
 */
export function parseModelName(modelName: string): ParsedModelName {
    const [governor = "", modelType = ""] = modelName.split("_");
    if (!governor || !modelType) {
        throw new ConfigurationError(modelName, `invalid power model name "${modelName}": expected <governor>_<modeltype>`);
    }
    if (!isPowerModelType(modelType)) {
        throw new ConfigurationError(
            modelName,
            `unknown power model type "${modelType}" in "${modelName}" (supported: ${POWER_MODEL_TYPES.join(", ")})`
        );
    }
    return { governor, modelType };
}

function requireNumber(value: number | undefined, key: string): number {
    if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new ConfigurationError(key, `missing or invalid power model parameter ${key}`);
    }
    return value;
}

function requireVector(value: readonly number[] | undefined, key: string, minLength: number): number[] {
    if (!Array.isArray(value) || value.length < minLength) {
        throw new ConfigurationError(key, `missing or invalid power model parameter ${key}`);
    }
    return value.map((v, i) => requireNumber(v, `${key}[${i}]`));
}

function buildCurve(governor: string, modelType: PowerModelType, entry: GovernorConfig, keyPrefix: string): PowerCurve {
    const idleOverride = entry.idleWatts === undefined ? undefined : requireNumber(entry.idleWatts, `${keyPrefix}.idleWatts`);

    switch (modelType) {
        case "minmax": {
            const minWatts = requireNumber(entry.minWatts, `${keyPrefix}.minWatts`);
            const maxWatts = requireNumber(entry.maxWatts, `${keyPrefix}.maxWatts`);
            if (maxWatts < minWatts) {
                throw new ConfigurationError(`${keyPrefix}.maxWatts`, `${keyPrefix}: maxWatts must be >= minWatts`);
            }
            return {
                governor,
                modelType,
                baselineWatts: idleOverride ?? minWatts,
                evaluate: minMaxLinearCurve(minWatts, maxWatts)
            };
        }
        case "linear": {
            const [coefficient, intercept] = requireVector(entry.linear, `${keyPrefix}.linear`, 2);
            return {
                governor,
                modelType,
                baselineWatts: idleOverride ?? intercept,
                evaluate: fittedLinearCurve(coefficient, intercept)
            };
        }
        case "polynomial": {
            const coefficients = requireVector(entry.polynomial, `${keyPrefix}.polynomial`, 1);
            const evaluate = polynomialCurve(coefficients);
            return {
                governor,
                modelType,
                baselineWatts: idleOverride ?? evaluate(0),
                evaluate
            };
        }
        case "baseline": {
            const tdpPerCore = requireNumber(entry.tdpPerCore, `${keyPrefix}.tdpPerCore`);
            return {
                governor,
                modelType,
                baselineWatts: idleOverride ?? 0,
                tdpPerCore
            };
        }
    }
}

/**
 * Resolves (host, model name) pairs against an explicit node configuration.
 * Results are memoised per pair; every miss is a ConfigurationError.
 */
export class PowerModelResolver {
    private readonly nodes: NodeConfig;
    private readonly defaultMemoryCoefficient: number;
    private readonly log: "silent" | "debug";
    private readonly curves = new Map<string, PowerCurve>();

    constructor(nodes: NodeConfig, options: PowerModelResolverOptions = {}) {
        const { memoryCoefficient = DEFAULT_MEMORY_POWER_DRAW, log = "silent" } = options;
        this.nodes = nodes;
        this.defaultMemoryCoefficient = memoryCoefficient;
        this.log = log;
    }

    resolve(hostname: string, modelName: string): PowerCurve {
        const cacheKey = `${hostname}\u0000${modelName}`;
        const cached = this.curves.get(cacheKey);
        if (cached) return cached;

        const { governor, modelType } = parseModelName(modelName);
        const entry = this.governorEntry(hostname, governor);
        const curve = buildCurve(governor, modelType, entry, `${hostname}.${governor}`);

        if (this.log === "debug") {
            console.debug(`Node ${hostname} with power model ${modelName} selected (baseline=${curve.baselineWatts}W)`);
        }

        this.curves.set(cacheKey, curve);
        return curve;
    }

    hostProfile(hostname: string, modelName: string): HostProfile {
        const { governor } = parseModelName(modelName);
        const node = this.node(hostname);
        const entry = this.governorEntry(hostname, governor);

        const memory = node.memory === undefined ? 0 : requireNumber(node.memory, `${hostname}.memory`);
        const memoryCoefficient = entry.memDraw === undefined
            ? this.defaultMemoryCoefficient
            : requireNumber(entry.memDraw, `${hostname}.${governor}.memDraw`);
        const systemCores = entry.systemCores === undefined
            ? undefined
            : requireNumber(entry.systemCores, `${hostname}.${governor}.systemCores`);

        return {
            hostname,
            memory,
            memoryCoefficient,
            systemCores,
            cpuModel: entry.cpuModel
        };
    }

    private node(hostname: string) {
        if (!Object.hasOwn(this.nodes, hostname)) {
            throw new ConfigurationError(hostname, `no node configuration for host "${hostname}"`);
        }
        return this.nodes[hostname];
    }

    private governorEntry(hostname: string, governor: string): GovernorConfig {
        const node = this.node(hostname);
        if (!Object.hasOwn(node.governors, governor)) {
            throw new ConfigurationError(
                `${hostname}.${governor}`,
                `no governor "${governor}" configured for host "${hostname}"`
            );
        }
        return node.governors[governor];
    }
}
