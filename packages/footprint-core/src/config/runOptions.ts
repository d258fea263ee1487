import { InvariantViolationError } from "../errors.js";
import { Intensity, IntensityLookup } from "../intensity/IntensityLookup.js";
import { DEFAULT_MEMORY_POWER_DRAW, parseModelName } from "../power/PowerModelResolver.js";

export type UsageUnit = "percent" | "fraction";
export type CpuNormalisation = "task" | "host";

export const DEFAULT_PUE = 1.0;

export interface RunOptions {
    windowMs: number;
    /** "<governor>_<modeltype>" */
    powerModel: string;
    pue?: number;
    /** W/GB, used when the host's governor entry has no memDraw */
    memoryCoefficient?: number;
    usageUnit?: UsageUnit;
    cpuNormalisation?: CpuNormalisation;
    applyPueToStatic?: boolean;
    withReservedMemory?: boolean;

    carbonIntensity: Intensity;
    marginalIntensity?: Intensity;

    /** offsite water factor (EWIF), L/kWh; requires wue */
    waterIntensity?: Intensity;
    /** onsite water usage effectiveness, L/kWh */
    wue?: number;
    /** offsite land factor (ELIF), m²/kWh; requires lue */
    landIntensity?: Intensity;
    /** onsite land usage effectiveness, m²/kWh */
    lue?: number;

    log?: "silent" | "debug";
}

export interface EfficiencySource {
    lookup: IntensityLookup;
    /** onsite coefficient (WUE or LUE) */
    efficiency: number;
}

export interface ResolvedRunOptions {
    windowMs: number;
    powerModel: string;
    pue: number;
    memoryCoefficient: number;
    usageUnit: UsageUnit;
    cpuNormalisation: CpuNormalisation;
    applyPueToStatic: boolean;
    withReservedMemory: boolean;
    withWater: boolean;
    withLand: boolean;
    carbon: IntensityLookup;
    marginal?: IntensityLookup;
    water?: EfficiencySource;
    land?: EfficiencySource;
    log: "silent" | "debug";
}

function requirePositive(value: number, name: string): number {
    if (!Number.isFinite(value) || value <= 0) {
        throw new InvariantViolationError(`${name} must be a positive number (got ${value})`);
    }
    return value;
}

function pairEfficiency(
    category: "water" | "land",
    intensity: Intensity | undefined,
    efficiency: number | undefined,
    coefficientName: string
): EfficiencySource | undefined {
    if (intensity === undefined && efficiency === undefined) return undefined;

    if (intensity === undefined) {
        throw new InvariantViolationError(`${coefficientName} supplied without a ${category} intensity`);
    }
    if (efficiency === undefined) {
        throw new InvariantViolationError(`${category} intensity supplied without its ${coefficientName} coefficient`);
    }
    if (!Number.isFinite(efficiency) || efficiency < 0) {
        throw new InvariantViolationError(`${coefficientName} must be >= 0 (got ${efficiency})`);
    }
    return { lookup: new IntensityLookup(category, intensity), efficiency };
}

/**
 * Boundary check of a run's options. Everything that can be rejected without
 * looking at the tasks is rejected here.
 */
export function validateRunOptions(options: RunOptions): ResolvedRunOptions {
    const windowMs = requirePositive(options.windowMs, "window width");
    const pue = options.pue ?? DEFAULT_PUE;
    if (!Number.isFinite(pue) || pue < 1) {
        throw new InvariantViolationError(`pue must be >= 1 (got ${pue})`);
    }
    const memoryCoefficient = options.memoryCoefficient ?? DEFAULT_MEMORY_POWER_DRAW;
    if (!Number.isFinite(memoryCoefficient) || memoryCoefficient < 0) {
        throw new InvariantViolationError(`memory coefficient must be >= 0 (got ${memoryCoefficient})`);
    }

    // fails fast on an unknown model type, before any task is looked at
    parseModelName(options.powerModel);

    const water = pairEfficiency("water", options.waterIntensity, options.wue, "WUE");
    const land = pairEfficiency("land", options.landIntensity, options.lue, "LUE");

    return {
        windowMs,
        powerModel: options.powerModel,
        pue,
        memoryCoefficient,
        usageUnit: options.usageUnit ?? "percent",
        cpuNormalisation: options.cpuNormalisation ?? "task",
        applyPueToStatic: options.applyPueToStatic ?? false,
        withReservedMemory: options.withReservedMemory ?? false,
        withWater: water !== undefined,
        withLand: land !== undefined,
        carbon: new IntensityLookup("carbon", options.carbonIntensity),
        marginal: options.marginalIntensity ? new IntensityLookup("marginal", options.marginalIntensity) : undefined,
        water,
        land,
        log: options.log ?? "silent"
    };
}
