import { ConfigurationError } from "../errors.js";
import { TaskSlice } from "../model/task.js";
import { HostProfile, PowerCurve } from "../power/PowerModelResolver.js";
import { CpuNormalisation, UsageUnit } from "../config/runOptions.js";
import { msToHours } from "../timers/timing.js";

const BYTES_PER_GIB = 1_073_741_824;
const KW_PER_W = 0.001;

export interface UsageConvention {
    usageUnit: UsageUnit;
    cpuNormalisation: CpuNormalisation;
}

export interface SliceEnergy {
    /** utilisation fraction fed to the curve, or cores busy for the baseline model */
    utilisation: number;
    powerWatts: number;
    coreEnergyKWh: number;
    memoryEnergyKWh: number;
}

function usageScale(unit: UsageUnit): number {
    return unit === "percent" ? 100 : 1;
}

/**
 * avgCpuUsage / (scale x reference cores), not clamped: a task that ran more
 * threads than it was given reports a fraction above 1.
 * The reference is the task's own cpuCount, or the host's systemCores.
 */
export function cpuFraction(slice: TaskSlice, host: HostProfile, convention: UsageConvention): number {
    const { task } = slice;
    let reference: number;
    if (convention.cpuNormalisation === "host") {
        if (host.systemCores === undefined || host.systemCores <= 0) {
            throw new ConfigurationError(
                `${host.hostname}.systemCores`,
                `host "${host.hostname}" needs systemCores for host cpu normalisation`
            );
        }
        reference = host.systemCores;
    } else {
        reference = task.cpuCount;
    }
    return task.avgCpuUsage / (usageScale(convention.usageUnit) * reference);
}

export function corePowerWatts(slice: TaskSlice, curve: PowerCurve, host: HostProfile, convention: UsageConvention) {
    if (curve.modelType === "baseline") {
        // raw utilisation: cores busy x TDP per core
        const coresBusy = slice.task.avgCpuUsage / usageScale(convention.usageUnit);
        return { utilisation: coresBusy, powerWatts: curve.tdpPerCore * coresBusy };
    }
    const fraction = cpuFraction(slice, host, convention);
    return { utilisation: fraction, powerWatts: curve.evaluate(fraction) };
}

export function memoryEnergyKWh(memoryBytes: number, memoryCoefficient: number, durationHours: number): number {
    return (memoryBytes / BYTES_PER_GIB) * memoryCoefficient * durationHours * KW_PER_W;
}

/** Core and memory energy of one slice, without PUE. */
export function estimateSliceEnergy(
    slice: TaskSlice,
    curve: PowerCurve,
    host: HostProfile,
    convention: UsageConvention
): SliceEnergy {
    const durationHours = msToHours(slice.realtime);
    const { utilisation, powerWatts } = corePowerWatts(slice, curve, host, convention);

    return {
        utilisation,
        powerWatts,
        coreEnergyKWh: durationHours * powerWatts * KW_PER_W,
        memoryEnergyKWh: memoryEnergyKWh(slice.task.memory, host.memoryCoefficient, durationHours)
    };
}

/** Idle draw of a host over its merged active time. */
export function staticEnergyKWh(activeMs: number, baselineWatts: number): number {
    return msToHours(activeMs) * baselineWatts * KW_PER_W;
}
