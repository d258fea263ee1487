import { ConfigurationError } from "../errors.js";
import { Task, TaskSlice, validateTasks } from "../model/task.js";
import { TaskBinning, binTasks } from "../binning/TaskIntervalBinner.js";
import { activeTimeByHost } from "../analysis/ActiveIntervalMerger.js";
import { ImpactSplit, applyPue, estimateCarbon, estimateResourceImpact } from "../analysis/estimateImpact.js";
import { HostProfile, PowerCurve, PowerModelResolver, parseModelName } from "../power/PowerModelResolver.js";
import { NodeConfig } from "../power/nodeConfig.js";
import { ResolvedRunOptions, RunOptions, validateRunOptions } from "../config/runOptions.js";
import { estimateSliceEnergy, memoryEnergyKWh, staticEnergyKWh } from "./estimateEnergy.js";
import { FootprintAccumulator, FootprintTotals, HostAggregate } from "./FootprintAccumulator.js";
import { msToHours } from "../timers/timing.js";

export interface TaskFootprint {
    slice: TaskSlice;
    windowStart: number;
    utilisation: number;
    powerWatts: number;
    coreEnergyKWh: number;
    coreEnergyPueKWh: number;
    memoryEnergyKWh: number;
    memoryEnergyPueKWh: number;
    /** gCO2e at the window's average intensity */
    averageCo2e: number;
    /** gCO2e at the window's marginal intensity, 0 without a marginal source */
    marginalCo2e: number;
    embodiedCo2e: 0;
    avgCi: number;
    marginalCi?: number;
    water?: ImpactSplit;
    land?: ImpactSplit;
}

export interface FootprintResult {
    options: {
        windowMs: number;
        powerModel: string;
        pue: number;
        withWater: boolean;
        withLand: boolean;
        withReservedMemory: boolean;
        applyPueToStatic: boolean;
    };
    totals: FootprintTotals;
    staticEnergyByHost: Record<string, HostAggregate>;
    records: TaskFootprint[];
    workflowStart: number;
    workflowEnd: number;
    overheads: Map<number, number>;
    overheadWindows: number[];
}

interface WindowFactors {
    carbon: number;
    marginal?: number;
    water?: number;
    land?: number;
}

interface ResolvedHost {
    curve: PowerCurve;
    profile: HostProfile;
}

interface WindowPlan {
    windowStart: number;
    slices: TaskSlice[];
    factors: WindowFactors;
}

/**
 * Composes binning, power models, intensity lookups and active-interval merging
 * into per-slice footprints and run totals.
 *
 * Every lookup (intensity per window, curve and host profile per host) is
 * resolved before the first slice is computed, so a run either fails with no
 * records or completes.
 */
export class FootprintAggregator {
    private readonly options: ResolvedRunOptions;
    private readonly resolver: PowerModelResolver;

    constructor(nodes: NodeConfig, options: RunOptions) {
        this.options = validateRunOptions(options);
        this.resolver = new PowerModelResolver(nodes, {
            memoryCoefficient: this.options.memoryCoefficient,
            log: this.options.log
        });
    }

    get runOptions(): ResolvedRunOptions {
        return this.options;
    }

    run(tasks: readonly Task[]): FootprintResult {
        // only a curve divides by cpuCount; baseline reads raw cores busy
        const evaluatesCurve = parseModelName(this.options.powerModel).modelType !== "baseline";
        validateTasks(tasks, { requireCpuCount: this.options.cpuNormalisation === "task" && evaluatesCurve });
        const binning = binTasks(tasks, this.options.windowMs, { log: this.options.log });
        return this.aggregate(binning);
    }

    aggregate(binning: TaskBinning): FootprintResult {
        const opts = this.options;
        const plans = this.plan(binning);
        const hosts = this.resolveHosts(plans);

        const accumulator = new FootprintAccumulator({ withWater: opts.withWater, withLand: opts.withLand });
        const records: TaskFootprint[] = [];

        for (const { windowStart, slices, factors } of plans) {
            for (const slice of slices) {
                const record = this.computeSlice(slice, windowStart, factors, hosts);
                records.push(record);
                accumulator.pushSlice({
                    realtimeMs: slice.realtime,
                    coreEnergyKWh: record.coreEnergyKWh,
                    coreEnergyPueKWh: record.coreEnergyPueKWh,
                    memoryEnergyKWh: record.memoryEnergyKWh,
                    memoryEnergyPueKWh: record.memoryEnergyPueKWh,
                    carbonG: record.averageCo2e,
                    marginalCarbonG: record.marginalCo2e,
                    waterL: record.water?.total,
                    landM2: record.land?.total
                });
            }

            for (const [hostname, activeMs] of activeTimeByHost(slices)) {
                const host = hosts.get(hostname);
                if (!host) continue;
                const activeHours = msToHours(activeMs);
                const staticPue = opts.applyPueToStatic ? opts.pue : 1;

                const energyKWh = staticEnergyKWh(activeMs, host.curve.baselineWatts) * staticPue;
                const staticMemoryKWh = opts.withReservedMemory
                    ? memoryEnergyKWh(host.profile.memory, host.profile.memoryCoefficient, activeHours) * staticPue
                    : 0;

                accumulator.pushStatic(hostname, {
                    activeMs,
                    energyKWh,
                    memoryEnergyKWh: staticMemoryKWh,
                    carbonG: (energyKWh + staticMemoryKWh) * factors.carbon
                });
            }

            if (opts.log === "debug") {
                console.debug(
                    [
                        `window=${new Date(windowStart).toISOString()}`,
                        `slices=${slices.length}`,
                        `ci=${factors.carbon}`
                    ].join(" | ")
                );
            }
        }

        const { totals, hosts: staticEnergyByHost } = accumulator.finalize();

        return {
            options: {
                windowMs: opts.windowMs,
                powerModel: opts.powerModel,
                pue: opts.pue,
                withWater: opts.withWater,
                withLand: opts.withLand,
                withReservedMemory: opts.withReservedMemory,
                applyPueToStatic: opts.applyPueToStatic
            },
            totals,
            staticEnergyByHost,
            records,
            workflowStart: binning.workflowStart,
            workflowEnd: binning.workflowEnd,
            overheads: binning.overheads,
            overheadWindows: binning.overheadWindows
        };
    }

    private plan(binning: TaskBinning): WindowPlan[] {
        const { carbon, marginal, water, land } = this.options;
        const plans: WindowPlan[] = [];

        const windowStarts = [...binning.windows.keys()].sort((a, b) => a - b);
        for (const windowStart of windowStarts) {
            const slices = binning.windows.get(windowStart) ?? [];
            if (slices.length === 0) continue;

            plans.push({
                windowStart,
                slices,
                factors: {
                    carbon: carbon.valueAt(windowStart),
                    marginal: marginal?.valueAt(windowStart),
                    water: water?.lookup.valueAt(windowStart),
                    land: land?.lookup.valueAt(windowStart)
                }
            });
        }
        return plans;
    }

    private resolveHosts(plans: readonly WindowPlan[]): Map<string, ResolvedHost> {
        const { powerModel, withReservedMemory, cpuNormalisation } = this.options;
        const hosts = new Map<string, ResolvedHost>();

        for (const { slices } of plans) {
            for (const { task } of slices) {
                if (hosts.has(task.hostname)) continue;

                const curve = this.resolver.resolve(task.hostname, powerModel);
                const profile = this.resolver.hostProfile(task.hostname, powerModel);
                if (withReservedMemory && profile.memory <= 0) {
                    throw new ConfigurationError(
                        `${task.hostname}.memory`,
                        `host "${task.hostname}" needs a total memory size for reserved memory accounting`
                    );
                }
                if (cpuNormalisation === "host" && curve.modelType !== "baseline" && !profile.systemCores) {
                    throw new ConfigurationError(
                        `${task.hostname}.systemCores`,
                        `host "${task.hostname}" needs systemCores for host cpu normalisation`
                    );
                }
                hosts.set(task.hostname, { curve, profile });
            }
        }
        return hosts;
    }

    private computeSlice(
        slice: TaskSlice,
        windowStart: number,
        factors: WindowFactors,
        hosts: ReadonlyMap<string, ResolvedHost>
    ): TaskFootprint {
        const host = hosts.get(slice.task.hostname);
        if (!host) {
            throw new ConfigurationError(slice.task.hostname, `host "${slice.task.hostname}" was not resolved`);
        }

        const sliceEnergy = estimateSliceEnergy(slice, host.curve, host.profile, this.options);
        const energy = applyPue(sliceEnergy, this.options.pue);
        const { water, land } = this.options;

        return {
            slice,
            windowStart,
            utilisation: sliceEnergy.utilisation,
            powerWatts: sliceEnergy.powerWatts,
            ...energy,
            averageCo2e: estimateCarbon(energy, factors.carbon),
            marginalCo2e: factors.marginal === undefined ? 0 : estimateCarbon(energy, factors.marginal),
            embodiedCo2e: 0,
            avgCi: factors.carbon,
            marginalCi: factors.marginal,
            water: water && factors.water !== undefined
                ? estimateResourceImpact(energy, water.efficiency, factors.water)
                : undefined,
            land: land && factors.land !== undefined
                ? estimateResourceImpact(energy, land.efficiency, factors.land)
                : undefined
        };
    }
}

/** One-shot helper: validate, bin and aggregate. */
export function computeFootprint(tasks: readonly Task[], nodes: NodeConfig, options: RunOptions): FootprintResult {
    return new FootprintAggregator(nodes, options).run(tasks);
}
