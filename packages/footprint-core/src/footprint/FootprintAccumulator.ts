// src/footprint/FootprintAccumulator.ts

export interface SliceSample {
    realtimeMs: number;
    coreEnergyKWh: number;
    coreEnergyPueKWh: number;
    memoryEnergyKWh: number;
    memoryEnergyPueKWh: number;
    carbonG: number;
    marginalCarbonG: number;
    waterL?: number;
    landM2?: number;
}

export interface StaticSample {
    activeMs: number;
    energyKWh: number;
    memoryEnergyKWh: number;
    carbonG: number;
}

export interface HostAggregate {
    hostname: string;
    activeMs: number;
    staticEnergyKWh: number;
    staticMemoryEnergyKWh: number;
    staticCarbonG: number;
}

export interface FootprintTotals {
    taskRuntimeMs: number;
    coreEnergyKWh: number;
    coreEnergyPueKWh: number;
    memoryEnergyKWh: number;
    memoryEnergyPueKWh: number;
    /** task-attributed emissions only */
    taskCarbonG: number;
    marginalCarbonG: number;
    staticEnergyKWh: number;
    staticMemoryEnergyKWh: number;
    staticCarbonG: number;
    /** task + static emissions */
    carbonG: number;
    waterL?: number;
    landM2?: number;
}

export interface AccumulatorOptions {
    withWater: boolean;
    withLand: boolean;
}

/**
 * Running totals of a footprint run. Summation follows push order,
 * which the aggregator keeps fixed (windows ascending, hosts sorted).
 */
export class FootprintAccumulator {
    private readonly withWater: boolean;
    private readonly withLand: boolean;
    private finalized = false;

    private _taskRuntimeMs = 0;
    private _coreEnergyKWh = 0;
    private _coreEnergyPueKWh = 0;
    private _memoryEnergyKWh = 0;
    private _memoryEnergyPueKWh = 0;
    private _taskCarbonG = 0;
    private _marginalCarbonG = 0;
    private _waterL = 0;
    private _landM2 = 0;

    private readonly hosts = new Map<string, HostAggregate>();

    constructor(options: AccumulatorOptions) {
        this.withWater = options.withWater;
        this.withLand = options.withLand;
    }

    pushSlice(sample: SliceSample): void {
        this._taskRuntimeMs += sample.realtimeMs;
        this._coreEnergyKWh += sample.coreEnergyKWh;
        this._coreEnergyPueKWh += sample.coreEnergyPueKWh;
        this._memoryEnergyKWh += sample.memoryEnergyKWh;
        this._memoryEnergyPueKWh += sample.memoryEnergyPueKWh;
        this._taskCarbonG += sample.carbonG;
        this._marginalCarbonG += sample.marginalCarbonG;

        if (typeof sample.waterL === "number") {
            this._waterL += sample.waterL;
        }
        if (typeof sample.landM2 === "number") {
            this._landM2 += sample.landM2;
        }
    }

    pushStatic(hostname: string, sample: StaticSample): void {
        const host = this.hosts.get(hostname) ?? {
            hostname,
            activeMs: 0,
            staticEnergyKWh: 0,
            staticMemoryEnergyKWh: 0,
            staticCarbonG: 0
        };
        host.activeMs += sample.activeMs;
        host.staticEnergyKWh += sample.energyKWh;
        host.staticMemoryEnergyKWh += sample.memoryEnergyKWh;
        host.staticCarbonG += sample.carbonG;
        this.hosts.set(hostname, host);
    }

    /**
     * Closes the run and returns the totals.
     * Must be called once.
     */
    finalize(): { totals: FootprintTotals; hosts: Record<string, HostAggregate> } {
        if (this.finalized) {
            throw new Error("FootprintAccumulator.finalize() called twice");
        }
        this.finalized = true;

        const hosts: Record<string, HostAggregate> = {};
        let staticEnergyKWh = 0;
        let staticMemoryEnergyKWh = 0;
        let staticCarbonG = 0;

        for (const hostname of [...this.hosts.keys()].sort()) {
            const host = this.hosts.get(hostname);
            if (!host) continue;
            hosts[hostname] = { ...host };
            staticEnergyKWh += host.staticEnergyKWh;
            staticMemoryEnergyKWh += host.staticMemoryEnergyKWh;
            staticCarbonG += host.staticCarbonG;
        }

        return {
            totals: {
                taskRuntimeMs: this._taskRuntimeMs,
                coreEnergyKWh: this._coreEnergyKWh,
                coreEnergyPueKWh: this._coreEnergyPueKWh,
                memoryEnergyKWh: this._memoryEnergyKWh,
                memoryEnergyPueKWh: this._memoryEnergyPueKWh,
                taskCarbonG: this._taskCarbonG,
                marginalCarbonG: this._marginalCarbonG,
                staticEnergyKWh,
                staticMemoryEnergyKWh,
                staticCarbonG,
                carbonG: this._taskCarbonG + staticCarbonG,
                waterL: this.withWater ? this._waterL : undefined,
                landM2: this.withLand ? this._landM2 : undefined
            },
            hosts
        };
    }
}
