export interface EnergyBreakdown {
    coreEnergyKWh: number;
    memoryEnergyKWh: number;
    coreEnergyPueKWh: number;
    memoryEnergyPueKWh: number;
}

export interface ImpactSplit {
    /** on-site draw x WUE|LUE, no PUE */
    onsite: number;
    /** facility draw (PUE applied) x offsite intensity */
    offsite: number;
    total: number;
    /** offsite intensity used */
    intensity: number;
}

export function applyPue(energy: { coreEnergyKWh: number; memoryEnergyKWh: number }, pue: number): EnergyBreakdown {
    return {
        coreEnergyKWh: energy.coreEnergyKWh,
        memoryEnergyKWh: energy.memoryEnergyKWh,
        coreEnergyPueKWh: energy.coreEnergyKWh * pue,
        memoryEnergyPueKWh: energy.memoryEnergyKWh * pue
    };
}

// grams CO2e = facility kWh x gCO2e/kWh
export function estimateCarbon(energy: EnergyBreakdown, intensity: number): number {
    return (energy.coreEnergyPueKWh + energy.memoryEnergyPueKWh) * intensity;
}

/** Water (L) or land (m²): onsite + offsite contributions. */
export function estimateResourceImpact(energy: EnergyBreakdown, efficiency: number, intensity: number): ImpactSplit {
    const onsite = (energy.coreEnergyKWh + energy.memoryEnergyKWh) * efficiency;
    const offsite = (energy.coreEnergyPueKWh + energy.memoryEnergyPueKWh) * intensity;
    return { onsite, offsite, total: onsite + offsite, intensity };
}
