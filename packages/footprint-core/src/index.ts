export { FootprintError, ConfigurationError, IntensityLookupError, InvariantViolationError, isFootprintError } from "./errors.js";
export type { FootprintErrorCode } from "./errors.js";

export { validateTasks, wholeSlice, sliceTask } from "./model/task.js";
export type { Task, TaskSlice, TaskValidationOptions } from "./model/task.js";

export { MS_PER_HOUR, MS_PER_MINUTE, alignToWindow, intensityKey, minutesToMs, msToHours } from "./timers/timing.js";

export { binTasks, sliceForWindow, sliceDurationsById } from "./binning/TaskIntervalBinner.js";
export type { BinningOptions, TaskBinning } from "./binning/TaskIntervalBinner.js";

export { minMaxLinearCurve, fittedLinearCurve, polynomialCurve } from "./power/powerCurves.js";
export type { CurveFn } from "./power/powerCurves.js";
export { PowerModelResolver, parseModelName, POWER_MODEL_TYPES, DEFAULT_MEMORY_POWER_DRAW } from "./power/PowerModelResolver.js";
export type { PowerCurve, PowerModelType, HostProfile, PowerModelResolverOptions, BaselineCurve, EvaluatedCurve } from "./power/PowerModelResolver.js";
export type { NodeConfig, NodeEntry, GovernorConfig } from "./power/nodeConfig.js";

export { IntensityLookup, scalarIntensity, tableIntensity } from "./intensity/IntensityLookup.js";
export type { Intensity, ImpactCategory } from "./intensity/IntensityLookup.js";

export { mergeIntervals, totalDuration, activeTimeByHost } from "./analysis/ActiveIntervalMerger.js";
export type { Interval } from "./analysis/ActiveIntervalMerger.js";
export { applyPue, estimateCarbon, estimateResourceImpact } from "./analysis/estimateImpact.js";
export type { EnergyBreakdown, ImpactSplit } from "./analysis/estimateImpact.js";

export { validateRunOptions, DEFAULT_PUE } from "./config/runOptions.js";
export type { RunOptions, ResolvedRunOptions, UsageUnit, CpuNormalisation } from "./config/runOptions.js";

export { cpuFraction, estimateSliceEnergy, staticEnergyKWh } from "./footprint/estimateEnergy.js";
export { FootprintAccumulator } from "./footprint/FootprintAccumulator.js";
export type { FootprintTotals, HostAggregate } from "./footprint/FootprintAccumulator.js";
export { FootprintAggregator, computeFootprint } from "./footprint/FootprintAggregator.js";
export type { FootprintResult, TaskFootprint } from "./footprint/FootprintAggregator.js";
