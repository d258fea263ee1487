/**
 * Per-host, per-governor power model parameters.
 * Only the fields needed by the selected model type have to be present.
 */
export interface GovernorConfig {
    minWatts?: number;
    maxWatts?: number;
    /** [coefficient, intercept] */
    linear?: readonly number[];
    tdpPerCore?: number;
    polynomial?: readonly number[];
    /** memory power draw, W/GB */
    memDraw?: number;
    systemCores?: number;
    cpuModel?: string;
    /** overrides the model's own idle wattage for static accounting */
    idleWatts?: number;
}

export interface NodeEntry {
    /** total host memory, bytes */
    memory?: number;
    governors: Record<string, GovernorConfig>;
}

export type NodeConfig = Record<string, NodeEntry>;
