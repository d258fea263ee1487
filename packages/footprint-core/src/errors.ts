export type FootprintErrorCode = "configuration" | "intensity_lookup" | "invariant";

/**
 * Base class for every error that aborts a footprint run.
 * A run is never partially computed: callers catch this, report, and stop.
 */
export class FootprintError extends Error {
    readonly code: FootprintErrorCode;

    constructor(code: FootprintErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/** Unknown model type, missing host / governor / parameter. */
export class ConfigurationError extends FootprintError {
    readonly key: string;

    constructor(key: string, message: string) {
        super("configuration", message);
        this.key = key;
    }
}

export class IntensityLookupError extends FootprintError {
    readonly category: string;
    readonly key: string;

    constructor(category: string, key: string) {
        super("intensity_lookup", `[${category}] no intensity value for window key ${key}`);
        this.category = category;
        this.key = key;
    }
}

/** Rejected at the boundary, before any binning happens. */
export class InvariantViolationError extends FootprintError {
    constructor(message: string) {
        super("invariant", message);
    }
}

export function isFootprintError(error: unknown): error is FootprintError {
    return error instanceof FootprintError;
}
