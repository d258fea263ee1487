import { IntensityLookupError, InvariantViolationError } from "../errors.js";
import { intensityKey } from "../timers/timing.js";

export type ImpactCategory = "carbon" | "marginal" | "water" | "land";

/** Constant factor, or a table keyed by MM/DD-HH:mm (UTC). */
export type Intensity =
    | { kind: "scalar"; value: number }
    | { kind: "table"; values: ReadonlyMap<string, number> };

export function scalarIntensity(value: number): Intensity {
    if (!Number.isFinite(value) || value < 0) {
        throw new InvariantViolationError(`intensity must be a finite number >= 0 (got ${value})`);
    }
    return { kind: "scalar", value };
}

export function tableIntensity(entries: Iterable<readonly [string, number]>): Intensity {
    const map = new Map<string, number>(entries);
    for (const [key, value] of map) {
        if (!Number.isFinite(value)) {
            throw new InvariantViolationError(`intensity table entry ${key} is not a finite number`);
        }
    }
    return { kind: "table", values: map };
}

/**
 * Exact-match intensity resolution for one impact category.
 * No interpolation: a table miss means trace and intensity data disagree on granularity.
 */
export class IntensityLookup {
    readonly category: ImpactCategory;
    private readonly intensity: Intensity;

    constructor(category: ImpactCategory, intensity: Intensity) {
        this.category = category;
        this.intensity = intensity;
    }

    valueAt(windowStart: number): number {
        if (this.intensity.kind === "scalar") {
            return this.intensity.value;
        }
        const key = intensityKey(windowStart);
        const value = this.intensity.values.get(key);
        if (value === undefined) {
            throw new IntensityLookupError(this.category, key);
        }
        return value;
    }

    describe(): string {
        return this.intensity.kind === "scalar"
            ? String(this.intensity.value)
            : `table(${this.intensity.values.size} entries)`;
    }
}
