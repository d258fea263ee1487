import { InvariantViolationError } from "../errors.js";
import { Task, TaskSlice, sliceTask, wholeSlice } from "../model/task.js";
import { alignToWindow } from "../timers/timing.js";

export interface BinningOptions {
    log?: "silent" | "debug";
}

export interface TaskBinning {
    width: number;
    /** window start -> slices, ascending by window start, empty windows included */
    windows: Map<number, TaskSlice[]>;
    /** window start -> longest spill past the window end of a task starting in it */
    overheads: Map<number, number>;
    /** window starts whose overhead is > 0, ascending */
    overheadWindows: number[];
    workflowStart: number;
    workflowEnd: number;
}

type SliceKind = "inside" | "tail" | "head" | "span";

interface WindowSlice {
    kind: SliceKind;
    slice: TaskSlice;
}

/**
 * Restricts a task to [windowStart, windowStart + width).
 * Half-open: a task starting exactly on windowStart "starts inside",
 * a task ending exactly on the window end "ends inside".
 */
export function sliceForWindow(task: Task, windowStart: number, width: number): WindowSlice | null {
    const windowEnd = windowStart + width;

    if (task.end <= windowStart || task.start >= windowEnd) return null;

    const startsInside = task.start >= windowStart;
    const endsInside = task.end <= windowEnd;

    if (startsInside && endsInside) {
        return { kind: "inside", slice: wholeSlice(task) };
    }
    if (endsInside) {
        return { kind: "tail", slice: sliceTask(task, windowStart, task.end) };
    }
    if (startsInside) {
        return { kind: "head", slice: sliceTask(task, task.start, windowEnd) };
    }
    return { kind: "span", slice: sliceTask(task, windowStart, windowEnd) };
}

function emptyBinning(width: number): TaskBinning {
    return {
        width,
        windows: new Map(),
        overheads: new Map(),
        overheadWindows: [],
        workflowStart: 0,
        workflowEnd: 0
    };
}

/**
 * Groups tasks into fixed-width windows, splitting the ones that cross a boundary.
 *
 * The binned range starts one window before the aligned earliest start and ends
 * with the window starting at the aligned latest end, so every task is covered.
 */
export function binTasks(tasks: readonly Task[], widthMs: number, options: BinningOptions = {}): TaskBinning {
    const { log = "silent" } = options;

    if (!Number.isInteger(widthMs) || widthMs <= 0) {
        throw new InvariantViolationError(`window width must be a positive integer (got ${widthMs})`);
    }
    if (tasks.length === 0) return emptyBinning(widthMs);

    let workflowStart = Infinity;
    let workflowEnd = -Infinity;
    for (const task of tasks) {
        if (task.start < workflowStart) workflowStart = task.start;
        if (task.end > workflowEnd) workflowEnd = task.end;
    }

    const first = alignToWindow(workflowStart, widthMs) - widthMs;
    const last = alignToWindow(workflowEnd, widthMs);

    const windows = new Map<number, TaskSlice[]>();
    const overheads = new Map<number, number>();
    for (let i = first; i <= last; i += widthMs) {
        windows.set(i, []);
        overheads.set(i, 0);
    }

    for (const task of tasks) {
        const offset = Math.floor((task.start - first) / widthMs) * widthMs;

        for (let i = first + offset; i < task.end; i += widthMs) {
            const windowSlice = sliceForWindow(task, i, widthMs);
            if (!windowSlice) continue;

            const bucket = windows.get(i);
            if (!bucket) {
                throw new InvariantViolationError(`task ${task.id} falls outside the binned range at ${i}`);
            }
            bucket.push(windowSlice.slice);

            if (windowSlice.kind === "head") {
                const current = overheads.get(i) ?? 0;
                if (windowSlice.slice.realtime > current) {
                    overheads.set(i, windowSlice.slice.realtime);
                }
            }
        }
    }

    const overheadWindows = [...overheads.entries()]
        .filter(([, overhead]) => overhead > 0)
        .map(([windowStart]) => windowStart);

    if (log === "debug") {
        for (const [windowStart, slices] of windows) {
            console.debug(
                [
                    `window=${new Date(windowStart).toISOString()}`,
                    `slices=${slices.length}`,
                    `overhead=${overheads.get(windowStart) ?? 0}ms`
                ].join(" | ")
            );
        }
    }

    return { width: widthMs, windows, overheads, overheadWindows, workflowStart, workflowEnd };
}

/** Sum of slice durations per task id, across all windows. */
export function sliceDurationsById(binning: TaskBinning): Map<string, number> {
    const totals = new Map<string, number>();
    for (const slices of binning.windows.values()) {
        for (const slice of slices) {
            totals.set(slice.task.id, (totals.get(slice.task.id) ?? 0) + slice.realtime);
        }
    }
    return totals;
}
