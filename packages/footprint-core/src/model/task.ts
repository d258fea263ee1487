import { InvariantViolationError } from "../errors.js";

/**
 * Canonical unit of work, as produced by an ingestion adapter.
 * start / end are epoch milliseconds, memory is in bytes.
 */
export interface Task {
    readonly id: string;
    readonly name: string;
    readonly start: number;
    readonly end: number;
    readonly cpuCount: number;
    readonly avgCpuUsage: number;
    readonly cpuModel: string;
    readonly memory: number;
    readonly hostname: string;
    readonly raplTimeseries?: string;
    readonly cpuUsageTimeseries?: string;
}

/**
 * A task restricted to one time window.
 * realtime is always end - start of the slice, never of the task.
 */
export interface TaskSlice {
    readonly task: Task;
    readonly start: number;
    readonly end: number;
    readonly realtime: number;
}

export function wholeSlice(task: Task): TaskSlice {
    return {
        task,
        start: task.start,
        end: task.end,
        realtime: task.end - task.start
    };
}

export function sliceTask(task: Task, start: number, end: number): TaskSlice {
    return { task, start, end, realtime: end - start };
}

export interface TaskValidationOptions {
    /** cpuCount must be positive when it is the normalisation reference */
    requireCpuCount?: boolean;
}

export function validateTasks(tasks: readonly Task[], options: TaskValidationOptions = {}): void {
    const seen = new Set<string>();

    for (const task of tasks) {
        const label = `task ${task.id || "<no id>"}`;

        if (!task.id) {
            throw new InvariantViolationError(`${label}: id must not be empty`);
        }
        if (seen.has(task.id)) {
            throw new InvariantViolationError(`${label}: duplicate id`);
        }
        seen.add(task.id);

        if (!Number.isFinite(task.start) || !Number.isFinite(task.end)) {
            throw new InvariantViolationError(`${label}: start and end must be finite timestamps`);
        }
        if (task.end <= task.start) {
            throw new InvariantViolationError(`${label}: end (${task.end}) must be > start (${task.start})`);
        }
        if (!Number.isFinite(task.avgCpuUsage) || task.avgCpuUsage < 0) {
            throw new InvariantViolationError(`${label}: avgCpuUsage must be >= 0`);
        }
        if (!Number.isFinite(task.memory) || task.memory < 0) {
            throw new InvariantViolationError(`${label}: memory must be >= 0`);
        }
        if (options.requireCpuCount && (!Number.isFinite(task.cpuCount) || task.cpuCount <= 0)) {
            throw new InvariantViolationError(`${label}: cpuCount must be > 0`);
        }
    }
}
