import { TaskSlice } from "../model/task.js";

export interface Interval {
    start: number;
    end: number;
}

/**
 * Standard interval merge: sort by start, extend while the next start is <= current end.
 * Touching intervals ([0,10) and [10,20)) merge into one.
 */
export function mergeIntervals(intervals: readonly Interval[]): Interval[] {
    if (intervals.length === 0) return [];

    const sorted = [...intervals].sort((a, b) => a.start - b.start || a.end - b.end);
    const merged: Interval[] = [{ ...sorted[0] }];

    for (let i = 1; i < sorted.length; i++) {
        const current = merged[merged.length - 1];
        const next = sorted[i];
        if (next.start <= current.end) {
            if (next.end > current.end) current.end = next.end;
        } else {
            merged.push({ ...next });
        }
    }
    return merged;
}

export function totalDuration(intervals: readonly Interval[]): number {
    let total = 0;
    for (const interval of intervals) total += interval.end - interval.start;
    return total;
}

/**
 * Merged (non-overlapping) active time per host for the slices of one window.
 * Hosts are returned in sorted order.
 */
export function activeTimeByHost(slices: readonly TaskSlice[]): Map<string, number> {
    const byHost = new Map<string, Interval[]>();
    for (const slice of slices) {
        const host = slice.task.hostname;
        const list = byHost.get(host);
        const interval = { start: slice.start, end: slice.end };
        if (list) {
            list.push(interval);
        } else {
            byHost.set(host, [interval]);
        }
    }

    const result = new Map<string, number>();
    for (const host of [...byHost.keys()].sort()) {
        result.set(host, totalDuration(mergeIntervals(byHost.get(host) ?? [])));
    }
    return result;
}
