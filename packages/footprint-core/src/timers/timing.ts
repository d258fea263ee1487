// Time base of the engine: epoch milliseconds, UTC civil time.
export const MS_PER_MINUTE = 60_000;
export const MS_PER_HOUR = 3_600_000;

export function msToHours(ms: number): number {
    return ms / MS_PER_HOUR;
}

export function minutesToMs(minutes: number): number {
    return Math.round(minutes * MS_PER_MINUTE);
}

/**
 * Rounds a timestamp to the nearest window boundary.
 * Exactly half a window rounds up.
 */
export function alignToWindow(ts: number, widthMs: number): number {
    const floor = Math.floor(ts / widthMs) * widthMs;
    return ts - floor >= widthMs / 2 ? floor + widthMs : floor;
}

function pad2(n: number): string {
    return String(n).padStart(2, "0");
}

/**
 * Composite key used by intensity tables: MM/DD-HH:mm (UTC).
 */
export function intensityKey(ts: number): string {
    const d = new Date(ts);
    return `${pad2(d.getUTCMonth() + 1)}/${pad2(d.getUTCDate())}-${pad2(d.getUTCHours())}:${pad2(d.getUTCMinutes())}`;
}
