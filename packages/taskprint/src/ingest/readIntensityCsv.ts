import path from "node:path";
import { ConfigurationError, scalarIntensity, tableIntensity } from "@taskprint/footprint-core";
import type { Intensity } from "@taskprint/footprint-core";
import { SkippedRow, readCsvRows } from "./csv.js";

export interface IntensityCsvResult {
    intensity: Intensity;
    skipped: SkippedRow[];
}

export interface ResolveIntensityOptions {
    /** CSV paths are rejected when false (HTTP requests) */
    allowFiles?: boolean;
    onSkip?: (filePath: string, skipped: readonly SkippedRow[]) => void;
}

/**
 * date (YYYY-MM-DD) + start (HH:mm) -> MM/DD-HH:mm.
 * Returns undefined when either part is malformed.
 */
export function toIntensityKey(date: string, start: string): string | undefined {
    const dateMatch = /^\d{4}-(\d{1,2})-(\d{1,2})$/.exec(date);
    const timeMatch = /^(\d{1,2}):(\d{2})$/.exec(start);
    if (!dateMatch || !timeMatch) return undefined;

    const [, month, day] = dateMatch;
    const [, hour, minute] = timeMatch;
    return `${month.padStart(2, "0")}/${day.padStart(2, "0")}-${hour.padStart(2, "0")}:${minute}`;
}

/**
 * Reads an intensity time series with date,start,actual columns.
 * Rows with a malformed timestamp or a non-numeric value are skipped.
 */
export async function readIntensityCsv(filePath: string): Promise<IntensityCsvResult> {
    const entries: [string, number][] = [];
    const skipped: SkippedRow[] = [];

    const rows = readCsvRows(filePath, { required: ["date", "start", "actual"], onSkip: (s) => skipped.push(s) });
    for await (const { line, fields } of rows) {
        const key = toIntensityKey(fields.date, fields.start);
        if (key === undefined) {
            skipped.push({ line, reason: `invalid timestamp "${fields.date} ${fields.start}"` });
            continue;
        }
        const value = fields.actual === "" ? Number.NaN : Number(fields.actual);
        if (!Number.isFinite(value)) {
            skipped.push({ line, reason: `invalid intensity value "${fields.actual}"` });
            continue;
        }
        entries.push([key, value]);
    }

    return { intensity: tableIntensity(entries), skipped };
}

/**
 * Turns a configured intensity into the engine's tagged form.
 * Numeric strings (as given on the command line) are scalars, any other
 * string is a CSV path resolved against baseDir.
 */
export async function resolveIntensity(
    value: number | string | Record<string, number>,
    baseDir: string,
    options: ResolveIntensityOptions = {}
): Promise<Intensity> {
    if (typeof value === "number") {
        return scalarIntensity(value);
    }
    if (typeof value === "object") {
        return tableIntensity(Object.entries(value));
    }

    const trimmed = value.trim();
    if (trimmed !== "" && Number.isFinite(Number(trimmed))) {
        return scalarIntensity(Number(trimmed));
    }
    if (options.allowFiles === false) {
        throw new ConfigurationError(value, `intensity file "${value}" cannot be read here, send a number or a table`);
    }

    const filePath = path.resolve(baseDir, trimmed);
    const { intensity, skipped } = await readIntensityCsv(filePath);
    if (skipped.length > 0) {
        options.onSkip?.(filePath, skipped);
    }
    return intensity;
}
