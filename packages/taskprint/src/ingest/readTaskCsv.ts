import type { Task } from "@taskprint/footprint-core";
import { CsvRow, SkippedRow, readCsvRows } from "./csv.js";

const REQUIRED_COLUMNS = ["id", "start", "end", "hostname"];

export interface TaskCsvResult {
    tasks: Task[];
    skipped: SkippedRow[];
}

function numberField(fields: Record<string, string>, column: string, fallback: number): number {
    const raw = fields[column];
    if (raw === undefined || raw === "") return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new Error(`invalid ${column} "${raw}"`);
    }
    return value;
}

function toTask({ fields }: CsvRow): Task {
    const id = fields.id ?? "";
    if (id === "") {
        throw new Error("missing id");
    }
    return {
        id,
        name: fields.name ?? "",
        start: numberField(fields, "start", Number.NaN),
        end: numberField(fields, "end", Number.NaN),
        cpuCount: numberField(fields, "cpu_count", 0),
        avgCpuUsage: numberField(fields, "avg_cpu_usage", 0),
        cpuModel: fields.cpu_model ?? "",
        memory: numberField(fields, "memory", 0),
        hostname: fields.hostname ?? "",
        raplTimeseries: fields.rapl_timeseries || undefined,
        cpuUsageTimeseries: fields.cpu_usage_timeseries || undefined
    };
}

/**
 * Reads a trace in the task CSV layout (start/end epoch ms, memory bytes).
 * Rows without an id or with an unparseable number are skipped and reported;
 * empty start or end is left to task validation.
 */
export async function readTaskCsv(filePath: string): Promise<TaskCsvResult> {
    const tasks: Task[] = [];
    const skipped: SkippedRow[] = [];

    for await (const row of readCsvRows(filePath, { required: REQUIRED_COLUMNS, onSkip: (s) => skipped.push(s) })) {
        try {
            tasks.push(toTask(row));
        } catch (error) {
            skipped.push({ line: row.line, reason: error instanceof Error ? error.message : String(error) });
        }
    }
    return { tasks, skipped };
}
