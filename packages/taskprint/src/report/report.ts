import { writeFile } from "node:fs/promises";
import path from "node:path";
import { ensureDirectory } from "@taskprint/shared";
import type { FootprintResult, FootprintTotals, HostAggregate, TaskFootprint } from "@taskprint/footprint-core";
import { escapeCsvField } from "../ingest/csv.js";

export const TRACE_CSV_HEADER = [
    "id", "name", "hostname", "cpu_count", "avg_cpu_usage", "cpu_model", "memory",
    "window_start", "start", "end", "realtime_ms", "utilisation", "power_w",
    "core_energy_kwh", "memory_energy_kwh", "core_energy_pue_kwh", "memory_energy_pue_kwh",
    "average_co2e", "marginal_co2e", "embodied_co2e", "avg_ci", "marginal_ci",
    "water_l", "water_intensity", "land_m2", "land_intensity"
] as const;

/** Whole-task figures, the sum of a task's slices. */
export interface TaskSummary {
    id: string;
    name: string;
    hostname: string;
    realtimeMs: number;
    coreEnergyKWh: number;
    memoryEnergyKWh: number;
    energyPueKWh: number;
    co2eG: number;
    marginalCo2eG: number;
    waterL?: number;
    landM2?: number;
    /** intensity of each window the task ran in, joined with | */
    avgCi: string;
}

export interface EnergySplit {
    cpuPercent: number;
    memoryPercent: number;
    staticPercent: number;
}

export interface FootprintSummary {
    options: FootprintResult["options"];
    workflow: {
        start: string | null;
        end: string | null;
        durationMs: number;
    };
    totals: FootprintTotals;
    energySplit: EnergySplit;
    staticEnergyByHost: Record<string, HostAggregate>;
    overheads: { windowStart: string; overheadMs: number }[];
    tasks: TaskSummary[];
}

export interface WrittenOutputs {
    tracePath: string;
    summaryPath: string;
}

/** Per-slice records folded into per-task rows, ordered by first appearance. */
export function mergeSlicesByTask(records: readonly TaskFootprint[]): TaskSummary[] {
    const byId = new Map<string, TaskSummary>();

    for (const record of records) {
        const { task, realtime } = record.slice;
        const present = byId.get(task.id);

        if (!present) {
            byId.set(task.id, {
                id: task.id,
                name: task.name,
                hostname: task.hostname,
                realtimeMs: realtime,
                coreEnergyKWh: record.coreEnergyKWh,
                memoryEnergyKWh: record.memoryEnergyKWh,
                energyPueKWh: record.coreEnergyPueKWh + record.memoryEnergyPueKWh,
                co2eG: record.averageCo2e,
                marginalCo2eG: record.marginalCo2e,
                waterL: record.water?.total,
                landM2: record.land?.total,
                avgCi: String(record.avgCi)
            });
            continue;
        }

        present.realtimeMs += realtime;
        present.coreEnergyKWh += record.coreEnergyKWh;
        present.memoryEnergyKWh += record.memoryEnergyKWh;
        present.energyPueKWh += record.coreEnergyPueKWh + record.memoryEnergyPueKWh;
        present.co2eG += record.averageCo2e;
        present.marginalCo2eG += record.marginalCo2e;
        if (present.waterL !== undefined && record.water) present.waterL += record.water.total;
        if (present.landM2 !== undefined && record.land) present.landM2 += record.land.total;
        present.avgCi = `${present.avgCi}|${record.avgCi}`;
    }

    return [...byId.values()];
}

function optionalField(value: number | undefined): string {
    return value === undefined ? "" : String(value);
}

export function toFootprintCsv(records: readonly TaskFootprint[]): string {
    const lines: string[] = [TRACE_CSV_HEADER.join(",")];

    for (const record of records) {
        const { task, start, end, realtime } = record.slice;
        const row = [
            task.id,
            task.name,
            task.hostname,
            String(task.cpuCount),
            String(task.avgCpuUsage),
            task.cpuModel,
            String(task.memory),
            new Date(record.windowStart).toISOString(),
            new Date(start).toISOString(),
            new Date(end).toISOString(),
            String(realtime),
            String(record.utilisation),
            String(record.powerWatts),
            String(record.coreEnergyKWh),
            String(record.memoryEnergyKWh),
            String(record.coreEnergyPueKWh),
            String(record.memoryEnergyPueKWh),
            String(record.averageCo2e),
            String(record.marginalCo2e),
            String(record.embodiedCo2e),
            String(record.avgCi),
            optionalField(record.marginalCi),
            optionalField(record.water?.total),
            optionalField(record.water?.intensity),
            optionalField(record.land?.total),
            optionalField(record.land?.intensity)
        ];
        lines.push(row.map(escapeCsvField).join(","));
    }

    return `${lines.join("\n")}\n`;
}

export function energySplit(totals: FootprintTotals): EnergySplit {
    const cpu = totals.coreEnergyPueKWh;
    const memory = totals.memoryEnergyPueKWh;
    const idle = totals.staticEnergyKWh + totals.staticMemoryEnergyKWh;
    const total = cpu + memory + idle;

    if (total <= 0) {
        return { cpuPercent: 0, memoryPercent: 0, staticPercent: 0 };
    }
    return {
        cpuPercent: (cpu / total) * 100,
        memoryPercent: (memory / total) * 100,
        staticPercent: (idle / total) * 100
    };
}

export function buildSummary(result: FootprintResult): FootprintSummary {
    const hasTasks = result.records.length > 0;

    return {
        options: result.options,
        workflow: {
            start: hasTasks ? new Date(result.workflowStart).toISOString() : null,
            end: hasTasks ? new Date(result.workflowEnd).toISOString() : null,
            durationMs: hasTasks ? result.workflowEnd - result.workflowStart : 0
        },
        totals: result.totals,
        energySplit: energySplit(result.totals),
        staticEnergyByHost: result.staticEnergyByHost,
        overheads: result.overheadWindows.map((windowStart) => ({
            windowStart: new Date(windowStart).toISOString(),
            overheadMs: result.overheads.get(windowStart) ?? 0
        })),
        tasks: mergeSlicesByTask(result.records)
    };
}

/**
 * Writes <name>-trace.csv and <name>-summary.json under dir.
 * Only called with a completed result, so a failed run leaves no files.
 */
export async function writeFootprintOutputs(dir: string, name: string, result: FootprintResult): Promise<WrittenOutputs> {
    const outDir = await ensureDirectory(dir);
    const tracePath = path.join(outDir, `${name}-trace.csv`);
    const summaryPath = path.join(outDir, `${name}-summary.json`);

    await writeFile(tracePath, toFootprintCsv(result.records), "utf-8");
    await writeFile(summaryPath, `${JSON.stringify(buildSummary(result), null, 2)}\n`, "utf-8");

    return { tracePath, summaryPath };
}
