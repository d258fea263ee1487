import test, { before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { computeFootprint, scalarIntensity, tableIntensity } from "@taskprint/footprint-core";
import type { RunOptions } from "@taskprint/footprint-core";
import { TRACE_CSV_HEADER, buildSummary, energySplit, mergeSlicesByTask, toFootprintCsv, writeFootprintOutputs } from "./report.js";
import { HOUR_MS, assertClose, makeNodes, makeTask } from "../../../../utils/test-utils.js";

function options(overrides: Partial<RunOptions> = {}): RunOptions {
    return {
        windowMs: HOUR_MS,
        powerModel: "ondemand_minmax",
        carbonIntensity: scalarIntensity(100),
        ...overrides
    };
}

let baseDir = "";

before(async () => {
    baseDir = await mkdtemp(join(tmpdir(), "taskprint-report-"));
});

after(async () => {
    await rm(baseDir, { recursive: true, force: true });
});

test("mergeSlicesByTask", async (t) => {

    await t.test("sums a task's slices and joins the window intensities", () => {
        // 00:30 -> 01:30 straddles two hourly windows
        const ci = tableIntensity([["01/01-00:00", 100], ["01/01-01:00", 300]]);
        const task = makeTask({ start: HOUR_MS / 2, end: HOUR_MS * 1.5 });
        const result = computeFootprint([task], makeNodes(), options({ carbonIntensity: ci }));

        assert.strictEqual(result.records.length, 2);
        const [summary] = mergeSlicesByTask(result.records);

        assert.strictEqual(summary.id, "t1");
        assert.strictEqual(summary.realtimeMs, HOUR_MS);
        assertClose(summary.coreEnergyKWh, 0.125);
        // 0.0625 kWh at 100 + 0.0625 kWh at 300
        assertClose(summary.co2eG, 25);
        assert.strictEqual(summary.avgCi, "100|300");
        assert.strictEqual(summary.waterL, undefined);
    });

    await t.test("keeps first-appearance order", () => {
        const tasks = [
            makeTask({ id: "late", start: HOUR_MS, end: 2 * HOUR_MS }),
            makeTask({ id: "early", start: 0, end: HOUR_MS })
        ];
        const result = computeFootprint(tasks, makeNodes(), options());
        assert.deepStrictEqual(mergeSlicesByTask(result.records).map((s) => s.id), ["early", "late"]);
    });
});

test("toFootprintCsv", async (t) => {

    await t.test("one header line and one line per slice", () => {
        const result = computeFootprint([makeTask({ name: "ALIGN, SORT" })], makeNodes(), options());
        const lines = toFootprintCsv(result.records).trimEnd().split("\n");

        assert.strictEqual(lines.length, 2);
        assert.strictEqual(lines[0], TRACE_CSV_HEADER.join(","));
        assert.strictEqual(
            lines[1],
            't1,"ALIGN, SORT",node-1,1,50,test-cpu,0,' +
            "1970-01-01T00:00:00.000Z,1970-01-01T00:00:00.000Z,1970-01-01T01:00:00.000Z,3600000,0.5,125," +
            "0.125,0,0.125,0,12.5,0,0,100,,,,,"
        );
    });
});

test("buildSummary", async (t) => {

    await t.test("totals, energy split and overhead windows", () => {
        const result = computeFootprint([makeTask({ start: 600_000, end: HOUR_MS + 600_000 })], makeNodes(), options());
        const summary = buildSummary(result);

        assert.deepStrictEqual(summary.workflow, {
            start: "1970-01-01T00:10:00.000Z",
            end: "1970-01-01T01:10:00.000Z",
            durationMs: HOUR_MS
        });
        assert.strictEqual(summary.tasks.length, 1);
        assert.strictEqual(summary.overheads.length, result.overheadWindows.length);
        // task 0.125 kWh, static 50 W for 1 h = 0.05 kWh
        assertClose(summary.energySplit.cpuPercent, (0.125 / 0.175) * 100);
        assertClose(summary.energySplit.staticPercent, (0.05 / 0.175) * 100);
        assert.strictEqual(summary.energySplit.memoryPercent, 0);
    });

    await t.test("an empty run has no workflow bounds", () => {
        const summary = buildSummary(computeFootprint([], makeNodes(), options()));
        assert.deepStrictEqual(summary.workflow, { start: null, end: null, durationMs: 0 });
        assert.deepStrictEqual(summary.tasks, []);
        assert.deepStrictEqual(energySplit(summary.totals), { cpuPercent: 0, memoryPercent: 0, staticPercent: 0 });
    });
});

test("writeFootprintOutputs", async (t) => {

    await t.test("writes <name>-trace.csv and <name>-summary.json", async () => {
        const outDir = join(baseDir, "out", "nested");
        const result = computeFootprint([makeTask()], makeNodes(), options());

        const written = await writeFootprintOutputs(outDir, "wf", result);

        assert.deepStrictEqual((await readdir(outDir)).sort(), ["wf-summary.json", "wf-trace.csv"]);
        assert.strictEqual(written.tracePath, join(outDir, "wf-trace.csv"));

        const parsed: unknown = JSON.parse(await readFile(written.summaryPath, "utf-8"));
        assert.ok(typeof parsed === "object" && parsed !== null && "totals" in parsed);
        assert.deepStrictEqual(parsed.totals, JSON.parse(JSON.stringify(result.totals)));
    });
});
