import test from "node:test";
import assert from "node:assert/strict";
import { binTasks, sliceDurationsById, sliceForWindow } from "./TaskIntervalBinner.js";
import { InvariantViolationError } from "../errors.js";
import { alignToWindow } from "../timers/timing.js";
import { makeTask } from "../../../../utils/test-utils.js";

test("binTasks - window slicing", async (t) => {

    await t.test("OVERHEAD: task starting at i+10 in a 60 wide window and ending at i+200", () => {
        const task = makeTask({ start: 10, end: 200 });
        const binning = binTasks([task], 60);

        assert.deepStrictEqual([...binning.windows.keys()], [-60, 0, 60, 120, 180]);
        assert.strictEqual(binning.overheads.get(0), 50);
        assert.deepStrictEqual(binning.overheadWindows, [0]);

        const realtimes = [...binning.windows.values()].map((slices) => slices.map((s) => s.realtime));
        assert.deepStrictEqual(realtimes, [[], [50], [60], [60], [20]]);
    });

    await t.test("INSIDE: a task within one window is copied unmodified", () => {
        const task = makeTask({ start: 5, end: 25 });
        const binning = binTasks([task], 60);
        const slices = binning.windows.get(0) ?? [];

        assert.strictEqual(slices.length, 1);
        assert.strictEqual(slices[0].task, task);
        assert.deepStrictEqual(
            { start: slices[0].start, end: slices[0].end, realtime: slices[0].realtime },
            { start: 5, end: 25, realtime: 20 }
        );
        assert.strictEqual(binning.overheads.get(0), 0);
    });

    await t.test("TAIL: a task ending inside the window is clipped to the window start", () => {
        const slice = sliceForWindow(makeTask({ start: 40, end: 100 }), 60, 60);
        assert.ok(slice);
        assert.strictEqual(slice.kind, "tail");
        assert.deepStrictEqual([slice.slice.start, slice.slice.end, slice.slice.realtime], [60, 100, 40]);
    });

    await t.test("SPAN: a task covering the whole window yields a full window slice", () => {
        const slice = sliceForWindow(makeTask({ start: 10, end: 500 }), 60, 60);
        assert.ok(slice);
        assert.strictEqual(slice.kind, "span");
        assert.strictEqual(slice.slice.realtime, 60);
    });

    await t.test("BOUNDARIES: start on a window edge and end on a window edge lose nothing", () => {
        const task = makeTask({ start: 0, end: 120 });
        const binning = binTasks([task], 60);

        assert.strictEqual(binning.windows.get(0)?.[0].realtime, 60);
        assert.strictEqual(binning.windows.get(60)?.[0].realtime, 60);
        assert.deepStrictEqual(binning.windows.get(120), []);
        assert.strictEqual(binning.overheads.get(0), 60);
        assert.strictEqual(sliceDurationsById(binning).get(task.id), 120);
    });

    await t.test("OVERHEAD MAX: the longest spill among tasks starting in the window wins", () => {
        const binning = binTasks([
            makeTask({ id: "a", start: 10, end: 90 }),
            makeTask({ id: "b", start: 30, end: 70 }),
            makeTask({ id: "c", start: 45, end: 50 })
        ], 60);
        assert.strictEqual(binning.overheads.get(0), 50);
    });

    await t.test("EMPTY: no tasks gives an empty binning", () => {
        const binning = binTasks([], 60);
        assert.strictEqual(binning.windows.size, 0);
        assert.deepStrictEqual(binning.overheadWindows, []);
    });

    await t.test("WIDTH: non-positive width is rejected", () => {
        assert.throws(() => binTasks([makeTask()], 0), InvariantViolationError);
        assert.throws(() => binTasks([makeTask()], -60), InvariantViolationError);
    });
});

test("binTasks - duration conservation", () => {
    const tasks = [
        makeTask({ id: "a", start: 0, end: 3_600_000 }),
        makeTask({ id: "b", start: 1_234, end: 987_654 }),
        makeTask({ id: "c", start: 59_999, end: 60_001 }),
        makeTask({ id: "d", start: 1_799_999, end: 7_200_001 }),
        makeTask({ id: "e", start: 3_000_000, end: 3_000_001 }),
        makeTask({ id: "f", start: 250_000, end: 10_800_000 })
    ];

    for (const width of [997, 1_000, 60_000, 1_800_000, 3_600_000, 86_400_000]) {
        const binning = binTasks(tasks, width);
        const totals = sliceDurationsById(binning);

        for (const task of tasks) {
            assert.strictEqual(totals.get(task.id), task.end - task.start, `task ${task.id} width ${width}`);
        }
        for (const slices of binning.windows.values()) {
            for (const slice of slices) {
                assert.ok(slice.realtime > 0, `slice of ${slice.task.id} has realtime ${slice.realtime}`);
                assert.strictEqual(slice.realtime, slice.end - slice.start);
            }
        }
    }
});

test("alignToWindow: round to nearest, half a window rounds up", () => {
    assert.strictEqual(alignToWindow(29, 60), 0);
    assert.strictEqual(alignToWindow(30, 60), 60);
    assert.strictEqual(alignToWindow(60, 60), 60);
    assert.strictEqual(alignToWindow(1_799_999, 3_600_000), 0);
    assert.strictEqual(alignToWindow(1_800_000, 3_600_000), 3_600_000);
});
