import test from "node:test";
import assert from "node:assert/strict";
import { activeTimeByHost, mergeIntervals, totalDuration } from "./ActiveIntervalMerger.js";
import { sliceTask } from "../model/task.js";
import { makeTask } from "../../../../utils/test-utils.js";

test("mergeIntervals", async (t) => {

    await t.test("disjoint intervals are kept apart and sorted", () => {
        assert.deepStrictEqual(
            mergeIntervals([{ start: 50, end: 60 }, { start: 0, end: 10 }]),
            [{ start: 0, end: 10 }, { start: 50, end: 60 }]
        );
    });

    await t.test("overlapping and nested intervals collapse", () => {
        assert.deepStrictEqual(
            mergeIntervals([{ start: 0, end: 30 }, { start: 10, end: 20 }, { start: 25, end: 40 }]),
            [{ start: 0, end: 40 }]
        );
    });

    await t.test("touching intervals merge", () => {
        assert.deepStrictEqual(
            mergeIntervals([{ start: 10, end: 20 }, { start: 0, end: 10 }]),
            [{ start: 0, end: 20 }]
        );
    });

    await t.test("input is left untouched", () => {
        const input = [{ start: 0, end: 10 }, { start: 5, end: 15 }];
        mergeIntervals(input);
        assert.deepStrictEqual(input, [{ start: 0, end: 10 }, { start: 5, end: 15 }]);
    });

    await t.test("empty input", () => {
        assert.deepStrictEqual(mergeIntervals([]), []);
        assert.strictEqual(totalDuration([]), 0);
    });
});

test("activeTimeByHost", async (t) => {

    await t.test("NO DOUBLE COUNTING: fully overlapping tasks on one host count once", () => {
        const a = makeTask({ id: "a", start: 0, end: 1_000 });
        const b = makeTask({ id: "b", start: 0, end: 1_000 });
        const active = activeTimeByHost([sliceTask(a, 0, 1_000), sliceTask(b, 0, 1_000)]);
        assert.deepStrictEqual([...active.entries()], [["node-1", 1_000]]);
    });

    await t.test("partial overlap counts the union, gaps are not active", () => {
        const slices = [
            sliceTask(makeTask({ id: "a" }), 0, 600),
            sliceTask(makeTask({ id: "b" }), 400, 1_000),
            sliceTask(makeTask({ id: "c" }), 2_000, 2_500)
        ];
        assert.strictEqual(activeTimeByHost(slices).get("node-1"), 1_500);
    });

    await t.test("hosts are merged independently and returned sorted", () => {
        const slices = [
            sliceTask(makeTask({ id: "a", hostname: "node-2" }), 0, 600),
            sliceTask(makeTask({ id: "b", hostname: "node-1" }), 0, 600)
        ];
        assert.deepStrictEqual([...activeTimeByHost(slices).entries()], [["node-1", 600], ["node-2", 600]]);
    });
});
