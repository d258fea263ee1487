import test from "node:test";
import assert from "node:assert/strict";
import { FootprintAccumulator } from "./FootprintAccumulator.js";

const slice = {
    realtimeMs: 1_000,
    coreEnergyKWh: 1,
    coreEnergyPueKWh: 2,
    memoryEnergyKWh: 0.5,
    memoryEnergyPueKWh: 1,
    carbonG: 300,
    marginalCarbonG: 0
};

test("FootprintAccumulator", async (t) => {

    await t.test("sums slices and keeps static energy per host, hosts sorted", () => {
        const acc = new FootprintAccumulator({ withWater: true, withLand: false });
        acc.pushSlice({ ...slice, waterL: 4 });
        acc.pushSlice({ ...slice, waterL: 1 });
        acc.pushStatic("node-b", { activeMs: 10, energyKWh: 1, memoryEnergyKWh: 0, carbonG: 100 });
        acc.pushStatic("node-a", { activeMs: 20, energyKWh: 2, memoryEnergyKWh: 1, carbonG: 300 });
        acc.pushStatic("node-b", { activeMs: 5, energyKWh: 1, memoryEnergyKWh: 0, carbonG: 100 });

        const { totals, hosts } = acc.finalize();

        assert.deepStrictEqual(Object.keys(hosts), ["node-a", "node-b"]);
        assert.deepStrictEqual(hosts["node-b"], {
            hostname: "node-b",
            activeMs: 15,
            staticEnergyKWh: 2,
            staticMemoryEnergyKWh: 0,
            staticCarbonG: 200
        });
        assert.deepStrictEqual(totals, {
            taskRuntimeMs: 2_000,
            coreEnergyKWh: 2,
            coreEnergyPueKWh: 4,
            memoryEnergyKWh: 1,
            memoryEnergyPueKWh: 2,
            taskCarbonG: 600,
            marginalCarbonG: 0,
            staticEnergyKWh: 4,
            staticMemoryEnergyKWh: 1,
            staticCarbonG: 500,
            carbonG: 1_100,
            waterL: 5,
            landM2: undefined
        });
    });

    await t.test("finalize must be called once", () => {
        const acc = new FootprintAccumulator({ withWater: false, withLand: false });
        acc.finalize();
        assert.throws(() => acc.finalize(), /called twice/);
    });
});
