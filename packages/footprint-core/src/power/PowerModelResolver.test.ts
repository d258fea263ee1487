import test from "node:test";
import assert from "node:assert/strict";
import { PowerModelResolver, parseModelName } from "./PowerModelResolver.js";
import { ConfigurationError } from "../errors.js";
import { NodeConfig } from "./nodeConfig.js";

const nodes: NodeConfig = {
    "node-1": {
        memory: 17_179_869_184,
        governors: {
            ondemand: {
                minWatts: 50,
                maxWatts: 200,
                linear: [80, 40],
                tdpPerCore: 12,
                polynomial: [100, 0, 30],
                memDraw: 0.4,
                systemCores: 32,
                cpuModel: "test-cpu"
            },
            performance: { minWatts: 60, maxWatts: 220, idleWatts: 45 }
        }
    }
};

test("parseModelName", async (t) => {

    await t.test("splits governor and model type, ignoring trailing segments", () => {
        assert.deepStrictEqual(parseModelName("ondemand_minmax"), { governor: "ondemand", modelType: "minmax" });
        assert.deepStrictEqual(parseModelName("ondemand_linear_v2"), { governor: "ondemand", modelType: "linear" });
    });

    await t.test("unknown model type is a configuration error", () => {
        assert.throws(() => parseModelName("ondemand_cubic"), (error: unknown) => {
            assert.ok(error instanceof ConfigurationError);
            assert.strictEqual(error.key, "ondemand_cubic");
            assert.match(error.message, /unknown power model type "cubic"/);
            return true;
        });
    });

    await t.test("missing model type is a configuration error", () => {
        assert.throws(() => parseModelName("ondemand"), ConfigurationError);
    });
});

test("PowerModelResolver.resolve", async (t) => {
    const resolver = new PowerModelResolver(nodes);

    await t.test("MINMAX: linear interpolation between idle and peak, idle is the baseline", () => {
        const curve = resolver.resolve("node-1", "ondemand_minmax");
        assert.strictEqual(curve.modelType, "minmax");
        assert.strictEqual(curve.baselineWatts, 50);
        if (curve.modelType === "baseline") return assert.fail("expected an evaluated curve");
        assert.strictEqual(curve.evaluate(0), 50);
        assert.strictEqual(curve.evaluate(0.5), 125);
        assert.strictEqual(curve.evaluate(1), 200);
    });

    await t.test("LINEAR: coefficient x u + intercept, intercept is the baseline", () => {
        const curve = resolver.resolve("node-1", "ondemand_linear");
        assert.strictEqual(curve.baselineWatts, 40);
        if (curve.modelType === "baseline") return assert.fail("expected an evaluated curve");
        assert.strictEqual(curve.evaluate(0.5), 80);
    });

    await t.test("POLYNOMIAL: highest degree first, constant term is the baseline", () => {
        const curve = resolver.resolve("node-1", "ondemand_polynomial");
        assert.strictEqual(curve.baselineWatts, 30);
        if (curve.modelType === "baseline") return assert.fail("expected an evaluated curve");
        assert.strictEqual(curve.evaluate(0.5), 55);
    });

    await t.test("BASELINE: exposes the per-core TDP, no idle draw unless configured", () => {
        const curve = resolver.resolve("node-1", "ondemand_baseline");
        assert.strictEqual(curve.modelType, "baseline");
        assert.strictEqual(curve.baselineWatts, 0);
        if (curve.modelType !== "baseline") return assert.fail("expected a baseline curve");
        assert.strictEqual(curve.tdpPerCore, 12);
    });

    await t.test("idleWatts overrides the model's own baseline", () => {
        assert.strictEqual(resolver.resolve("node-1", "performance_minmax").baselineWatts, 45);
    });

    await t.test("IDEMPOTENT: resolving twice gives the same curve and wattage", () => {
        const first = resolver.resolve("node-1", "ondemand_minmax");
        const second = resolver.resolve("node-1", "ondemand_minmax");
        assert.strictEqual(first, second);
        if (first.modelType === "baseline" || second.modelType === "baseline") return assert.fail("expected evaluated curves");
        assert.strictEqual(first.evaluate(0.37), second.evaluate(0.37));
    });

    await t.test("missing host, governor or parameter are configuration errors naming the key", () => {
        assert.throws(() => resolver.resolve("node-9", "ondemand_minmax"), { name: "ConfigurationError", key: "node-9" });
        assert.throws(() => resolver.resolve("node-1", "powersave_minmax"), { key: "node-1.powersave" });
        assert.throws(() => resolver.resolve("node-1", "performance_linear"), { key: "node-1.performance.linear" });
        assert.throws(() => resolver.resolve("node-1", "performance_baseline"), { key: "node-1.performance.tdpPerCore" });
    });

    await t.test("maxWatts below minWatts is rejected", () => {
        const broken = new PowerModelResolver({ h: { governors: { g: { minWatts: 100, maxWatts: 10 } } } });
        assert.throws(() => broken.resolve("h", "g_minmax"), ConfigurationError);
    });

    await t.test("prototype keys are not hosts", () => {
        assert.throws(() => resolver.resolve("toString", "ondemand_minmax"), ConfigurationError);
    });
});

test("PowerModelResolver.hostProfile", async (t) => {

    await t.test("reads memory, memDraw, cores and cpu model", () => {
        const resolver = new PowerModelResolver(nodes);
        assert.deepStrictEqual(resolver.hostProfile("node-1", "ondemand_minmax"), {
            hostname: "node-1",
            memory: 17_179_869_184,
            memoryCoefficient: 0.4,
            systemCores: 32,
            cpuModel: "test-cpu"
        });
    });

    await t.test("falls back to the run memory coefficient", () => {
        const resolver = new PowerModelResolver(nodes, { memoryCoefficient: 0.25 });
        const profile = resolver.hostProfile("node-1", "performance_minmax");
        assert.strictEqual(profile.memoryCoefficient, 0.25);
        assert.strictEqual(profile.systemCores, undefined);
    });
});
