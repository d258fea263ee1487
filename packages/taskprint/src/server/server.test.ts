import test, { before, after } from "node:test";
import assert from "node:assert/strict";
import { buildServer } from "./server.js";
import { HOUR_MS, assertClose, makeNodes, makeTask } from "../../../../utils/test-utils.js";

type App = Awaited<ReturnType<typeof buildServer>>;

let app: App;

before(async () => {
    app = await buildServer({ logger: false });
    await app.ready();
});

after(async () => {
    await app.close();
});

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null;
}

test("GET /status", async () => {
    const response = await app.inject({ method: "GET", url: "/status" });

    assert.strictEqual(response.statusCode, 200);
    const body: unknown = response.json();
    assert.ok(isObject(body));
    assert.strictEqual(body.status, "OK");
});

test("POST /footprint", async (t) => {

    await t.test("returns the run summary", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/footprint",
            payload: {
                tasks: [makeTask()],
                config: { carbonIntensity: 100, nodes: makeNodes() }
            }
        });

        assert.strictEqual(response.statusCode, 200);
        const body: unknown = response.json();
        assert.ok(isObject(body) && isObject(body.totals) && Array.isArray(body.tasks));
        assertClose(Number(body.totals.taskCarbonG), 12.5);
        // static: 50 W idle for 1 h at 100 g/kWh
        assertClose(Number(body.totals.staticCarbonG), 5);
        assert.strictEqual(body.tasks.length, 1);
    });

    await t.test("accepts an inline intensity table", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/footprint",
            payload: {
                tasks: [makeTask({ start: HOUR_MS, end: 2 * HOUR_MS })],
                config: { carbonIntensity: { "01/01-01:00": 200 }, intervalMinutes: 60, nodes: makeNodes() }
            }
        });

        assert.strictEqual(response.statusCode, 200);
        const body: unknown = response.json();
        assert.ok(isObject(body) && isObject(body.totals));
        assertClose(Number(body.totals.taskCarbonG), 25);
    });

    await t.test("ERROR: engine errors map to 422 with their code", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/footprint",
            payload: {
                tasks: [makeTask({ hostname: "ghost" })],
                config: { carbonIntensity: 100, nodes: makeNodes() }
            }
        });

        assert.strictEqual(response.statusCode, 422);
        const body: unknown = response.json();
        assert.ok(isObject(body));
        assert.strictEqual(body.code, "configuration");
    });

    await t.test("ERROR: a missing table key is a 422 intensity_lookup", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/footprint",
            payload: {
                tasks: [makeTask()],
                config: { carbonIntensity: { "01/02-00:00": 100 }, nodes: makeNodes() }
            }
        });

        assert.strictEqual(response.statusCode, 422);
        assert.deepStrictEqual(response.json(), {
            error: "[carbon] no intensity value for window key 01/01-00:00",
            code: "intensity_lookup"
        });
    });

    await t.test("ERROR: schema violations are 400", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/footprint",
            payload: { tasks: [{ id: "x" }], config: { carbonIntensity: 100, nodes: {} } }
        });

        assert.strictEqual(response.statusCode, 400);
    });
});
