import fastify from "fastify";
import type { FastifyServerOptions } from "fastify";
import { ConfigurationError, FootprintAggregator, isFootprintError, minutesToMs } from "@taskprint/footprint-core";
import type { RunOptions, Task } from "@taskprint/footprint-core";
import { DEFAULT_INTERVAL_MINUTES, DEFAULT_POWER_MODEL, parseAppConfig } from "../config/config.js";
import { resolveIntensity } from "../ingest/readIntensityCsv.js";
import { buildSummary } from "../report/report.js";

export interface FootprintRequestBody {
    tasks: Task[];
    /** same shape as the run configuration file, intensities inline */
    config: unknown;
}

const intensitySchema = {
    anyOf: [
        { type: "number", minimum: 0 },
        { type: "object", additionalProperties: { type: "number" } }
    ]
};

const taskSchema = {
    type: "object",
    required: ["id", "start", "end", "cpuCount", "avgCpuUsage", "memory", "hostname"],
    properties: {
        id: { type: "string", minLength: 1 },
        name: { type: "string", default: "" },
        start: { type: "number" },
        end: { type: "number" },
        cpuCount: { type: "number" },
        avgCpuUsage: { type: "number", minimum: 0 },
        cpuModel: { type: "string", default: "" },
        memory: { type: "number", minimum: 0 },
        hostname: { type: "string" },
        raplTimeseries: { type: "string" },
        cpuUsageTimeseries: { type: "string" }
    }
};

const footprintSchema = {
    body: {
        type: "object",
        required: ["tasks", "config"],
        properties: {
            tasks: { type: "array", items: taskSchema },
            config: {
                type: "object",
                required: ["carbonIntensity", "nodes"],
                properties: {
                    powerModel: { type: "string" },
                    intervalMinutes: { type: "number", exclusiveMinimum: 0 },
                    carbonIntensity: intensitySchema,
                    marginalIntensity: intensitySchema,
                    nodes: { type: "object" }
                }
            }
        }
    }
};

export interface BuildServerOptions {
    logger?: FastifyServerOptions["logger"];
}

export async function buildServer(options: BuildServerOptions = {}) {
    const app = fastify({ logger: options.logger ?? true });

    app.setErrorHandler((error, request, reply) => {
        if (isFootprintError(error)) {
            request.log.warn({ code: error.code }, error.message);
            return reply.status(422).send({ error: error.message, code: error.code });
        }
        const statusCode = error.statusCode ?? 500;
        if (statusCode >= 500) request.log.error(error);
        return reply.status(statusCode).send({ error: error.message, code: error.code ?? "internal" });
    });

    app.get('/status', async () => {
        return {
            status: 'OK',
            timestamp: new Date().toISOString(),
        };
    });

    app.post<{ Body: FootprintRequestBody }>('/footprint', { schema: footprintSchema }, async (request) => {
        const config = parseAppConfig(request.body.config);
        const inline = { allowFiles: false };

        const carbonIntensity = config.carbonIntensity;
        if (carbonIntensity === undefined || config.nodes === undefined) {
            throw new ConfigurationError("config", "config.carbonIntensity and config.nodes are required");
        }

        const options: RunOptions = {
            windowMs: minutesToMs(config.intervalMinutes ?? DEFAULT_INTERVAL_MINUTES),
            powerModel: config.powerModel ?? DEFAULT_POWER_MODEL,
            pue: config.pue,
            memoryCoefficient: config.memoryCoefficient,
            usageUnit: config.usageUnit,
            cpuNormalisation: config.cpuNormalisation,
            applyPueToStatic: config.applyPueToStatic,
            withReservedMemory: config.withReservedMemory,
            carbonIntensity: await resolveIntensity(carbonIntensity, ".", inline),
            marginalIntensity: config.marginalIntensity === undefined
                ? undefined
                : await resolveIntensity(config.marginalIntensity, ".", inline),
            waterIntensity: config.water?.intensity === undefined
                ? undefined
                : await resolveIntensity(config.water.intensity, ".", inline),
            wue: config.water?.efficiency,
            landIntensity: config.land?.intensity === undefined
                ? undefined
                : await resolveIntensity(config.land.intensity, ".", inline),
            lue: config.land?.efficiency
        };

        const result = new FootprintAggregator(config.nodes, options).run(request.body.tasks);
        return buildSummary(result);
    });

    return app;
}
