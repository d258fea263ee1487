export { loadConfig, parseAppConfig, parseNodeConfig, DEFAULT_POWER_MODEL, DEFAULT_INTERVAL_MINUTES } from "./config/config.js";
export type { AppConfig, IntensitySetting, ResourceSetting, LoadConfigOptions } from "./config/config.js";

export { splitCsvLine, escapeCsvField, readCsvRows, readCsvStream } from "./ingest/csv.js";
export type { CsvRow, SkippedRow, ReadCsvOptions } from "./ingest/csv.js";
export { readTaskCsv } from "./ingest/readTaskCsv.js";
export type { TaskCsvResult } from "./ingest/readTaskCsv.js";
export { readIntensityCsv, resolveIntensity, toIntensityKey } from "./ingest/readIntensityCsv.js";
export type { IntensityCsvResult, ResolveIntensityOptions } from "./ingest/readIntensityCsv.js";

export { mergeSlicesByTask, toFootprintCsv, buildSummary, energySplit, writeFootprintOutputs, TRACE_CSV_HEADER } from "./report/report.js";
export type { TaskSummary, EnergySplit, FootprintSummary, WrittenOutputs } from "./report/report.js";

export { buildServer } from "./server/server.js";
export type { BuildServerOptions, FootprintRequestBody } from "./server/server.js";

export { footprintCommand } from "./cli/command/footprint-command.js";
export type { FootprintRun } from "./cli/command/footprint-command.js";
