import { parseArgs } from "node:util";
import process from "node:process";
import path from "node:path";
import { stat } from "node:fs/promises";
import { listFiles } from "@taskprint/shared";
import { FootprintAggregator, minutesToMs } from "@taskprint/footprint-core";
import type { FootprintResult, Intensity, RunOptions } from "@taskprint/footprint-core";
import { extractVerbosity, parsePositiveNumberFromCommand, resolveSetting } from "./command-utils.js";
import type { ResolvedSetting } from "./command-utils.js";
import { printHelp } from "./help-command.js";
import { AppConfig, DEFAULT_INTERVAL_MINUTES, DEFAULT_POWER_MODEL, IntensitySetting, loadConfig } from "../../config/config.js";
import { resolveIntensity } from "../../ingest/readIntensityCsv.js";
import { readTaskCsv } from "../../ingest/readTaskCsv.js";
import type { SkippedRow } from "../../ingest/csv.js";
import { WrittenOutputs, buildSummary, writeFootprintOutputs } from "../../report/report.js";

export const DEFAULT_CONFIG_FILE = "taskprint.config.json";
export const DEFAULT_OUTPUT_DIR = "output";

export interface FootprintRun {
  trace: string;
  skipped: SkippedRow[];
  result: FootprintResult;
  outputs: WrittenOutputs;
}

interface LocatedIntensity {
  setting: IntensitySetting;
  baseDir: string;
  source: "cli" | "config";
}

function locateIntensity(
  cli: string | undefined,
  configured: IntensitySetting | undefined,
  cwd: string,
  configDir: string
): LocatedIntensity | undefined {
  if (cli !== undefined) return { setting: cli, baseDir: cwd, source: "cli" };
  if (configured !== undefined) return { setting: configured, baseDir: configDir, source: "config" };
  return undefined;
}

function warnSkipped(label: string) {
  return (file: string, skipped: readonly SkippedRow[]) => {
    console.warn(`[${label}]: skipped ${skipped.length} row(s) in ${file}`);
  };
}

async function loadIntensity(located: LocatedIntensity, label: string): Promise<Intensity> {
  return resolveIntensity(located.setting, located.baseDir, { onSkip: warnSkipped(label) });
}

async function listTraceFiles(tracePath: string): Promise<string[]> {
  const info = await stat(tracePath);
  if (!info.isDirectory()) return [tracePath];

  const files = (await listFiles(tracePath, ".csv")).sort();
  if (files.length === 0) {
    throw new Error(`--trace: no .csv files in ${tracePath}`);
  }
  return files.map((file) => path.join(tracePath, file));
}

function describeSource<T>(name: string, setting: ResolvedSetting<T>, unit = "") {
  console.log(`${name}: ${String(setting.value)}${unit} (source: ${setting.source.toUpperCase()})`);
}

function printRun(run: FootprintRun) {
  const { result, outputs } = run;
  const { totals } = result;

  console.log("==============================");
  console.log("\nWorkflow Footprint");
  console.log("\n--------------------------\n");
  console.log(`Trace: ${run.trace}`);
  console.log(`Task slices: ${result.records.length}`);
  if (run.skipped.length > 0) console.log(`Skipped rows: ${run.skipped.length}`);
  console.log(`Window: ${result.options.windowMs / 60_000} min`);
  console.log(`Power model: ${result.options.powerModel}`);
  console.log(`PUE: ${result.options.pue}`);
  console.log("\n---------ENERGY-----------\n");
  console.log(`Task CPU energy: ${totals.coreEnergyPueKWh.toFixed(6)} kWh`);
  console.log(`Task memory energy: ${totals.memoryEnergyPueKWh.toFixed(6)} kWh`);
  console.log(`Static energy: ${(totals.staticEnergyKWh + totals.staticMemoryEnergyKWh).toFixed(6)} kWh`);
  console.log("\n-----------CARBON---------\n");
  console.log(`Task carbon footprint: ${totals.taskCarbonG.toFixed(6)} gCO2e`);
  console.log(`Static carbon footprint: ${totals.staticCarbonG.toFixed(6)} gCO2e`);
  console.log(`Total carbon footprint: ${totals.carbonG.toFixed(6)} gCO2e`);
  console.log(`Marginal carbon footprint: ${totals.marginalCarbonG.toFixed(6)} gCO2e`);
  if (totals.waterL !== undefined) console.log(`Water footprint: ${totals.waterL.toFixed(6)} L`);
  if (totals.landM2 !== undefined) console.log(`Land footprint: ${totals.landM2.toFixed(6)} m2`);
  console.log("\n--------------------------\n");
  console.log(`Trace records: ${outputs.tracePath}`);
  console.log(`Summary: ${outputs.summaryPath}`);
}

export async function footprintCommand(argv = process.argv.slice(2), cwd = process.cwd()): Promise<FootprintRun[]> {

  const { level: verbosity, debugMetaExplicit, rest } = extractVerbosity(argv);

  const verbose = verbosity >= 1;
  const debugMeta = verbosity >= 2 || debugMetaExplicit;

  const { values } = parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },

      config: { type: "string" },
      trace: { type: "string" },
      out: { type: "string" },

      ci: { type: "string" },
      "marginal-ci": { type: "string" },

      model: { type: "string" },
      interval: { type: "string" },
      pue: { type: "string" },
      "memory-coeff": { type: "string" },

      "reserved-memory": { type: "boolean" },
      "static-pue": { type: "boolean" },

      json: { type: "boolean" }
    },
    allowPositionals: true
  });

  if (values.help) {
    printHelp();
    return [];
  }

  if (!values.trace) {
    throw new Error("Missing trace: use --trace <csv|dir>");
  }

  //load config, the default file is optional
  const configPath = path.resolve(cwd, values.config ?? DEFAULT_CONFIG_FILE);
  const config: AppConfig = (await loadConfig(configPath, { optional: values.config === undefined })) ?? {};
  const configDir = path.dirname(configPath);

  const nodes = config.nodes;
  if (!nodes || Object.keys(nodes).length === 0) {
    throw new Error(`No node power models: add "nodes" to ${values.config ?? DEFAULT_CONFIG_FILE}`);
  }

  const powerModel = resolveSetting(values.model, config.powerModel, DEFAULT_POWER_MODEL);
  const intervalMinutes = resolveSetting(
    values.interval === undefined ? undefined : parsePositiveNumberFromCommand("--interval", values.interval, DEFAULT_INTERVAL_MINUTES),
    config.intervalMinutes,
    DEFAULT_INTERVAL_MINUTES
  );
  const pue = resolveSetting(
    values.pue === undefined ? undefined : parsePositiveNumberFromCommand("--pue", values.pue, 1),
    config.pue,
    undefined
  );
  const memoryCoefficient = resolveSetting(
    values["memory-coeff"] === undefined ? undefined : parsePositiveNumberFromCommand("--memory-coeff", values["memory-coeff"], 1),
    config.memoryCoefficient,
    undefined
  );
  const withReservedMemory = resolveSetting(values["reserved-memory"], config.withReservedMemory, false);
  const applyPueToStatic = resolveSetting(values["static-pue"], config.applyPueToStatic, false);

  const carbon = locateIntensity(values.ci, config.carbonIntensity, cwd, configDir);
  if (!carbon) {
    throw new Error("Missing carbon intensity: use --ci <g/kWh|csv> or carbonIntensity in --config");
  }
  const marginal = locateIntensity(values["marginal-ci"], config.marginalIntensity, cwd, configDir);

  const options: RunOptions = {
    windowMs: minutesToMs(intervalMinutes.value),
    powerModel: powerModel.value,
    pue: pue.value,
    memoryCoefficient: memoryCoefficient.value,
    usageUnit: config.usageUnit,
    cpuNormalisation: config.cpuNormalisation,
    applyPueToStatic: applyPueToStatic.value,
    withReservedMemory: withReservedMemory.value,
    carbonIntensity: await loadIntensity(carbon, "ci"),
    marginalIntensity: marginal ? await loadIntensity(marginal, "marginal-ci") : undefined,
    waterIntensity: config.water?.intensity === undefined
      ? undefined
      : await resolveIntensity(config.water.intensity, configDir, { onSkip: warnSkipped("water") }),
    wue: config.water?.efficiency,
    landIntensity: config.land?.intensity === undefined
      ? undefined
      : await resolveIntensity(config.land.intensity, configDir, { onSkip: warnSkipped("land") }),
    lue: config.land?.efficiency,
    log: debugMeta ? "debug" : "silent"
  };

  // rejects bad option combinations before any trace is read
  const aggregator = new FootprintAggregator(nodes, options);
  const resolved = aggregator.runOptions;

  if (verbose) {
    if (values.config) console.log(`Config: ${configPath}`);
    describeSource("Power model", powerModel);
    describeSource("Interval", intervalMinutes, " min");
    describeSource("PUE", { value: resolved.pue, source: pue.source });
    describeSource("Memory coefficient", { value: resolved.memoryCoefficient, source: memoryCoefficient.source }, " W/GB");
    describeSource("Reserved memory", withReservedMemory);
    describeSource("Static PUE", applyPueToStatic);
    console.log(`Carbon intensity: ${resolved.carbon.describe()} gCO2e/kWh (source: ${carbon.source.toUpperCase()})`);
    if (resolved.marginal && marginal) {
      console.log(`Marginal intensity: ${resolved.marginal.describe()} gCO2e/kWh (source: ${marginal.source.toUpperCase()})`);
    }
    if (resolved.water) console.log(`Water: ${resolved.water.lookup.describe()} L/kWh, WUE ${resolved.water.efficiency}`);
    if (resolved.land) console.log(`Land: ${resolved.land.lookup.describe()} m2/kWh, LUE ${resolved.land.efficiency}`);
    console.log("");
  }

  const outDir = path.resolve(cwd, values.out ?? DEFAULT_OUTPUT_DIR);
  const runs: FootprintRun[] = [];

  for (const trace of await listTraceFiles(path.resolve(cwd, values.trace))) {
    const { tasks, skipped } = await readTaskCsv(trace);
    if (skipped.length > 0) {
      console.warn(`[trace]: skipped ${skipped.length} row(s) in ${trace}`);
      if (verbose) {
        for (const row of skipped) console.warn(`  line ${row.line}: ${row.reason}`);
      }
    }

    const result = aggregator.run(tasks);
    const outputs = await writeFootprintOutputs(outDir, path.basename(trace, path.extname(trace)), result);
    runs.push({ trace, skipped, result, outputs });
  }

  if (values.json) {
    const summaries = runs.map((run) => ({ trace: run.trace, ...buildSummary(run.result) }));
    console.log(JSON.stringify(summaries.length === 1 ? summaries[0] : summaries, null, 2));
    return runs;
  }

  for (const run of runs) printRun(run);
  return runs;
}
