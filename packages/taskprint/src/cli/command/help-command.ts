export function printHelp() {
    console.log(`
Usage:
  footprint --trace <csv|dir> --ci <g/kWh|csv> [--model <governor>_<type>] [--interval 60]
            [--pue 1.0] [--memory-coeff 0.392] [--config <json>] [--out output]
            [--reserved-memory] [--static-pue] [--json] [-v|-vv]
  serve [--port 3000] [--host 127.0.0.1]
  help

Options:
  --trace <path>         Task trace CSV, or a directory of them (one run per file)
  --ci <value>           Carbon intensity: constant gCO2e/kWh or a date,start,actual CSV
  --marginal-ci <value>  Marginal carbon intensity, same forms as --ci
  --model <name>         Power model, e.g. ondemand_minmax, performance_linear (default: ondemand_minmax)
  --interval <minutes>   Window width (default: 60)
  --pue <n>              Power usage effectiveness, >= 1 (default: 1.0)
  --memory-coeff <W/GB>  Memory power draw when a host gives none (default: 0.392)

  --config <file>        Run configuration (nodes, water, land ...); default ./taskprint.config.json if present
  --out <dir>            Output directory for <trace>-trace.csv and <trace>-summary.json (default: output)

  --reserved-memory      Count the host's whole memory as static draw while it is active
  --static-pue           Apply PUE to static energy
  --json                 Print the summary as JSON (machine-readable)

  -v / --verbose         Print resolved settings and where they came from
  -vv                    Adds per-window engine logging
  --debug-meta           Same as -vv
`);
}
