#!/usr/bin/env node
import process from "node:process";
import { printHelp } from "./command/help-command.js";
import { footprintCommand } from "./command/footprint-command.js";
import { serveCommand } from "./command/serve-command.js";

const VALID_COMMANDS = new Set(['footprint', 'serve', 'help']);

async function main(argv: string[] = process.argv.slice(2)) {
    const [command = 'help', ...options] = argv;
    if (!options.includes('--json')) {
      console.log("============================");
      console.log("taskprint v 0.1.0");
      console.log("============================\n");
    }
    if (VALID_COMMANDS.has(command)) {
      switch (command) {
        case 'footprint':
          await footprintCommand(options);
          break;
        case 'serve':
          await serveCommand(options);
          break;
        default:
          printHelp();
          break;
      }
    } else {
      console.log('[Message]: Invalid_command');
      printHelp();
      process.exit(1);
    }
}

await main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
