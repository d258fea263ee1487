import { parseArgs } from "node:util";
import process from "node:process";
import { buildServer } from "../../server/server.js";
import { parsePositiveNumberFromCommand } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export async function serveCommand(argv = process.argv.slice(2)) {
  const { values } = parseArgs({
    args: argv,
    options: {
      help: { type: "boolean" },
      port: { type: "string" },
      host: { type: "string" }
    },
    allowPositionals: true
  });

  if (values.help) {
    printHelp();
    return;
  }

  const port = parsePositiveNumberFromCommand("--port", values.port, 3000);
  const app = await buildServer();

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.close().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error(error);
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port, host: values.host ?? "127.0.0.1" });
}
