import { parseArgs } from "node:util";
import process from "node:process";
import { createLogger, errorMessage } from "@carbonmeter/shared";
import { loadConfig, loadPipelineContext } from "../../config/config.js";
import { buildServer } from "../../server/server.js";
import { InMemoryTelemetrySource, JsonFileTelemetrySource, type TelemetrySource } from "../../telemetry/TelemetrySource.js";
import { extractVerbosity, logLevelFor, parsePositiveNumberFromCommand } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export async function serveCommand(argv = process.argv.slice(2)) {
  const { level: verbosity, rest } = extractVerbosity(argv);

  const { values } = parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      port: { type: "string" },
      host: { type: "string" },
      samples: { type: "string" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return;
  }

  const port = parsePositiveNumberFromCommand("--port", values.port, 8080);
  const host = values.host ?? "127.0.0.1";

  const loaded = await loadConfig(values.config);
  const logger = createLogger("carbonmeter", logLevelFor(verbosity, loaded.config.logLevel));
  const context = await loadPipelineContext(loaded);

  let telemetry: TelemetrySource;
  if (values.samples) {
    telemetry = new JsonFileTelemetrySource(values.samples);
  } else {
    logger.warn("no --samples file given, queries will return empty results");
    telemetry = new InMemoryTelemetrySource([]);
  }

  const app = await buildServer({ context, telemetry, logger });

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, `close failed: ${errorMessage(error)}`);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await app.listen({ port, host });
}
