import { parseArgs } from "node:util";
import process from "node:process";
import { InvalidInput } from "@carbonmeter/core";
import { createLogger } from "@carbonmeter/shared";
import { loadConfig, loadPipelineContext } from "../../config/config.js";
import { runDaemon } from "../../daemon/daemon.js";
import { extractVerbosity, logLevelFor, splitList } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export async function reportCommand(argv = process.argv.slice(2)) {
  const { level: verbosity, rest } = extractVerbosity(argv);

  const { values } = parseArgs({
    args: rest,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      files: { type: "string", multiple: true },
      out: { type: "string" },
      date: { type: "string" },
      json: { type: "boolean" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return;
  }

  const files = splitList(values.files);
  if (files.length === 0) throw new InvalidInput("report: --files is required");
  if (!values.out) throw new InvalidInput("report: --out is required");

  const loaded = await loadConfig(values.config);
  const logger = createLogger("carbonmeter", logLevelFor(verbosity, loaded.config.logLevel));
  if (loaded.source) logger.debug({ config: loaded.source }, "config loaded");
  const context = await loadPipelineContext(loaded);

  const result = await runDaemon({
    files,
    outDir: values.out,
    date: values.date,
    context,
    logger,
  });

  if (values.json) {
    console.log(JSON.stringify(result, null, 2));
  }
  if (!result.success) {
    throw new Error(`report failed: ${result.errorMessage}`);
  }
  if (values.json) return;

  console.log("==============================");
  console.log(`Carbon report ${result.date}`);
  console.log("------------------------------");
  console.log(`VMs: ${result.resourceCount}`);
  console.log(`Samples processed: ${result.stats.processed}`);
  console.log(`Samples skipped: ${result.stats.skipped}`);
  if (result.duplicates > 0) console.log(`Duplicate rows dropped: ${result.duplicates}`);
  if (result.read.missingFiles.length > 0) console.log(`Missing files: ${result.read.missingFiles.join(", ")}`);
  console.log(`Report: ${result.outFile}`);
  console.log(`Done in ${result.executionTimeS.toFixed(2)} s`);
}
