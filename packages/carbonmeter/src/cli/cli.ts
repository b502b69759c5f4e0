#!/usr/bin/env -S node --import tsx
import process from "node:process";
import { CarbonMeterError } from "@carbonmeter/core";
import { errorMessage } from "@carbonmeter/shared";
import { printHelp } from "./command/help-command.js";
import { reportCommand } from "./command/report-command.js";
import { serveCommand } from "./command/serve-command.js";
import { estimateCommand } from "./command/estimate-command.js";

const VALID_COMMANDS = new Set(["report", "serve", "estimate", "help"]);

async function main(argv: string[] = process.argv.slice(2)) {
  const [command = "help", ...options] = argv;
  if (!VALID_COMMANDS.has(command)) {
    console.log("[Message]: Invalid_command");
    printHelp();
    process.exit(1);
  }
  switch (command) {
    case "report":
      await reportCommand(options);
      break;
    case "serve":
      await serveCommand(options);
      break;
    case "estimate":
      await estimateCommand(options);
      break;
    default:
      printHelp();
      break;
  }
}

await main().catch((err: unknown) => {
  console.error(err instanceof CarbonMeterError ? `[${err.code}]: ${err.message}` : errorMessage(err));
  process.exit(1);
});
