import { parseArgs } from "node:util";
import process from "node:process";
import {
  createPipeline,
  InvalidInput,
  processSample,
  type ProcessedSample,
  type StorageMedia,
} from "@carbonmeter/core";
import { loadConfig, loadPipelineContext, type PipelineContext } from "../../config/config.js";
import { DEFAULT_REGION } from "../../daemon/readers/usageReader.js";
import { parseNonNegativeNumberFromCommand, parsePositiveNumberFromCommand } from "./command-utils.js";
import { printHelp } from "./help-command.js";

export interface EstimateInput {
  instanceClass: string;
  cpuUtilizationPct: number;
  storageGb: number;
  storageMedia?: StorageMedia;
  durationS: number;
  region: string;
}

function parseMedia(value: string | undefined): StorageMedia | undefined {
  if (value === undefined) return undefined;
  if (value === "ssd" || value === "hdd") return value;
  throw new InvalidInput("--media must be ssd or hdd", { media: value });
}

/**
 * Whole-VM footprint of one instance class at a constant CPU load.
 */
export function estimateFootprint(input: EstimateInput, context: PipelineContext): ProcessedSample {
  const pipeline = createPipeline(context.coefficients, context.profiles, "infrastructure");
  return processSample({
    timestamp: new Date(0).toISOString(),
    resourceId: input.instanceClass,
    instanceClass: input.instanceClass,
    region: input.region,
    cpuUtilizationPct: input.cpuUtilizationPct,
    memoryRequestedGb: 0,
    storageRequestedGb: input.storageGb,
    vcpusAllocated: 0,
    durationS: input.durationS,
    groupingKey: input.instanceClass,
    storageMedia: input.storageMedia,
  }, pipeline);
}

export async function estimateCommand(argv = process.argv.slice(2)) {
  const { values } = parseArgs({
    args: argv,
    options: {
      help: { type: "boolean" },
      config: { type: "string" },
      instance: { type: "string" },
      cpu: { type: "string" },
      storage: { type: "string" },
      media: { type: "string" },
      duration: { type: "string" },
      region: { type: "string" },
      json: { type: "boolean" },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return;
  }

  if (!values.instance) throw new InvalidInput("estimate: --instance is required");
  if (values.cpu === undefined) throw new InvalidInput("estimate: --cpu is required");

  const input: EstimateInput = {
    instanceClass: values.instance,
    cpuUtilizationPct: parseNonNegativeNumberFromCommand("--cpu", values.cpu, 0),
    storageGb: parseNonNegativeNumberFromCommand("--storage", values.storage, 0),
    storageMedia: parseMedia(values.media),
    durationS: parsePositiveNumberFromCommand("--duration", values.duration, 3600),
    region: values.region ?? DEFAULT_REGION,
  };

  const context = await loadPipelineContext(await loadConfig(values.config));
  const result = estimateFootprint(input, context);

  if (values.json) {
    console.log(JSON.stringify({ input, power: result.power, energy: result.energy, carbon: result.carbon, gridIntensity: result.gridIntensity }, null, 2));
    return;
  }

  console.log("==============================");
  console.log(`${input.instanceClass} @ ${result.sample.cpuUtilizationPct}% CPU, ${input.durationS} s, ${input.region}`);
  console.log("\n---------ENERGY-----------\n");
  console.log(`CPU energy: ${result.energy.cpuEnergyKwh.toFixed(6)} kWh`);
  console.log(`Memory energy: ${result.energy.memoryEnergyKwh.toFixed(6)} kWh`);
  console.log(`Storage energy: ${result.energy.storageEnergyKwh.toFixed(6)} kWh`);
  console.log(`Total energy (PUE ${context.coefficients.pue}): ${result.energy.energyAdjustedKwh.toFixed(6)} kWh`);
  console.log("\n-----------CARBON---------\n");
  console.log(`Grid intensity: ${result.gridIntensity} gCO2e/kWh${result.gridIntensityFallback ? " (default)" : ""}`);
  console.log(`Operational: ${result.carbon.operationalG.toFixed(4)} gCO2e`);
  console.log(`Embodied: ${result.carbon.embodiedTotalG.toFixed(4)} gCO2e`);
  console.log(`Total: ${result.carbon.totalG.toFixed(4)} gCO2e`);
}
