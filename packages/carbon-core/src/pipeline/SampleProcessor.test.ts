import test from "node:test";
import assert from "node:assert/strict";
import { createCoefficientSet } from "../config/coefficients.js";
import { ConfigurationError, InvalidSample } from "../errors/errors.js";
import { HardwareProfileResolver } from "../hardware/HardwareProfileResolver.js";
import { createPipeline, processSample, processSamples, RunStats, validateSample } from "./SampleProcessor.js";
import { isPipelineVariant } from "./types.js";
import { assertClose, makeSample, testPipeline } from "../../../../utils/test-utils.js";

const HOURS_PER_LIFETIME = 35_064;

test("infrastructure: whole VM with profile memory and sample storage", () => {
  const result = processSample(makeSample({ cpuUtilizationPct: 50, storageRequestedGb: 100 }), testPipeline("infrastructure"));

  assertClose(result.power.cpuPowerKw, 0.15);
  assertClose(result.power.memoryPowerKw, 16 * 0.392 / 1000);
  assertClose(result.power.storagePowerKw, 100 * 0.000925 / 1000);
  assertClose(result.energy.energyAdjustedKwh, 0.1563645 * 1.185);
  assertClose(result.carbon.operationalG, 0.1563645 * 1.185 * 44);
  assertClose(result.carbon.embodiedCpuG, 1_672_000 * (4 / 40) / HOURS_PER_LIFETIME);
  assertClose(result.carbon.embodiedStorageG, 100 * 90 / HOURS_PER_LIFETIME);
  assertClose(result.carbon.totalG, result.carbon.operationalG + result.carbon.embodiedTotalG);
  assert.equal(result.vcpusAllocated, 4);
  assert.equal(result.memoryGb, 16);
  assert.equal(result.gridIntensity, 44);
  assert.equal(result.timestampMs, Date.parse("2024-05-01T00:00:00Z"));
});

test("infrastructure: profile without vcpusAllocated occupies the whole host", () => {
  const result = processSample(makeSample({ instanceClass: "Test_E8" }), testPipeline("infrastructure"));
  assert.equal(result.vcpusAllocated, 60);
  assertClose(result.carbon.embodiedCpuG, 1_672_000 / HOURS_PER_LIFETIME);
});

test("application: reserved cores, requested memory, no storage", () => {
  const sample = makeSample({ cpuUtilizationPct: 0, vcpusAllocated: 2, memoryRequestedGb: 4, storageRequestedGb: 50 });
  const result = processSample(sample, testPipeline("application"));

  assertClose(result.power.cpuPowerKw, 0.12 * 200 / 1000 * (2 / 40));
  assertClose(result.power.memoryPowerKw, 4 * 0.392 / 1000);
  assert.equal(result.power.storagePowerKw, 0);
  assert.equal(result.carbon.embodiedStorageG, 0);
  assertClose(result.carbon.embodiedCpuG, 1_672_000 * (2 / 40) / HOURS_PER_LIFETIME);
  assert.equal(result.vcpusAllocated, 2);
  assert.equal(result.memoryGb, 4);
});

test("application: more vCPUs than the host has is an invalid sample", () => {
  const sample = makeSample({ instanceClass: "Test_D4", vcpusAllocated: 41 });
  assert.throws(() => processSample(sample, testPipeline("application")), InvalidSample);
  assert.equal(processSample(makeSample({ vcpusAllocated: 40 }), testPipeline("application")).vcpusAllocated, 40);

  const stats = new RunStats();
  assert.equal([...processSamples([sample], testPipeline("application"), stats)].length, 0);
  assert.deepEqual(stats.toJSON().skippedByCode, { INVALID_SAMPLE: 1 });
});

test("createPipeline rejects an unknown variant", () => {
  assert.equal(isPipelineVariant("application"), true);
  assert.equal(isPipelineVariant("batch"), false);
  const profiles = new HardwareProfileResolver([]);
  assert.throws(() => Reflect.apply(createPipeline, undefined, [createCoefficientSet(), profiles, "batch"]), ConfigurationError);
});

test("utilization above 100% is clamped", () => {
  const result = processSample(makeSample({ cpuUtilizationPct: 140 }), testPipeline());
  assert.equal(result.sample.cpuUtilizationPct, 100);
  assertClose(result.power.cpuPowerKw, 1.02 * 200 / 1000);
});

test("processSample is deterministic and returns frozen records", () => {
  const pipeline = testPipeline();
  const sample = makeSample({ storageRequestedGb: 20 });
  const first = processSample(sample, pipeline);
  const second = processSample(sample, pipeline);
  assert.deepEqual(first, second);
  assert.ok(Object.isFrozen(first));
  assert.ok(Object.isFrozen(first.carbon));
  assert.ok(Object.isFrozen(first.energy));
});

test("validateSample rejects invalid samples", () => {
  assert.throws(() => validateSample(makeSample({ durationS: 0 })), InvalidSample);
  assert.throws(() => validateSample(makeSample({ memoryRequestedGb: -1 })), /memoryRequestedGb/);
  assert.throws(() => validateSample(makeSample({ cpuUtilizationPct: Number.NaN })), /cpuUtilizationPct/);
  assert.throws(() => validateSample(makeSample({ timestamp: "yesterday" })), /unparseable timestamp/);
  assert.throws(() => validateSample(makeSample({ resourceId: "" })), /resourceId is required/);
});

test("processSamples skips recoverable failures and counts them", () => {
  const stats = new RunStats();
  const samples = [
    makeSample({ resourceId: "vm-1" }),
    makeSample({ resourceId: "vm-2", instanceClass: "Nope_1" }),
    makeSample({ resourceId: "vm-3", durationS: -5 }),
    makeSample({ resourceId: "vm-4", region: "marsnorth" }),
  ];
  const processed = [...processSamples(samples, testPipeline(), stats)];

  assert.deepEqual(processed.map((p) => p.sample.resourceId), ["vm-1", "vm-4"]);
  assert.deepEqual(stats.toJSON(), {
    processed: 2,
    skipped: 2,
    skippedByCode: { PROFILE_NOT_FOUND: 1, INVALID_SAMPLE: 1 },
    unknownInstanceClasses: { Nope_1: 1 },
    gridFallbackRegions: { marsnorth: 1 },
  });
});

test("processSamples skips unknown regions when the fallback is disabled", () => {
  const stats = new RunStats();
  const processed = [...processSamples([makeSample({ region: "marsnorth" })], testPipeline("infrastructure", { defaultGridIntensity: null }), stats)];
  assert.equal(processed.length, 0);
  assert.deepEqual(stats.toJSON().skippedByCode, { UNKNOWN_GRID_INTENSITY: 1 });
});

test("processSamples rethrows configuration errors", () => {
  const pipeline = createPipeline(
    createCoefficientSet(),
    new HardwareProfileResolver([{ instanceClass: "Broken", tdpWatts: 100, vcpusTotal: 0, memoryGb: 1 }]),
    "application",
  );
  assert.throws(() => [...processSamples([makeSample({ instanceClass: "Broken", vcpusAllocated: 0 })], pipeline)], ConfigurationError);
});

test("RunStats.merge adds counters", () => {
  const a = new RunStats();
  const b = new RunStats();
  const sample = makeSample({ instanceClass: "Nope_1" });
  a.recordSkipped("PROFILE_NOT_FOUND", sample);
  b.recordSkipped("PROFILE_NOT_FOUND", sample);
  b.recordSkipped("INVALID_SAMPLE", sample);
  a.merge(b);
  assert.equal(a.skipped, 3);
  assert.equal(a.skippedByCode.get("PROFILE_NOT_FOUND"), 2);
  assert.equal(a.unknownInstanceClasses.get("Nope_1"), 2);
});
