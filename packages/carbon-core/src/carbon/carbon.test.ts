import test from "node:test";
import assert from "node:assert/strict";
import { createCoefficientSet } from "../config/coefficients.js";
import { ConfigurationError, UnknownGridIntensity } from "../errors/errors.js";
import { estimateEmbodied } from "./EmbodiedCarbonEstimator.js";
import { OperationalCarbonEstimator } from "./OperationalCarbonEstimator.js";
import { assertClose } from "../../../../utils/test-utils.js";

test("operational: energy x regional grid intensity", () => {
  const estimator = new OperationalCarbonEstimator(createCoefficientSet());
  const result = estimator.estimate(0.1126, "francecentral");
  assertClose(result.operationalG, 4.9544, 1e-9);
  assert.equal(result.gridIntensity, 44);
  assert.equal(result.fallback, false);
});

test("operational: region lookup ignores case and surrounding spaces", () => {
  const estimator = new OperationalCarbonEstimator(createCoefficientSet());
  assert.equal(estimator.gridIntensity(" WestEurope ").value, 253);
});

test("operational: unknown region uses the configured default", () => {
  const estimator = new OperationalCarbonEstimator(createCoefficientSet());
  const result = estimator.estimate(2, "marsnorth");
  assert.equal(result.gridIntensity, 281);
  assert.equal(result.operationalG, 562);
  assert.equal(result.fallback, true);
});

test("operational: unknown region without a default fails", () => {
  const estimator = new OperationalCarbonEstimator(createCoefficientSet({ defaultGridIntensity: null }));
  assert.throws(() => estimator.estimate(1, "marsnorth"), UnknownGridIntensity);
});

test("embodied: prorated by vcpu share and lifetime", () => {
  const coeffs = createCoefficientSet();
  const result = estimateEmbodied({ vcpusAllocated: 4, vcpusTotal: 40, storageGb: 100, durationS: 3600 }, coeffs);
  assertClose(result.embodiedCpuG, 1_672_000 * 0.1 / 35_064);
  assertClose(result.embodiedStorageG, 100 * 90 / 35_064);
  assertClose(result.embodiedTotalG, result.embodiedCpuG + result.embodiedStorageG);
});

test("embodied: ssd storage uses its own coefficient", () => {
  const coeffs = createCoefficientSet();
  const result = estimateEmbodied({ vcpusAllocated: 0, vcpusTotal: 8, storageGb: 10, storageMedia: "ssd", durationS: 7200 }, coeffs);
  assert.equal(result.embodiedCpuG, 0);
  assertClose(result.embodiedStorageG, 10 * 160 * 2 / 35_064);
});

test("embodied: a full lifetime on the whole host is the full device embodied", () => {
  const coeffs = createCoefficientSet({ device: { lifespanHours: 10 } });
  const result = estimateEmbodied({ vcpusAllocated: 8, vcpusTotal: 8, storageGb: 0, durationS: 36_000 }, coeffs);
  assertClose(result.embodiedCpuG, 1_672_000);
});

test("embodied: zero host vcpus is a configuration error", () => {
  assert.throws(
    () => estimateEmbodied({ vcpusAllocated: 1, vcpusTotal: 0, storageGb: 0, durationS: 3600 }, createCoefficientSet()),
    ConfigurationError,
  );
});
