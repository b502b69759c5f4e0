import test from "node:test";
import assert from "node:assert/strict";
import { createCoefficientSet } from "../config/coefficients.js";
import { computeEnergy, computePower } from "./PowerEnergyConverter.js";
import { assertClose } from "../../../../utils/test-utils.js";

const coeffs = createCoefficientSet();

const base = {
  cpuUtilizationPct: 50,
  tdpWatts: 200,
  cpuShare: 1,
  memoryGb: 16,
  storageGb: 100,
  durationS: 3600,
};

test("computePower: cpu, memory and storage draw", () => {
  const power = computePower(base, coeffs);
  assertClose(power.cpuPowerKw, 0.15);
  assertClose(power.memoryPowerKw, 0.006272);
  assertClose(power.storagePowerKw, 0.0000925);
});

test("computePower: idle cpu still draws the first curve ratio", () => {
  const power = computePower({ ...base, cpuUtilizationPct: 0 }, coeffs);
  assertClose(power.cpuPowerKw, 0.12 * 200 / 1000);
});

test("computePower: cpu share scales the TDP", () => {
  const power = computePower({ ...base, cpuShare: 0.1 }, coeffs);
  assertClose(power.cpuPowerKw, 0.015);
});

test("computePower: storage media selects the coefficient", () => {
  assertClose(computePower({ ...base, storageMedia: "ssd" }, coeffs).storagePowerKw, 100 * 0.0012 / 1000);
  assertClose(computePower({ ...base, storageMedia: "hdd" }, coeffs).storagePowerKw, 100 * 0.00065 / 1000);
});

test("computeEnergy: energy is power x hours, adjusted by PUE", () => {
  const { energy } = computeEnergy(base, coeffs);
  assertClose(energy.cpuEnergyKwh, 0.15);
  assertClose(energy.totalEnergyKwh, 0.1563645);
  assertClose(energy.energyAdjustedKwh, 0.1563645 * 1.185);
  assertClose(energy.energyAdjustedKwh, energy.totalEnergyKwh * coeffs.pue);
});

test("computeEnergy: half the duration gives half the energy", () => {
  const full = computeEnergy(base, coeffs).energy;
  const half = computeEnergy({ ...base, durationS: 1800 }, coeffs).energy;
  assertClose(half.totalEnergyKwh * 2, full.totalEnergyKwh);
});

test("computeEnergy: zero memory and storage leave only cpu", () => {
  const { energy } = computeEnergy({ ...base, memoryGb: 0, storageGb: 0 }, coeffs);
  assert.equal(energy.memoryEnergyKwh, 0);
  assert.equal(energy.storageEnergyKwh, 0);
  assert.equal(energy.totalEnergyKwh, energy.cpuEnergyKwh);
});
