import test from "node:test";
import assert from "node:assert/strict";
import type { AggregatedSeries, BucketValues } from "../aggregate/Aggregator.js";
import { METRIC_NAMES, zeroMetrics, type MetricValues } from "../aggregate/metrics.js";
import { composeSeries, roundTo } from "./ResultComposer.js";
import { composeReportRows, type ResourceMetadata } from "./reportRows.js";

const T0 = Date.parse("2024-05-01T00:00:00Z");
const T1 = Date.parse("2024-05-01T01:00:00Z");

function bucket(startMs: number, samples: number, values: Partial<MetricValues>): BucketValues {
  return { startMs, samples, filled: samples === 0, values: { ...zeroMetrics(), ...values } };
}

const aggregated: AggregatedSeries[] = [
  {
    groupKey: "app-a",
    buckets: [
      bucket(T0, 3, { totalG: 1.23456, energyKwh: 0.000041, cpuUtilizationPct: 10 }),
      bucket(T1, 1, { totalG: 2.00004, energyKwh: 0.00002, cpuUtilizationPct: 50 }),
    ],
  },
];

test("roundTo keeps the requested number of decimals", () => {
  assert.equal(roundTo(1.23456, 4), 1.2346);
  assert.equal(roundTo(2.00004, 4), 2);
  assert.equal(roundTo(5, 2), 5);
});

test("composeSeries: parallel series rounded to 4 decimals", () => {
  const [group] = composeSeries(aggregated);
  assert.equal(group.groupKey, "app-a");
  assert.deepEqual(group.timestamps, ["2024-05-01T00:00:00.000Z", "2024-05-01T01:00:00.000Z"]);
  assert.deepEqual(group.samples, [3, 1]);
  assert.deepEqual(group.series.totalG, [1.2346, 2]);
  assert.deepEqual(group.series.energyKwh, [0, 0]);
  assert.deepEqual(group.series.embodiedG, [0, 0]);
});

test("composeSeries: every metric is present", () => {
  const [group] = composeSeries(aggregated);
  assert.deepEqual(Object.keys(group.series).sort(), [...METRIC_NAMES].sort());
  assert.deepEqual(Object.keys(group.totals).sort(), [...METRIC_NAMES].sort());
});

test("composeSeries: totals sum the unrounded bucket values", () => {
  const [group] = composeSeries(aggregated);
  assert.equal(group.totals.totalG, 3.2346);
  // both buckets round to 0 on their own, their sum does not
  assert.deepEqual(group.series.energyKwh, [0, 0]);
  assert.equal(group.totals.energyKwh, 0.0001);
});

test("composeSeries: many small buckets add up", () => {
  const buckets = Array.from({ length: 120 }, (_, i) => bucket(T0 + i * 60_000, 1, { energyKwh: 0.00003 }));
  const [group] = composeSeries([{ groupKey: "pod-1", buckets }]);
  assert.ok(group.series.energyKwh.every((value) => value === 0));
  assert.equal(group.totals.energyKwh, 0.0036);
});

test("composeSeries: totals stay within rounding of the series sum", () => {
  const [group] = composeSeries(aggregated);
  for (const metric of METRIC_NAMES) {
    if (metric === "cpuUtilizationPct") continue;
    const seriesSum = group.series[metric].reduce((acc, v) => acc + v, 0);
    assert.ok(Math.abs(group.totals[metric] - seriesSum) <= group.series[metric].length * 0.00005 + 0.00005, metric);
  }
});

test("composeSeries: carried-forward buckets are not counted in totals", () => {
  const used = bucket(T0, 1, { energyKwh: 0.5, totalG: 2, cpuUtilizationPct: 40 });
  const carried: BucketValues = { startMs: T1, samples: 0, filled: true, values: used.values };
  const [group] = composeSeries([{ groupKey: "app-a", buckets: [used, carried, { ...carried, startMs: T1 + 3_600_000 }] }]);
  assert.deepEqual(group.series.energyKwh, [0.5, 0.5, 0.5]);
  assert.equal(group.totals.energyKwh, 0.5);
  assert.equal(group.totals.totalG, 2);
  assert.equal(group.totals.cpuUtilizationPct, 40);
});

test("composeSeries: utilization total is weighted by samples", () => {
  const [group] = composeSeries(aggregated);
  assert.equal(group.totals.cpuUtilizationPct, 20);
});

test("composeSeries: custom precision", () => {
  const [group] = composeSeries(aggregated, { precision: 1 });
  assert.deepEqual(group.series.totalG, [1.2, 2]);
  assert.equal(group.totals.totalG, 3.2);
});

test("composeSeries: a group with only filled buckets has zero totals", () => {
  const [group] = composeSeries([{ groupKey: "idle", buckets: [bucket(T0, 0, {})] }]);
  assert.equal(group.totals.cpuUtilizationPct, 0);
  assert.equal(group.totals.totalG, 0);
});

const metadata = (id: string, gridIntensity?: number): ResourceMetadata => ({
  resourceType: "VM",
  id,
  name: `name-${id}`,
  region: "francecentral",
  subscription: "sub-1",
  instanceClass: "Test_D4",
  service: "billing",
  instance: "",
  environment: "prod",
  partition: "",
  component: "",
  gridIntensity,
});

test("composeReportRows: filled buckets are skipped", () => {
  const used = bucket(T0, 1, { energyKwh: 0.25, totalG: 1 });
  const rows = composeReportRows(
    [{ groupKey: "vm-1", buckets: [used, { startMs: T1, samples: 0, filled: true, values: used.values }] }],
    new Map([["vm-1", metadata("vm-1", 44)]]),
    "2024-05-03",
  );
  assert.equal(rows[0].energyKwh, 0.25);
  assert.equal(rows[0].totalG, 1);
});

test("composeReportRows: one row per resource with samples", () => {
  const series: AggregatedSeries[] = [
    { groupKey: "vm-2", buckets: [bucket(T0, 2, { energyKwh: 0.5, operationalG: 22, embodiedG: 1.00001, totalG: 23.00001 })] },
    { groupKey: "vm-1", buckets: [bucket(T0, 1, { energyKwh: 0.25, operationalG: 11, embodiedG: 0.5, totalG: 11.5 }), bucket(T1, 1, { energyKwh: 0.25, operationalG: 11, embodiedG: 0.5, totalG: 11.5 })] },
    { groupKey: "vm-idle", buckets: [bucket(T0, 0, {})] },
    { groupKey: "vm-unknown", buckets: [bucket(T0, 1, { totalG: 1 })] },
  ];
  const rows = composeReportRows(
    series,
    new Map([["vm-1", metadata("vm-1", 44)], ["vm-2", metadata("vm-2", 44)], ["vm-idle", metadata("vm-idle")]]),
    "2024-05-03",
  );

  assert.deepEqual(rows.map((r) => r.id), ["vm-1", "vm-2"]);
  assert.deepEqual(rows[0], {
    date: "2024-05-03",
    resourceType: "VM",
    id: "vm-1",
    name: "name-vm-1",
    region: "francecentral",
    subscription: "sub-1",
    energyKwh: 0.5,
    operationalG: 22,
    embodiedG: 1,
    totalG: 23,
    gridIntensity: 44,
    instanceClass: "Test_D4",
    service: "billing",
    instance: "",
    environment: "prod",
    partition: "",
    component: "",
  });
  assert.equal(rows[1].embodiedG, 1);
  assert.equal(rows[1].totalG, 23);
});
