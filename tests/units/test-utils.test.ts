// test-utils.test.ts
import test from 'node:test';
import assert from 'node:assert/strict';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';

import { createTempDir, makeSample, usageCsvLine, USAGE_CSV_HEADER, writeUsageCsv } from '../../utils/test-utils.js';

test('writeUsageCsv writes the header and one line per row', async () => {
  const baseDir = await createTempDir('usage-csv-');

  try {
    const file = await writeUsageCsv(baseDir, 'usage.csv', [
      { time: '2024-05-01T00:00:00Z', id: 'vm-1' },
      { time: '2024-05-01T01:00:00Z', id: 'vm-2', size: 'Test_E8', region: '-', cpu: 12.5, diskGb: 64 },
    ]);

    assert.strictEqual(file, join(baseDir, 'usage.csv'));
    const content = await readFile(file, 'utf8');
    assert.strictEqual(content, [
      USAGE_CSV_HEADER,
      '2024-05-01T00:00:00Z,vm-1,Test_D4,francecentral,billing,-,sub-1,vm-1,-,prod,-,50,0',
      '2024-05-01T01:00:00Z,vm-2,Test_E8,-,billing,-,sub-1,vm-2,-,prod,-,12.5,64',
      '',
    ].join('\n'));
  } finally {
    await rm(baseDir, { recursive: true, force: true });
  }
});

test('usageCsvLine keeps explicit names', () => {
  assert.strictEqual(
    usageCsvLine({ time: 't', id: 'vm-1', name: 'web-01', service: 'search' }),
    't,vm-1,Test_D4,francecentral,search,-,sub-1,web-01,-,prod,-,50,0',
  );
});

test('makeSample applies overrides on a valid one-hour sample', () => {
  const sample = makeSample({ resourceId: 'vm-7', cpuUtilizationPct: 5 });
  assert.strictEqual(sample.resourceId, 'vm-7');
  assert.strictEqual(sample.cpuUtilizationPct, 5);
  assert.strictEqual(sample.durationS, 3600);
  assert.strictEqual(sample.instanceClass, 'Test_D4');
});
