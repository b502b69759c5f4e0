import assert from 'node:assert/strict';
import { join } from 'node:path';
import { mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import {
    createCoefficientSet,
    createPipeline,
    HardwareProfileResolver,
    type CarbonPipeline,
    type CoefficientOverrides,
    type HardwareProfile,
    type PipelineVariant,
    type UsageSample,
} from '@carbonmeter/core';

export const TEST_PROFILES: readonly HardwareProfile[] = [
    { instanceClass: 'Test_D4', tdpWatts: 200, vcpusTotal: 40, vcpusAllocated: 4, memoryGb: 16 },
    { instanceClass: 'Test_E8', tdpWatts: 300, vcpusTotal: 60, memoryGb: 64 },
];

export function assertClose(actual: number, expected: number, epsilon = 1e-9) {
    assert.ok(
        Math.abs(actual - expected) <= epsilon,
        `expected ${actual} to be within ${epsilon} of ${expected}`,
    );
}

export function makeSample(overrides: Partial<UsageSample> = {}): UsageSample {
    return {
        timestamp: '2024-05-01T00:00:00Z',
        resourceId: 'vm-1',
        instanceClass: 'Test_D4',
        region: 'francecentral',
        cpuUtilizationPct: 50,
        memoryRequestedGb: 0,
        storageRequestedGb: 0,
        vcpusAllocated: 0,
        durationS: 3600,
        groupingKey: 'app-a',
        ...overrides,
    };
}

export function testPipeline(variant: PipelineVariant = 'infrastructure', overrides: CoefficientOverrides = {}): CarbonPipeline {
    return createPipeline(createCoefficientSet(overrides), new HardwareProfileResolver(TEST_PROFILES), variant);
}

export async function createTempDir(prefix: string): Promise<string> {
    return mkdtemp(join(tmpdir(), prefix));
}

export const USAGE_CSV_HEADER = 'Time,Id,Size,Region,Service,Component,Subscription,Name,Instance,Environment,Partition,AverageCpuPercentage,DiskSizeGb';

export interface UsageCsvRow {
    time: string;
    id: string;
    size?: string;
    region?: string;
    service?: string;
    name?: string;
    cpu?: number | string;
    diskGb?: number | string;
}

export function usageCsvLine(row: UsageCsvRow): string {
    return [
        row.time,
        row.id,
        row.size ?? 'Test_D4',
        row.region ?? 'francecentral',
        row.service ?? 'billing',
        '-',
        'sub-1',
        row.name ?? row.id,
        '-',
        'prod',
        '-',
        String(row.cpu ?? 50),
        String(row.diskGb ?? 0),
    ].join(',');
}

export async function writeUsageCsv(dir: string, fileName: string, rows: readonly UsageCsvRow[], header = USAGE_CSV_HEADER) {
    await mkdir(dir, { recursive: true });
    const file = join(dir, fileName);
    const lines = [header, ...rows.map(usageCsvLine)];
    await writeFile(file, `${lines.join('\n')}\n`, 'utf8');
    return file;
}
