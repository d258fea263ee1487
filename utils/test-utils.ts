import { join } from 'node:path';
import { mkdir, writeFile } from 'node:fs/promises';
import assert from 'node:assert/strict';
import type { GovernorConfig, NodeConfig, Task } from '@taskprint/footprint-core';

export const HOUR_MS = 3_600_000;

export function makeTask(overrides: Partial<Task> = {}): Task {
    return {
        id: 't1',
        name: 'PROCESS_A',
        start: 0,
        end: HOUR_MS,
        cpuCount: 1,
        avgCpuUsage: 50,
        cpuModel: 'test-cpu',
        memory: 0,
        hostname: 'node-1',
        ...overrides
    };
}

export function makeNodes(governor: GovernorConfig = {}, memory?: number): NodeConfig {
    return {
        'node-1': {
            memory,
            governors: {
                ondemand: { minWatts: 50, maxWatts: 200, ...governor }
            }
        }
    };
}

export function assertClose(actual: number | undefined, expected: number, epsilon = 1e-9) {
    assert.ok(typeof actual === 'number', `expected a number, got ${actual}`);
    assert.ok(
        Math.abs(actual - expected) <= epsilon,
        `expected ${actual} to be within ${epsilon} of ${expected}`
    );
}

export async function writeFixture(baseDir: string, fileName: string, content: string) {
    await mkdir(baseDir, { recursive: true });
    const filePath = join(baseDir, fileName);
    await writeFile(filePath, content, 'utf8');
    return filePath;
}
