import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { RECORD_FIELDS } from '@symstats/run-stats-core';
import type { RecordField } from '@symstats/run-stats-core';
import type { CommandIO } from '../../src/index.js';

const tempDirs: string[] = [];

export async function createTempDir(): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), 'run-stats-'));
  tempDirs.push(dir);
  return dir;
}

export async function removeTempDirs(): Promise<void> {
  await Promise.all(tempDirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
}

export type RecordFields = Partial<Record<RecordField, number>>;

export function recordLine(fields: RecordFields): string {
  return `(${RECORD_FIELDS.map((field) => fields[field] ?? 0).join(', ')})`;
}

export async function writeRun(dir: string, records: readonly RecordFields[], lines: readonly string[] = []): Promise<string> {
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, 'info'), 'test run\n');
  const header = `(${RECORD_FIELDS.map((field) => `'${field}'`).join(', ')})`;
  await writeFile(join(dir, 'run.stats'), `${[header, ...records.map(recordLine), ...lines].join('\n')}\n`);
  return dir;
}

export const RUN_A: readonly RecordFields[] = [
  { Instructions: 100, WallTime: 1, CoveredInstructions: 50, UncoveredInstructions: 50, NumBranches: 4, FullBranches: 1, SolverTime: 0.5 },
  { Instructions: 300, WallTime: 2, CoveredInstructions: 80, UncoveredInstructions: 20, NumBranches: 4, FullBranches: 2, SolverTime: 1 },
];

export const RUN_B: readonly RecordFields[] = [
  { Instructions: 500, WallTime: 4, CoveredInstructions: 30, UncoveredInstructions: 10, SolverTime: 1 },
];

export interface CapturedIO extends CommandIO {
  readonly out: string[];
  readonly err: string[];
}

export function captureIO(): CapturedIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
  };
}
