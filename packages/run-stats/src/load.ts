import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { RecordStore } from '@symstats/run-stats-core';
import type { Run } from '@symstats/run-stats-core';

export const LOG_FILE = 'run.stats';

export function logFilePath(dir: string): string {
  return join(dir, LOG_FILE);
}

export async function loadRun(dir: string, label: string = dir): Promise<Run> {
  const path = logFilePath(dir);
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new Error(`Unable to read ${path}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
  }
  return { label, records: RecordStore.fromText(text) };
}
