import { EmptyRecordsError } from './errors.js';
import { fieldIndex } from './types.js';
import type { AggregateStats, RecordSequence } from './types.js';

const MEMORY_INDEX = fieldIndex('MallocUsage');
const STATES_INDEX = fieldIndex('NumStates');

export function bytesToMegabytes(bytes: number): number {
  return bytes / 1024 / 1024;
}

/** Aggregates the first `count` records; only that prefix is decoded. */
export function aggregateRecords(records: RecordSequence, count: number = records.length): AggregateStats {
  const end = Math.min(count, records.length);
  if (end <= 0) {
    throw new EmptyRecordsError();
  }

  let maxMemory = -Infinity;
  let sumMemory = 0;
  let maxStates = -Infinity;
  let sumStates = 0;
  for (let i = 0; i < end; i++) {
    const record = records.at(i);
    const memory = record[MEMORY_INDEX];
    const states = record[STATES_INDEX];
    maxMemory = Math.max(maxMemory, memory);
    sumMemory += memory;
    maxStates = Math.max(maxStates, states);
    sumStates += states;
  }

  return {
    maxMemory: bytesToMegabytes(maxMemory),
    avgMemory: bytesToMegabytes(sumMemory / end),
    maxStates,
    avgStates: sumStates / end,
  };
}

export function sumStats(stats: readonly AggregateStats[]): AggregateStats {
  return stats.reduce<AggregateStats>(
    (acc, entry) => ({
      maxMemory: acc.maxMemory + entry.maxMemory,
      avgMemory: acc.avgMemory + entry.avgMemory,
      maxStates: acc.maxStates + entry.maxStates,
      avgStates: acc.avgStates + entry.avgStates,
    }),
    { maxMemory: 0, avgMemory: 0, maxStates: 0, avgStates: 0 },
  );
}
