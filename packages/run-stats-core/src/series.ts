import { aggregateRecords } from './aggregate.js';
import { EmptyRecordsError } from './errors.js';
import { getKeyIndex } from './keys.js';
import { displayColumns, projectRow } from './modes.js';
import type { DisplayMode, Run } from './types.js';

export interface ChartSeries {
  readonly title: string;
  readonly values: readonly number[];
}

/** Record indices sampled every `interval` lines; the final record is always included. */
export function sampleIndices(length: number, interval: number): number[] {
  if (!Number.isInteger(interval) || interval <= 0) {
    throw new RangeError(`sample interval must be a positive integer, received ${interval}`);
  }
  const indices: number[] = [];
  for (let index = 0; index < length; index += interval) {
    indices.push(index);
  }
  if (length > 0 && indices[indices.length - 1] !== length - 1) {
    indices.push(length - 1);
  }
  return indices;
}

export function buildChartSeries(
  run: Run,
  mode: DisplayMode,
  columns: readonly string[],
  interval: number,
): ChartSeries[] {
  const labels = displayColumns(mode)
    .slice(1)
    .map((entry) => entry.label);
  const selected = columns.map((key) => getKeyIndex(key, labels));
  if (run.records.length === 0) {
    throw new EmptyRecordsError(`run ${run.label} has no records`);
  }

  const rows = sampleIndices(run.records.length, interval).map((index) => {
    const stats = aggregateRecords(run.records, index + 1);
    return projectRow(run.records.at(index), stats, mode).values;
  });

  return selected.map((columnIndex) => ({
    title: labels[columnIndex],
    values: rows.map((values) => values[columnIndex]),
  }));
}
