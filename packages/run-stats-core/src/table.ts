import { aggregateRecords, sumStats } from './aggregate.js';
import { EmptyRecordsError } from './errors.js';
import { comparisonColumn, getKeyIndex } from './keys.js';
import { displayColumns, projectRow } from './modes.js';
import { findAlignmentIndex } from './search.js';
import { isStatsRecord, RECORD_WIDTH } from './types.js';
import type { AggregateStats, ColumnAccessor, DisplayMode, Run, StatsRecord, StatsRow, StatsTable } from './types.js';

/** `'last'` aligns every run at the smallest final value. */
export type CompareAt = number | 'last';

export interface CompareOptions {
  readonly key: string;
  readonly at?: CompareAt;
}

export interface StatsTableOptions {
  readonly mode: DisplayMode;
  readonly compare?: CompareOptions;
  readonly sortBy?: string;
  readonly ascending?: boolean;
}

interface RunSnapshot {
  readonly row: StatsRow;
  readonly record: StatsRecord;
  readonly stats: AggregateStats;
}

export function resolveCompareTarget(runs: readonly Run[], compare: CompareOptions): number {
  const column = comparisonColumn(compare.key);
  if (typeof compare.at === 'number') {
    return compare.at;
  }
  const finals = runs.map((run) => column(run.records.at(-1)));
  if (compare.at === 'last') {
    return Math.min(...finals);
  }
  return finals[0];
}

export function sumRecords(records: readonly StatsRecord[]): StatsRecord {
  const totals = new Array<number>(RECORD_WIDTH).fill(0);
  for (const record of records) {
    record.forEach((value, index) => {
      totals[index] += value;
    });
  }
  if (!isStatsRecord(totals)) {
    throw new Error(`record width mismatch, expected ${RECORD_WIDTH} fields`);
  }
  return totals;
}

function snapshotRun(run: Run, mode: DisplayMode, alignment?: { column: ColumnAccessor; target: number }): RunSnapshot {
  const index = alignment ? findAlignmentIndex(run.records, alignment.column, alignment.target) : run.records.length - 1;
  const stats = aggregateRecords(run.records, index + 1);
  const record = run.records.at(index);
  return {
    row: { label: run.label, values: projectRow(record, stats, mode).values },
    record,
    stats,
  };
}

// NaN ranks after every number in both directions.
function compareCells(left: string | number, right: string | number, direction: number): number {
  if (typeof left === 'number' && typeof right === 'number') {
    const leftNaN = Number.isNaN(left);
    const rightNaN = Number.isNaN(right);
    if (leftNaN || rightNaN) {
      return Number(leftNaN) - Number(rightNaN);
    }
    return (left < right ? -1 : left > right ? 1 : 0) * direction;
  }
  const a = String(left);
  const b = String(right);
  return (a < b ? -1 : a > b ? 1 : 0) * direction;
}

function sortRows(rows: readonly StatsRow[], labels: readonly string[], sortBy: string, ascending: boolean): StatsRow[] {
  const index = getKeyIndex(sortBy, labels);
  const cell = (row: StatsRow): string | number => (index === 0 ? row.label : row.values[index - 1]);
  const direction = ascending ? 1 : -1;
  return rows
    .map((row, position) => ({ row, position }))
    .sort((left, right) => compareCells(cell(left.row), cell(right.row), direction) || left.position - right.position)
    .map((entry) => entry.row);
}

export function buildStatsTable(runs: readonly Run[], options: StatsTableOptions): StatsTable {
  const columns = displayColumns(options.mode);
  const labels = columns.map((entry) => entry.label);
  for (const run of runs) {
    if (run.records.length === 0) {
      throw new EmptyRecordsError(`run ${run.label} has no records`);
    }
  }
  // validate the sort key before any record is decoded
  if (options.sortBy !== undefined) {
    getKeyIndex(options.sortBy, labels);
  }

  const alignment = options.compare
    ? { column: comparisonColumn(options.compare.key), target: resolveCompareTarget(runs, options.compare) }
    : undefined;
  const snapshots = runs.map((run) => snapshotRun(run, options.mode, alignment));

  const rows = snapshots.map((snapshot) => snapshot.row);
  const sorted = options.sortBy !== undefined ? sortRows(rows, labels, options.sortBy, options.ascending ?? false) : rows;

  if (snapshots.length <= 1) {
    return { mode: options.mode, columns, rows: sorted };
  }

  // percentages and averages are summed as they are
  const totalRecord = sumRecords(snapshots.map((snapshot) => snapshot.record));
  const totalStats = sumStats(snapshots.map((snapshot) => snapshot.stats));
  const total: StatsRow = {
    label: `Total (${snapshots.length})`,
    values: projectRow(totalRecord, totalStats, options.mode).values,
  };
  return { mode: options.mode, columns, rows: sorted, total };
}
