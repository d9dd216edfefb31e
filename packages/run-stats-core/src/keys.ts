import { InvalidKeyError } from './errors.js';
import { fieldIndex } from './types.js';
import type { ColumnAccessor, RecordField } from './types.js';

// `Time(s)` -> `time`, `maxMem(MB)` -> `maxmem`
function shortName(label: string): string {
  return label.replace(/\W.*$/, '').toLowerCase();
}

/**
 * Case-insensitive position of `key` in `labels`. A key matches a label exactly
 * or by the name before its unit, so `Time` finds `Time(s)`.
 */
export function getKeyIndex(key: string, labels: readonly string[]): number {
  const normalized = key.toLowerCase();
  let index = labels.findIndex((label) => label.toLowerCase() === normalized);
  if (index < 0) {
    index = labels.findIndex((label) => shortName(label) === normalized);
  }
  if (index < 0) {
    throw new InvalidKeyError(key, labels);
  }
  return index;
}

// Only columns that never decrease over a run can serve as an alignment axis.
const COMPARABLE_COLUMNS: ReadonlyArray<readonly [label: string, field: RecordField]> = [
  ['Instrs', 'Instructions'],
  ['Queries', 'NumQueries'],
  ['Time', 'WallTime'],
  ['ICov', 'CoveredInstructions'],
];

export const COMPARABLE_KEYS: readonly string[] = COMPARABLE_COLUMNS.map(([label]) => label);

export function comparisonColumn(key: string): ColumnAccessor {
  const [, field] = COMPARABLE_COLUMNS[getKeyIndex(key, COMPARABLE_KEYS)];
  const index = fieldIndex(field);
  return (record) => record[index];
}
