import { EmptyRecordsError } from './errors.js';
import type { ColumnAccessor, RecordSequence } from './types.js';

/**
 * Returns the first index whose column value exceeds `target`, or the last
 * index when none does. `column` must be non-decreasing over `records`.
 */
export function findAlignmentIndex(records: RecordSequence, column: ColumnAccessor, target: number): number {
  if (records.length === 0) {
    throw new EmptyRecordsError('cannot align an empty record sequence');
  }
  let lo = 0;
  let hi = records.length - 1;
  while (lo < hi) {
    const mid = lo + Math.floor((hi - lo) / 2);
    if (column(records.at(mid)) <= target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}
