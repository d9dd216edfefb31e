export {
  RUN_STATS_FORMAT_VERSION,
  RECORD_FIELDS,
  RECORD_WIDTH,
  fieldIndex,
  isStatsRecord,
} from './types.js';
export type {
  AggregateStats,
  ColumnAccessor,
  ColumnKind,
  ColumnSpec,
  DisplayMode,
  DisplayRow,
  RecordField,
  RecordSequence,
  Run,
  StatsRecord,
  StatsRow,
  StatsTable,
} from './types.js';
export {
  EmptyRecordsError,
  InputNotFoundError,
  InvalidKeyError,
  MalformedRecordError,
  RunStatsError,
  UnsupportedComparisonError,
} from './errors.js';
export type { RunStatsErrorCode } from './errors.js';
export { resetEnvCacheForTests, strictEmptyLinesEnabled } from './env.js';
export { parseRecordLine, recordSchema, tokenizeRecordLine, validateRecord } from './format.js';
export type { RecordDecoder, TokenizeResult } from './format.js';
export { RecordStore } from './store.js';
export type { FromTextOptions, PendingLine, RecordStoreOptions } from './store.js';
export { findAlignmentIndex } from './search.js';
export { aggregateRecords, bytesToMegabytes, sumStats } from './aggregate.js';
export {
  DISPLAY_MODES,
  PATH_COLUMN,
  deriveMetrics,
  displayColumns,
  projectRow,
  resolveDisplayMode,
} from './modes.js';
export type { DisplayModeFlags, RunMetrics } from './modes.js';
export { COMPARABLE_KEYS, comparisonColumn, getKeyIndex } from './keys.js';
export { buildStatsTable, resolveCompareTarget, sumRecords } from './table.js';
export type { CompareAt, CompareOptions, StatsTableOptions } from './table.js';
export { buildChartSeries, sampleIndices } from './series.js';
export type { ChartSeries } from './series.js';
