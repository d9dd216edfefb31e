export const RUN_STATS_FORMAT_VERSION = 1 as const;

export const RECORD_FIELDS = [
  'Instructions',
  'FullBranches',
  'PartialBranches',
  'NumBranches',
  'UserTime',
  'NumStates',
  'MallocUsage',
  'NumQueries',
  'NumQueryConstructs',
  'NumObjects',
  'WallTime',
  'CoveredInstructions',
  'UncoveredInstructions',
  'QueryTime',
  'SolverTime',
  'CexCacheTime',
  'ForkTime',
  'ResolveTime',
] as const;

export type RecordField = (typeof RECORD_FIELDS)[number];

export const RECORD_WIDTH = RECORD_FIELDS.length;

/** One snapshot line of a run.stats log. Meaning is fixed by position, see {@link RECORD_FIELDS}. */
export type StatsRecord = readonly [
  instructions: number,
  fullBranches: number,
  partialBranches: number,
  numBranches: number,
  userTime: number,
  numStates: number,
  mallocUsage: number,
  numQueries: number,
  numQueryConstructs: number,
  numObjects: number,
  wallTime: number,
  coveredInstructions: number,
  uncoveredInstructions: number,
  queryTime: number,
  solverTime: number,
  cexCacheTime: number,
  forkTime: number,
  resolveTime: number,
];

export function isStatsRecord(values: readonly number[]): values is StatsRecord {
  return values.length === RECORD_WIDTH;
}

export function fieldIndex(field: RecordField): number {
  return RECORD_FIELDS.indexOf(field);
}

export interface RecordSequence {
  readonly length: number;
  at(index: number): StatsRecord;
}

export interface Run {
  readonly label: string;
  readonly records: RecordSequence;
}

export interface AggregateStats {
  readonly maxMemory: number;
  readonly avgMemory: number;
  readonly maxStates: number;
  readonly avgStates: number;
}

export type DisplayMode = 'full' | 'relative-time' | 'absolute-time' | 'extended' | 'default';

export type ColumnKind = 'text' | 'integer' | 'decimal';

export interface ColumnSpec {
  readonly label: string;
  readonly kind: ColumnKind;
}

export interface DisplayRow {
  readonly mode: DisplayMode;
  readonly values: readonly number[];
}

export interface StatsRow {
  readonly label: string;
  readonly values: readonly number[];
}

export interface StatsTable {
  readonly mode: DisplayMode;
  /** Leading `Path` column included. */
  readonly columns: readonly ColumnSpec[];
  readonly rows: readonly StatsRow[];
  readonly total?: StatsRow;
}

export type ColumnAccessor = (record: StatsRecord) => number;
