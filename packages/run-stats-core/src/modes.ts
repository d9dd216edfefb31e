import { bytesToMegabytes } from './aggregate.js';
import type { AggregateStats, ColumnKind, ColumnSpec, DisplayMode, DisplayRow, StatsRecord } from './types.js';

export const DISPLAY_MODES: readonly DisplayMode[] = ['full', 'relative-time', 'absolute-time', 'extended', 'default'];

export const PATH_COLUMN: ColumnSpec = { label: 'Path', kind: 'text' };

/** Values derived once from a record and its prefix stats; every column reads from here. */
export interface RunMetrics {
  readonly instructions: number;
  readonly wallTime: number;
  readonly userTime: number;
  readonly solverTime: number;
  readonly cexCacheTime: number;
  readonly forkTime: number;
  readonly resolveTime: number;
  readonly instructionCoverage: number;
  readonly branchCoverage: number;
  readonly instructionCount: number;
  readonly states: number;
  readonly memory: number;
  readonly queries: number;
  readonly avgQueryConstructs: number;
  readonly maxStates: number;
  readonly avgStates: number;
  readonly maxMemory: number;
  readonly avgMemory: number;
}

export function deriveMetrics(record: StatsRecord, stats: AggregateStats): RunMetrics {
  const [
    instructions,
    fullBranches,
    partialBranches,
    numBranches,
    userTime,
    states,
    mallocUsage,
    queries,
    queryConstructs,
    ,
    wallTime,
    covered,
    uncovered,
    ,
    solverTime,
    cexCacheTime,
    forkTime,
    resolveTime,
  ] = record;

  // straight-line code has no branches and counts as fully covered
  const branchCoverage = numBranches === 0 ? 100 : (100 * (2 * fullBranches + partialBranches)) / (2 * numBranches);

  return {
    instructions,
    wallTime,
    userTime,
    solverTime,
    cexCacheTime,
    forkTime,
    resolveTime,
    instructionCoverage: (100 * covered) / (covered + uncovered),
    branchCoverage,
    instructionCount: covered + uncovered,
    states,
    memory: bytesToMegabytes(mallocUsage),
    queries,
    avgQueryConstructs: Math.trunc(queryConstructs / Math.max(1, queries)),
    maxStates: stats.maxStates,
    avgStates: stats.avgStates,
    maxMemory: stats.maxMemory,
    avgMemory: stats.avgMemory,
  };
}

interface ProjectedColumn extends ColumnSpec {
  readonly value: (metrics: RunMetrics) => number;
}

function column(label: string, kind: ColumnKind, value: (metrics: RunMetrics) => number): ProjectedColumn {
  return { label, kind, value };
}

function relative(time: (metrics: RunMetrics) => number): (metrics: RunMetrics) => number {
  return (metrics) => (100 * time(metrics)) / metrics.wallTime;
}

const INSTRS = column('Instrs', 'integer', (m) => m.instructions);
const TIME = column('Time(s)', 'decimal', (m) => m.wallTime);
const ICOV = column('ICov(%)', 'decimal', (m) => m.instructionCoverage);
const BCOV = column('BCov(%)', 'decimal', (m) => m.branchCoverage);
const ICOUNT = column('ICount', 'integer', (m) => m.instructionCount);
const TSOLVER_REL = column('TSolver(%)', 'decimal', relative((m) => m.solverTime));
const STATES = column('States', 'integer', (m) => m.states);
const MAX_STATES = column('maxStates', 'integer', (m) => m.maxStates);
const AVG_STATES = column('avgStates', 'decimal', (m) => m.avgStates);
const MEM = column('Mem(MB)', 'decimal', (m) => m.memory);
const MAX_MEM = column('maxMem(MB)', 'decimal', (m) => m.maxMemory);
const AVG_MEM = column('avgMem(MB)', 'decimal', (m) => m.avgMemory);
const QUERIES = column('Queries', 'integer', (m) => m.queries);
const AVG_QC = column('AvgQC', 'integer', (m) => m.avgQueryConstructs);
const TCEX_REL = column('Tcex(%)', 'decimal', relative((m) => m.cexCacheTime));
const TFORK_REL = column('Tfork(%)', 'decimal', relative((m) => m.forkTime));

const MODE_COLUMNS: Readonly<Record<DisplayMode, readonly ProjectedColumn[]>> = {
  full: [
    INSTRS,
    TIME,
    ICOV,
    BCOV,
    ICOUNT,
    TSOLVER_REL,
    STATES,
    MAX_STATES,
    AVG_STATES,
    MEM,
    MAX_MEM,
    AVG_MEM,
    QUERIES,
    AVG_QC,
    TCEX_REL,
    TFORK_REL,
  ],
  'relative-time': [
    column('TUser(%)', 'decimal', relative((m) => m.userTime)),
    TSOLVER_REL,
    TCEX_REL,
    TFORK_REL,
    column('TResolve(%)', 'decimal', relative((m) => m.resolveTime)),
  ],
  'absolute-time': [
    TIME,
    column('TUser(s)', 'decimal', (m) => m.userTime),
    column('TSolver(s)', 'decimal', (m) => m.solverTime),
    column('Tcex(s)', 'decimal', (m) => m.cexCacheTime),
    column('Tfork(s)', 'decimal', (m) => m.forkTime),
    column('TResolve(s)', 'decimal', (m) => m.resolveTime),
  ],
  extended: [INSTRS, TIME, ICOV, BCOV, ICOUNT, TSOLVER_REL, STATES, MAX_STATES, MEM, MAX_MEM],
  default: [INSTRS, TIME, ICOV, BCOV, ICOUNT, TSOLVER_REL],
};

/** Columns of a mode, `Path` first. */
export function displayColumns(mode: DisplayMode): readonly ColumnSpec[] {
  return [PATH_COLUMN, ...MODE_COLUMNS[mode].map(({ label, kind }) => ({ label, kind }))];
}

export function projectRow(record: StatsRecord, stats: AggregateStats, mode: DisplayMode): DisplayRow {
  const metrics = deriveMetrics(record, stats);
  return {
    mode,
    values: MODE_COLUMNS[mode].map((entry) => entry.value(metrics)),
  };
}

export interface DisplayModeFlags {
  readonly printAll?: boolean;
  readonly printRelTimes?: boolean;
  readonly printAbsTimes?: boolean;
  readonly printMore?: boolean;
}

export function resolveDisplayMode(flags: DisplayModeFlags): DisplayMode {
  if (flags.printAll) {
    return 'full';
  }
  if (flags.printRelTimes) {
    return 'relative-time';
  }
  if (flags.printAbsTimes) {
    return 'absolute-time';
  }
  if (flags.printMore) {
    return 'extended';
  }
  return 'default';
}
