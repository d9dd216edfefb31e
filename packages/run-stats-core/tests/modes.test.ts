import { describe, expect, it } from 'vitest';
import {
  DISPLAY_MODES,
  aggregateRecords,
  displayColumns,
  projectRow,
  resolveDisplayMode,
} from '../src/index.js';
import type { StatsRecord } from '../src/index.js';
import { record, sequenceOf } from './helpers/records.js';

const SAMPLE: StatsRecord = [100, 10, 10, 20, 5.0, 3, 2097152, 50, 100, 0, 4.9, 8, 2, 0, 0.5, 0.3, 0.2, 0.1];
const SAMPLE_STATS = aggregateRecords(sequenceOf([SAMPLE]));

describe('projectRow', () => {
  it('derives the default columns', () => {
    const [instrs, time, icov, bcov, icount, tsolver] = projectRow(SAMPLE, SAMPLE_STATS, 'default').values;
    expect(instrs).toBe(100);
    expect(time).toBe(4.9);
    expect(icov).toBe(80);
    expect(bcov).toBe(75);
    expect(icount).toBe(10);
    expect(tsolver).toBeCloseTo(10.2041, 4);
  });

  it('derives memory, states and query columns in full mode', () => {
    const row = projectRow(SAMPLE, SAMPLE_STATS, 'full');
    expect(row.mode).toBe('full');
    expect(row.values.slice(6, 14)).toEqual([3, 3, 3, 2, 2, 2, 50, 2]);
    expect(row.values[14]).toBeCloseTo(6.12245, 4);
    expect(row.values[15]).toBeCloseTo(4.0816, 4);
  });

  it('reports times relative to wall time', () => {
    const values = projectRow(SAMPLE, SAMPLE_STATS, 'relative-time').values;
    const expected = [102.0408, 10.2041, 6.12245, 4.0816, 2.0408];
    expect(values).toHaveLength(expected.length);
    values.forEach((value, index) => expect(value).toBeCloseTo(expected[index], 4));
  });

  it('reports absolute times unchanged', () => {
    expect(projectRow(SAMPLE, SAMPLE_STATS, 'absolute-time').values).toEqual([4.9, 5, 0.5, 0.3, 0.2, 0.1]);
  });

  it('computes instruction coverage from covered and uncovered counts', () => {
    const value = record({ CoveredInstructions: 10, UncoveredInstructions: 20, WallTime: 1, NumBranches: 1 });
    expect(projectRow(value, SAMPLE_STATS, 'default').values[2]).toBeCloseTo(33.33, 2);
  });

  it('treats code without branches as fully covered', () => {
    const value = record({ NumBranches: 0, FullBranches: 7, PartialBranches: 3, WallTime: 1, CoveredInstructions: 1 });
    expect(projectRow(value, SAMPLE_STATS, 'default').values[3]).toBe(100);
  });

  it('falls back to the construct count when no query ran', () => {
    const value = record({ NumQueries: 0, NumQueryConstructs: 37, WallTime: 1, CoveredInstructions: 1 });
    expect(projectRow(value, SAMPLE_STATS, 'full').values[13]).toBe(37);
  });

  it('truncates the average query construct count', () => {
    const value = record({ NumQueries: 4, NumQueryConstructs: 10, WallTime: 1, CoveredInstructions: 1 });
    expect(projectRow(value, SAMPLE_STATS, 'full').values[13]).toBe(2);
  });

  it('is a pure function of its inputs', () => {
    for (const mode of DISPLAY_MODES) {
      expect(projectRow(SAMPLE, SAMPLE_STATS, mode)).toEqual(projectRow(SAMPLE, SAMPLE_STATS, mode));
    }
  });

  it('produces one value per column in every mode', () => {
    for (const mode of DISPLAY_MODES) {
      expect(projectRow(SAMPLE, SAMPLE_STATS, mode).values).toHaveLength(displayColumns(mode).length - 1);
    }
  });
});

describe('displayColumns', () => {
  it('lists the default columns after the path', () => {
    expect(displayColumns('default').map((column) => column.label)).toEqual([
      'Path',
      'Instrs',
      'Time(s)',
      'ICov(%)',
      'BCov(%)',
      'ICount',
      'TSolver(%)',
    ]);
  });

  it('lists the extended columns', () => {
    expect(displayColumns('extended').map((column) => column.label)).toEqual([
      'Path',
      'Instrs',
      'Time(s)',
      'ICov(%)',
      'BCov(%)',
      'ICount',
      'TSolver(%)',
      'States',
      'maxStates',
      'Mem(MB)',
      'maxMem(MB)',
    ]);
  });

  it('types each column for display', () => {
    expect(displayColumns('default').map((column) => column.kind)).toEqual([
      'text',
      'integer',
      'decimal',
      'decimal',
      'decimal',
      'integer',
      'decimal',
    ]);
  });
});

describe('resolveDisplayMode', () => {
  it('maps flags to modes', () => {
    expect(resolveDisplayMode({})).toBe('default');
    expect(resolveDisplayMode({ printAll: true })).toBe('full');
    expect(resolveDisplayMode({ printRelTimes: true })).toBe('relative-time');
    expect(resolveDisplayMode({ printAbsTimes: true })).toBe('absolute-time');
    expect(resolveDisplayMode({ printMore: true })).toBe('extended');
  });
});
