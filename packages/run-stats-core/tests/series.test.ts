import { describe, expect, it } from 'vitest';
import { InvalidKeyError, buildChartSeries, sampleIndices } from '../src/index.js';
import { progressRun } from './helpers/records.js';

describe('sampleIndices', () => {
  it('samples every interval and keeps the final record', () => {
    expect(sampleIndices(25, 10)).toEqual([0, 10, 20, 24]);
    expect(sampleIndices(21, 10)).toEqual([0, 10, 20]);
    expect(sampleIndices(1, 10)).toEqual([0]);
    expect(sampleIndices(0, 10)).toEqual([]);
  });

  it('rejects non-positive intervals', () => {
    expect(() => sampleIndices(10, 0)).toThrow(RangeError);
    expect(() => sampleIndices(10, 1.5)).toThrow(RangeError);
  });
});

describe('buildChartSeries', () => {
  const run = progressRun(
    'solo',
    Array.from({ length: 25 }, (_, index) => (index + 1) * 10),
  );

  it('projects each sample against its own prefix', () => {
    const series = buildChartSeries(run, 'extended', ['instrs', 'maxStates'], 10);
    expect(series).toEqual([
      { title: 'Instrs', values: [10, 110, 210, 250] },
      { title: 'maxStates', values: [1, 11, 21, 25] },
    ]);
  });

  it('only accepts columns of the display mode', () => {
    expect(() => buildChartSeries(run, 'default', ['Path'], 10)).toThrow(InvalidKeyError);
    expect(() => buildChartSeries(run, 'default', ['maxStates'], 10)).toThrow(InvalidKeyError);
  });
});
