import { describe, expect, it } from 'vitest';
import type { StatsTable } from '@symstats/run-stats-core';
import { formatCell, isTableFormat, renderTable } from '../src/index.js';

const table: StatsTable = {
  mode: 'default',
  columns: [
    { label: 'Path', kind: 'text' },
    { label: 'Instrs', kind: 'integer' },
    { label: 'Time(s)', kind: 'decimal' },
  ],
  rows: [
    { label: 'run-a', values: [1200, 3.14159] },
    { label: 'b', values: [7, 12.5] },
  ],
  total: { label: 'Total (2)', values: [1207, 15.64159] },
};

describe('renderTable', () => {
  it('renders the box layout with a rule before the totals row', () => {
    expect(renderTable(table).split('\n')).toEqual([
      '------------------------------',
      '|  Path   |  Instrs|  Time(s)|',
      '------------------------------',
      '|  run-a  |    1200|     3.14|',
      '|    b    |       7|    12.50|',
      '------------------------------',
      '|Total (2)|    1207|    15.64|',
      '------------------------------',
    ]);
  });

  it('omits the totals rule without a totals row', () => {
    const single: StatsTable = { ...table, rows: [table.rows[0]], total: undefined };
    expect(renderTable(single).split('\n')).toEqual([
      '------------------------------',
      '|  Path   |  Instrs|  Time(s)|',
      '------------------------------',
      '|  run-a  |    1200|     3.14|',
      '------------------------------',
    ]);
  });

  it('honours the precision', () => {
    const lines = renderTable(table, { precision: 0 }).split('\n');
    expect(lines[3]).toBe('|  run-a  |    1200|        3|');
  });

  it('renders markdown pipes', () => {
    expect(renderTable(table, { format: 'pipe' }).split('\n')).toEqual([
      '|   Path    | Instrs | Time(s) |',
      '|:---------:|-------:|--------:|',
      '|   run-a   |   1200 |    3.14 |',
      '|     b     |      7 |   12.50 |',
      '| Total (2) |   1207 |   15.64 |',
    ]);
  });

  it('escapes markdown in pipe labels', () => {
    const piped: StatsTable = { ...table, rows: [{ label: 'a|b', values: [1, 1] }], total: undefined };
    expect(renderTable(piped, { format: 'pipe' }).split('\n')[2]).toBe('| a\\|b |      1 |    1.00 |');
  });

  it('renders a dashed header rule in the simple layout', () => {
    expect(renderTable(table, { format: 'simple' }).split('\n')[1]).toBe('---------  --------  ---------');
  });

  it('renders tab separated values', () => {
    expect(renderTable(table, { format: 'tsv' })).toBe(
      'Path\tInstrs\tTime(s)\nrun-a\t1200\t3.14\nb\t7\t12.50\nTotal (2)\t1207\t15.64',
    );
  });

  it('escapes html labels', () => {
    const hostile: StatsTable = { ...table, rows: [{ label: '<script>x</script>', values: [1, 2] }], total: undefined };
    const html = renderTable(hostile, { format: 'html' });
    expect(html.split('\n')[5]).toBe('<tr><td>&lt;script&gt;x&lt;/script&gt;</td><td>1</td><td>2.00</td></tr>');
  });

  it('rejects invalid precision', () => {
    expect(() => renderTable(table, { precision: -1 })).toThrow(RangeError);
    expect(() => renderTable(table, { precision: 1.5 })).toThrow(RangeError);
  });
});

describe('formatCell', () => {
  const decimal = { label: 'x', kind: 'decimal' } as const;
  const integer = { label: 'n', kind: 'integer' } as const;

  it('prints non-finite values like the numeric runtime does', () => {
    expect(formatCell(Number.NaN, decimal, 2)).toBe('nan');
    expect(formatCell(Number.POSITIVE_INFINITY, decimal, 2)).toBe('inf');
    expect(formatCell(Number.NEGATIVE_INFINITY, decimal, 2)).toBe('-inf');
  });

  it('prints integral integer cells without fraction digits', () => {
    expect(formatCell(42, integer, 2)).toBe('42');
    expect(formatCell(2.5, integer, 2)).toBe('2.50');
    expect(formatCell(42, decimal, 2)).toBe('42.00');
  });
});

describe('isTableFormat', () => {
  it('recognises known formats', () => {
    expect(isTableFormat('box')).toBe(true);
    expect(isTableFormat('grid')).toBe(false);
  });
});
