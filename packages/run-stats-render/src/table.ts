import type { ColumnSpec, StatsRow, StatsTable } from '@symstats/run-stats-core';
import { escapeHtml, escapeMarkdown } from './escape.js';

export const TABLE_FORMATS = ['box', 'plain', 'simple', 'pipe', 'tsv', 'html'] as const;

export type TableFormat = (typeof TABLE_FORMATS)[number];

export interface RenderTableOptions {
  readonly format?: TableFormat;
  /** Fraction digits of decimal cells. */
  readonly precision?: number;
}

// Header cells are at least this much wider than their label.
const MIN_PADDING = 2;

type Align = 'right' | 'center';

interface Grid {
  readonly header: readonly string[];
  readonly body: readonly (readonly string[])[];
  readonly total?: readonly string[];
  readonly aligns: readonly Align[];
}

export function isTableFormat(value: string): value is TableFormat {
  return TABLE_FORMATS.some((format) => format === value);
}

export function formatCell(value: number, column: ColumnSpec, precision: number): string {
  if (Number.isNaN(value)) {
    return 'nan';
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? 'inf' : '-inf';
  }
  if (column.kind === 'integer' && Number.isInteger(value)) {
    return String(value);
  }
  return value.toFixed(precision);
}

function toCells(row: StatsRow, columns: readonly ColumnSpec[], precision: number, text: (value: string) => string): string[] {
  return [text(row.label), ...row.values.map((value, index) => formatCell(value, columns[index + 1], precision))];
}

function buildGrid(table: StatsTable, precision: number, text: (value: string) => string = (value) => value): Grid {
  return {
    header: table.columns.map((column) => text(column.label)),
    body: table.rows.map((row) => toCells(row, table.columns, precision, text)),
    total: table.total ? toCells(table.total, table.columns, precision, text) : undefined,
    aligns: table.columns.map((column) => (column.kind === 'text' ? 'center' : 'right')),
  };
}

function allRows(grid: Grid): (readonly string[])[] {
  return grid.total ? [...grid.body, grid.total] : [...grid.body];
}

function columnWidths(grid: Grid, minPadding: number): number[] {
  return grid.header.map((label, index) =>
    allRows(grid).reduce((width, row) => Math.max(width, row[index].length), label.length + minPadding),
  );
}

function pad(value: string, width: number, align: Align): string {
  const space = Math.max(0, width - value.length);
  if (align === 'right') {
    return `${' '.repeat(space)}${value}`;
  }
  const left = Math.floor(space / 2);
  return `${' '.repeat(left)}${value}${' '.repeat(space - left)}`;
}

function padRow(cells: readonly string[], widths: readonly number[], aligns: readonly Align[]): string[] {
  return cells.map((cell, index) => pad(cell, widths[index], aligns[index]));
}

function renderBox(grid: Grid): string {
  const widths = columnWidths(grid, MIN_PADDING);
  const rule = '-'.repeat(widths.reduce((sum, width) => sum + width, 0) + widths.length + 1);
  const line = (cells: readonly string[]) => `|${padRow(cells, widths, grid.aligns).join('|')}|`;
  const lines = [rule, line(grid.header), rule, ...grid.body.map(line)];
  if (grid.total) {
    lines.push(rule, line(grid.total));
  }
  lines.push(rule);
  return lines.join('\n');
}

function renderPlain(grid: Grid, withRule: boolean): string {
  const widths = columnWidths(grid, MIN_PADDING);
  const line = (cells: readonly string[]) => padRow(cells, widths, grid.aligns).join('  ');
  const lines = [line(grid.header)];
  if (withRule) {
    lines.push(widths.map((width) => '-'.repeat(width)).join('  '));
  }
  lines.push(...allRows(grid).map(line));
  return lines.join('\n');
}

function renderPipe(grid: Grid): string {
  const widths = columnWidths(grid, 0);
  const line = (cells: readonly string[]) => `| ${padRow(cells, widths, grid.aligns).join(' | ')} |`;
  const markers = widths.map((width, index) =>
    grid.aligns[index] === 'center' ? `:${'-'.repeat(width)}:` : `${'-'.repeat(width + 1)}:`,
  );
  return [line(grid.header), `|${markers.join('|')}|`, ...allRows(grid).map(line)].join('\n');
}

function renderTsv(grid: Grid): string {
  return [grid.header, ...allRows(grid)].map((cells) => cells.join('\t')).join('\n');
}

function renderHtmlTable(grid: Grid): string {
  const head = `<tr>${grid.header.map((cell) => `<th>${cell}</th>`).join('')}</tr>`;
  const body = allRows(grid)
    .map((cells) => `<tr>${cells.map((cell) => `<td>${cell}</td>`).join('')}</tr>`)
    .join('\n');
  return ['<table>', '<thead>', head, '</thead>', '<tbody>', body, '</tbody>', '</table>'].join('\n');
}

export function renderTable(table: StatsTable, options: RenderTableOptions = {}): string {
  const format = options.format ?? 'box';
  const precision = options.precision ?? 2;
  if (!Number.isInteger(precision) || precision < 0 || precision > 20) {
    throw new RangeError(`precision must be an integer between 0 and 20, received ${precision}`);
  }

  switch (format) {
    case 'box':
      return renderBox(buildGrid(table, precision));
    case 'plain':
      return renderPlain(buildGrid(table, precision), false);
    case 'simple':
      return renderPlain(buildGrid(table, precision), true);
    case 'pipe':
      return renderPipe(buildGrid(table, precision, escapeMarkdown));
    case 'tsv':
      return renderTsv(buildGrid(table, precision));
    case 'html':
      return renderHtmlTable(buildGrid(table, precision, escapeHtml));
  }
}
