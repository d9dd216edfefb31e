export { TABLE_FORMATS, formatCell, isTableFormat, renderTable } from './table.js';
export type { RenderTableOptions, TableFormat } from './table.js';
export { chartLayout, polylinePoints, renderLineChart } from './chart.js';
export type { ChartLayout, LineChartOptions } from './chart.js';
export { escapeHtml, escapeMarkdown } from './escape.js';
