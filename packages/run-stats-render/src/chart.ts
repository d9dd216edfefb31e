import type { ChartSeries } from '@symstats/run-stats-core';
import { escapeHtml } from './escape.js';

export interface LineChartOptions {
  readonly width?: number;
  readonly height?: number;
  readonly stroke?: string;
}

export interface ChartLayout {
  readonly rows: number;
  readonly columns: number;
}

const PADDING = { top: 28, right: 12, bottom: 24, left: 56 };

const STYLE = 'text { font-family: system-ui, sans-serif; font-size: 11px; fill: #111827; } .title { font-size: 13px; font-weight: 600; }';

function coord(value: number): string {
  return value.toFixed(2);
}

/** Near-square grid of sub-charts: `ceil(sqrt(n))` rows. */
export function chartLayout(count: number): ChartLayout {
  if (count <= 0) {
    return { rows: 0, columns: 0 };
  }
  const rows = Math.ceil(Math.sqrt(count));
  return { rows, columns: Math.ceil(count / rows) };
}

export function polylinePoints(values: readonly number[], width: number, height: number): string {
  const x0 = PADDING.left;
  const x1 = width - PADDING.right;
  const y0 = PADDING.top;
  const y1 = height - PADDING.bottom;
  const finite = values.filter((value) => Number.isFinite(value));
  if (finite.length === 0) {
    return '';
  }
  const min = Math.min(...finite);
  const max = Math.max(...finite);
  const span = max - min;
  const step = values.length > 1 ? (x1 - x0) / (values.length - 1) : 0;

  return values
    .map((value, index) => {
      if (!Number.isFinite(value)) {
        return undefined;
      }
      const y = span === 0 ? (y0 + y1) / 2 : y1 - ((value - min) * (y1 - y0)) / span;
      return `${coord(x0 + index * step)},${coord(y)}`;
    })
    .filter((point): point is string => point !== undefined)
    .join(' ');
}

function renderPanel(series: ChartSeries, width: number, height: number, stroke: string): string {
  const finite = series.values.filter((value) => Number.isFinite(value));
  const min = finite.length > 0 ? Math.min(...finite) : 0;
  const max = finite.length > 0 ? Math.max(...finite) : 0;
  const bottom = height - PADDING.bottom;
  const right = width - PADDING.right;
  return [
    `<text class="title" x="${coord(width / 2)}" y="18" text-anchor="middle">${escapeHtml(series.title)}</text>`,
    `<line x1="${PADDING.left}" y1="${PADDING.top}" x2="${PADDING.left}" y2="${bottom}" stroke="#9ca3af" />`,
    `<line x1="${PADDING.left}" y1="${bottom}" x2="${right}" y2="${bottom}" stroke="#9ca3af" />`,
    `<text x="${PADDING.left - 4}" y="${PADDING.top + 4}" text-anchor="end">${coord(max)}</text>`,
    `<text x="${PADDING.left - 4}" y="${bottom}" text-anchor="end">${coord(min)}</text>`,
    `<text x="${right}" y="${height - 6}" text-anchor="end">${series.values.length} samples</text>`,
    `<polyline fill="none" stroke="${escapeHtml(stroke)}" stroke-width="1.5" points="${polylinePoints(series.values, width, height)}" />`,
  ].join('\n');
}

/** One SVG document, one titled sub-chart per series. */
export function renderLineChart(series: readonly ChartSeries[], options: LineChartOptions = {}): string {
  const width = options.width ?? 640;
  const height = options.height ?? 480;
  const stroke = options.stroke ?? '#2563eb';
  const layout = chartLayout(series.length);
  const panelWidth = layout.columns > 0 ? width / layout.columns : width;
  const panelHeight = layout.rows > 0 ? height / layout.rows : height;

  const panels = series.map((entry, index) => {
    const x = (index % layout.columns) * panelWidth;
    const y = Math.floor(index / layout.columns) * panelHeight;
    return [
      `<g transform="translate(${coord(x)},${coord(y)})">`,
      renderPanel(entry, panelWidth, panelHeight, stroke),
      '</g>',
    ].join('\n');
  });

  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<style>${STYLE}</style>`,
    '<rect width="100%" height="100%" fill="#ffffff" />',
    ...panels,
    '</svg>',
  ].join('\n');
}
