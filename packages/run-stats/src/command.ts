import { writeFile } from 'node:fs/promises';
import {
  InputNotFoundError,
  UnsupportedComparisonError,
  buildChartSeries,
  buildStatsTable,
} from '@symstats/run-stats-core';
import type { CompareAt, DisplayMode, Run } from '@symstats/run-stats-core';
import { renderLineChart, renderTable } from '@symstats/run-stats-render';
import type { TableFormat } from '@symstats/run-stats-render';
import { discoverRunDirs, stripCommonPathPrefix } from './discover.js';
import { loadRun } from './load.js';
import { sequentialNamer } from './naming.js';
import type { ChartOutputNamer } from './naming.js';

export interface CommandIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIO: CommandIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export interface ChartRequest {
  readonly columns: readonly string[];
  readonly sampleInterval: number;
  readonly namer?: ChartOutputNamer;
}

export interface StatsCommandArgs {
  readonly dirs: readonly string[];
  readonly mode: DisplayMode;
  readonly tableFormat: TableFormat;
  readonly precision: number;
  readonly sortBy?: string;
  readonly ascending?: boolean;
  readonly compareBy?: string;
  readonly compareAt?: CompareAt;
  readonly chart?: ChartRequest;
  readonly verbose?: boolean;
}

export interface StatsCommandResult {
  readonly runs: readonly Run[];
  readonly output: string;
  readonly chartPath?: string;
}

async function loadRuns(dirs: readonly string[]): Promise<Run[]> {
  const labels = dirs.length > 1 ? stripCommonPathPrefix(dirs) : dirs;
  const runs: Run[] = [];
  for (const [index, dir] of dirs.entries()) {
    runs.push(await loadRun(dir, labels[index]));
  }
  return runs;
}

async function writeChart(run: Run, mode: DisplayMode, chart: ChartRequest): Promise<string> {
  const svg = renderLineChart(buildChartSeries(run, mode, chart.columns, chart.sampleInterval));
  const namer = chart.namer ?? sequentialNamer({ dir: process.cwd() });
  const chartPath = await namer.next();
  await writeFile(chartPath, `${svg}\n`, { encoding: 'utf8', flag: namer.overwrite ? 'w' : 'wx' });
  return chartPath;
}

/** Every check and every decode happens, and the chart is written, before the table is printed. */
export async function runStatsCommand(args: StatsCommandArgs, io: CommandIO = processIO): Promise<StatsCommandResult> {
  const dirs = await discoverRunDirs(args.dirs);
  if (dirs.length === 0) {
    throw new InputNotFoundError(args.dirs);
  }
  if (args.chart && dirs.length > 1) {
    throw new UnsupportedComparisonError(`--draw-line-chart supports a single run, found ${dirs.length}`);
  }
  if (args.verbose) {
    io.stderr(`Found ${dirs.length} run director${dirs.length === 1 ? 'y' : 'ies'}:\n${dirs.map((dir) => `  ${dir}\n`).join('')}`);
  }

  const runs = await loadRuns(dirs);
  const table = buildStatsTable(runs, {
    mode: args.mode,
    sortBy: args.sortBy,
    ascending: args.ascending,
    compare: args.compareBy !== undefined ? { key: args.compareBy, at: args.compareAt } : undefined,
  });
  const output = renderTable(table, { format: args.tableFormat, precision: args.precision });
  const chartPath = args.chart ? await writeChart(runs[0], args.mode, args.chart) : undefined;

  io.stdout(`${output}\n`);
  if (chartPath === undefined) {
    return { runs, output };
  }
  io.stdout(`Figure saved to ${chartPath}\n`);
  return { runs, output, chartPath };
}
