import { Command, InvalidArgumentError, Option } from 'commander';
import { COMPARABLE_KEYS, resolveDisplayMode } from '@symstats/run-stats-core';
import type { CompareAt } from '@symstats/run-stats-core';
import { TABLE_FORMATS, isTableFormat } from '@symstats/run-stats-render';
import { processIO, runStatsCommand } from './command.js';
import type { CommandIO } from './command.js';
import { fixedNamer, sequentialNamer } from './naming.js';

const LEGEND: ReadonlyArray<readonly [string, string]> = [
  ['Instrs', 'number of executed instructions'],
  ['Time', 'total wall time (s)'],
  ['TUser', 'total user time'],
  ['ICov', 'instruction coverage in the LLVM bitcode (%)'],
  ['BCov', 'branch coverage in the LLVM bitcode (%)'],
  ['ICount', 'total static instructions in the LLVM bitcode'],
  ['TSolver', 'time spent in the constraint solver'],
  ['States', 'number of currently active states'],
  ['Mem', 'megabytes of memory currently used'],
  ['Queries', 'number of queries issued to the solver'],
  ['AvgQC', 'average number of query constructs per query'],
  ['Tcex', 'time spent in the counterexample caching code'],
  ['Tfork', 'time spent forking'],
  ['TResolve', 'time spent in object resolution'],
];

export interface CliOptions {
  readonly tableFormat: string;
  readonly drawLineChart?: string[];
  readonly sampleInterval: number;
  readonly printAll?: boolean;
  readonly printRelTimes?: boolean;
  readonly printAbsTimes?: boolean;
  readonly printMore?: boolean;
  readonly sortBy?: string;
  readonly ascending?: boolean;
  readonly compareBy?: string;
  readonly compareAt?: CompareAt;
  readonly precision: number;
  readonly chartDir?: string;
  readonly chartOutput?: string;
  readonly verbose?: boolean;
}

function renderLegend(): string {
  const width = Math.max(...LEGEND.map(([name]) => name.length));
  return `\nLegend:\n${LEGEND.map(([name, text]) => `  ${name.padEnd(width)}  ${text}`).join('\n')}\n`;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

export function parsePrecision(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed > 20) {
    throw new InvalidArgumentError('Precision must be at most 20.');
  }
  return parsed;
}

export function parseSampleInterval(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Sample interval must be positive.');
  }
  return parsed;
}

export function parseCompareAt(value: string): CompareAt {
  if (value === 'last') {
    return 'last';
  }
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Expected a number or 'last'.");
  }
  return parsed;
}

export function parseColumnList(value: string): string[] {
  const columns = value
    .split(',')
    .map((column) => column.trim())
    .filter((column) => column.length > 0);
  if (columns.length === 0) {
    throw new InvalidArgumentError('Expected a comma separated list of columns.');
  }
  return columns;
}

type ExitCodeSink = (code: number) => void;

const setProcessExitCode: ExitCodeSink = (code) => {
  process.exitCode = code;
};

export function createProgram(io: CommandIO = processIO, setExitCode: ExitCodeSink = setProcessExitCode): Command {
  const program = new Command();
  const modeFlags = ['printAll', 'printRelTimes', 'printAbsTimes', 'printMore'];
  const exclusive = (flag: string) => modeFlags.filter((other) => other !== flag);

  program
    .name('run-stats')
    .description('Summarise the run.stats logs of symbolic-execution runs')
    .argument('<dir...>', 'run output directories, or directories to search for them')
    .addOption(new Option('--table-format <format>', 'table layout').choices(TABLE_FORMATS).default('box'))
    .option(
      '--draw-line-chart <columns>',
      'draw a line chart of comma separated table columns (e.g. Instrs,Time(s)); one point per sample',
      parseColumnList,
    )
    .option('--sample-interval <n>', 'sample a data point every n records', parseSampleInterval, 10)
    .addOption(new Option('--print-all', 'print all available information').conflicts(exclusive('printAll')))
    .addOption(
      new Option('--print-rel-times', 'print times relative to the wall time').conflicts(exclusive('printRelTimes')),
    )
    .addOption(new Option('--print-abs-times', 'print times in seconds').conflicts(exclusive('printAbsTimes')))
    .addOption(
      new Option('--print-more', 'print extra information for an ongoing run').conflicts(exclusive('printMore')),
    )
    .option('--sort-by <header>', 'table column to sort by (e.g. Instrs)')
    .option('--ascending', 'sort in ascending order', false)
    .option(
      '--compare-by <header>',
      `progress column to align runs on (${COMPARABLE_KEYS.join(', ')}); runs shorter than the target report their last record`,
    )
    .option(
      '--compare-at <value>',
      "value to align at, or 'last' for the largest value every run reached (default: final value of the first run)",
      parseCompareAt,
    )
    .option('--precision <n>', 'fraction digits of decimal values', parsePrecision, 2)
    .option('--chart-dir <dir>', 'directory receiving figure<N>.svg (default: working directory)')
    .option('--chart-output <file>', 'write the chart to this file instead')
    .option('--verbose', 'report discovered runs on stderr', false)
    .addHelpText('after', renderLegend())
    .action(async (dirs: string[], options: CliOptions) => {
      try {
        if (!isTableFormat(options.tableFormat)) {
          throw new InvalidArgumentError(`Unknown table format ${options.tableFormat}.`);
        }
        const chart = options.drawLineChart
          ? {
              columns: options.drawLineChart,
              sampleInterval: options.sampleInterval,
              namer: options.chartOutput
                ? fixedNamer(options.chartOutput)
                : sequentialNamer({ dir: options.chartDir ?? process.cwd() }),
            }
          : undefined;
        await runStatsCommand(
          {
            dirs,
            mode: resolveDisplayMode(options),
            tableFormat: options.tableFormat,
            precision: options.precision,
            sortBy: options.sortBy,
            ascending: options.ascending,
            compareBy: options.compareBy,
            compareAt: options.compareAt,
            chart,
            verbose: options.verbose,
          },
          io,
        );
      } catch (error) {
        io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
        setExitCode(1);
      }
    });

  return program;
}
