export { discoverRunDirs, hasInfoFile, INFO_FILE, stripCommonPathPrefix } from './discover.js';
export { loadRun, logFilePath, LOG_FILE } from './load.js';
export { fixedNamer, sequentialNamer } from './naming.js';
export type { ChartOutputNamer, SequentialNamerOptions } from './naming.js';
export { processIO, runStatsCommand } from './command.js';
export type { ChartRequest, CommandIO, StatsCommandArgs, StatsCommandResult } from './command.js';
export { createProgram, parseColumnList, parseCompareAt, parsePrecision, parseSampleInterval } from './program.js';
export type { CliOptions } from './program.js';
