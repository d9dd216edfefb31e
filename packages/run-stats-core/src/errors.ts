export type RunStatsErrorCode =
  | 'INPUT_NOT_FOUND'
  | 'MALFORMED_RECORD'
  | 'INVALID_KEY'
  | 'UNSUPPORTED_COMPARISON'
  | 'EMPTY_RECORDS';

export class RunStatsError extends Error {
  readonly code: RunStatsErrorCode;

  constructor(code: RunStatsErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InputNotFoundError extends RunStatsError {
  readonly roots: readonly string[];

  constructor(roots: readonly string[]) {
    super('INPUT_NOT_FOUND', `no run directory found under ${roots.join(', ')}`);
    this.roots = roots;
  }
}

export class MalformedRecordError extends RunStatsError {
  readonly line: number;
  readonly issues: readonly string[];
  readonly raw: string;

  constructor(line: number, raw: string, issues: readonly string[]) {
    super('MALFORMED_RECORD', `malformed record on line ${line}: ${issues.join(', ')}`);
    this.line = line;
    this.raw = raw;
    this.issues = issues;
  }
}

export class InvalidKeyError extends RunStatsError {
  readonly key: string;

  constructor(key: string, allowed: readonly string[]) {
    super('INVALID_KEY', `invalid key: ${key} (expected one of ${allowed.join(', ')})`);
    this.key = key;
  }
}

export class UnsupportedComparisonError extends RunStatsError {
  constructor(message: string) {
    super('UNSUPPORTED_COMPARISON', message);
  }
}

export class EmptyRecordsError extends RunStatsError {
  constructor(message = 'no records to aggregate') {
    super('EMPTY_RECORDS', message);
  }
}
