import { createRequire } from 'node:module';
import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { MalformedRecordError } from './errors.js';
import type { StatsRecord } from './types.js';

const Ajv = AjvModule.default;
const require = createRequire(import.meta.url);

function loadSchema(name: string): Record<string, unknown> {
  const candidates = [`../schema/${name}`, `../../schema/${name}`];
  for (const candidate of candidates) {
    try {
      return require(candidate);
    } catch {
      continue;
    }
  }
  throw new Error(`Unable to load schema ${name}`);
}

export const recordSchema = loadSchema('run-stats-record.schema.json');

const ajv = new Ajv({ allErrors: true, strict: true });
const validateRecordFn: ValidateFunction<StatsRecord> = ajv.compile<StatsRecord>(recordSchema);

// Plain decimal literals only: no names, calls or nested structures.
const NUMBER_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

const BRACKETS: Record<string, string> = {
  '(': ')',
  '[': ']',
};

export type RecordDecoder = (line: string, lineNumber: number) => StatsRecord;

export type TokenizeResult = { ok: true; values: number[] } | { ok: false; issues: string[] };

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ['unknown error'];
  }
  return errors.map((error) => `${error.instancePath || '/'} ${error.message ?? 'validation error'}`);
}

function stripBrackets(text: string): { ok: true; body: string } | { ok: false; issue: string } {
  const open = text.charAt(0);
  const close = BRACKETS[open];
  if (close === undefined) {
    return { ok: true, body: text };
  }
  if (!text.endsWith(close)) {
    return { ok: false, issue: `unterminated ${open}` };
  }
  return { ok: true, body: text.slice(1, -1) };
}

export function tokenizeRecordLine(line: string): TokenizeResult {
  const stripped = stripBrackets(line.trim());
  if (!stripped.ok) {
    return { ok: false, issues: [stripped.issue] };
  }
  const tokens = stripped.body.split(',').map((token) => token.trim());
  if (tokens.length > 1 && tokens[tokens.length - 1] === '') {
    tokens.pop();
  }
  if (tokens.length === 1 && tokens[0] === '') {
    return { ok: false, issues: ['empty record'] };
  }

  const issues: string[] = [];
  const values: number[] = [];
  tokens.forEach((token, index) => {
    if (!NUMBER_LITERAL.test(token)) {
      issues.push(`/${index} not a number literal: ${JSON.stringify(token)}`);
      return;
    }
    values.push(Number(token));
  });
  if (issues.length > 0) {
    return { ok: false, issues };
  }
  return { ok: true, values };
}

export function validateRecord(value: unknown): { ok: true; record: StatsRecord } | { ok: false; issues: string[] } {
  if (validateRecordFn(value)) {
    return { ok: true, record: value };
  }
  return { ok: false, issues: formatErrors(validateRecordFn.errors) };
}

export const parseRecordLine: RecordDecoder = (line, lineNumber) => {
  const tokens = tokenizeRecordLine(line);
  if (!tokens.ok) {
    throw new MalformedRecordError(lineNumber, line, tokens.issues);
  }
  const result = validateRecord(tokens.values);
  if (!result.ok) {
    throw new MalformedRecordError(lineNumber, line, result.issues);
  }
  return result.record;
};
