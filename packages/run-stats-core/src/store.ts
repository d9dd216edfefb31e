import { MalformedRecordError } from './errors.js';
import { strictEmptyLinesEnabled } from './env.js';
import { parseRecordLine } from './format.js';
import type { RecordDecoder } from './format.js';
import type { RecordSequence, StatsRecord } from './types.js';

export interface PendingLine {
  readonly raw: string;
  readonly lineNumber: number;
}

type Entry = PendingLine | StatsRecord;

function isPending(entry: Entry): entry is PendingLine {
  return 'raw' in entry;
}

export interface RecordStoreOptions {
  readonly decode?: RecordDecoder;
  /** File line number of the first data line. */
  readonly firstLineNumber?: number;
}

export interface FromTextOptions {
  readonly decode?: RecordDecoder;
  readonly strictEmpty?: boolean;
}

/**
 * Indexed view over the data lines of one run.stats file. A line is decoded the
 * first time its index is read and the record replaces the raw line.
 */
export class RecordStore implements RecordSequence {
  private readonly entries: Entry[];
  private readonly decode: RecordDecoder;

  constructor(lines: readonly (string | PendingLine)[], options: RecordStoreOptions = {}) {
    const first = options.firstLineNumber ?? 1;
    this.decode = options.decode ?? parseRecordLine;
    this.entries = lines.map((line, index) =>
      typeof line === 'string' ? { raw: line, lineNumber: first + index } : line,
    );
  }

  /** Splits a file body, drops the header line and applies the blank-line policy. */
  static fromText(text: string, options: FromTextOptions = {}): RecordStore {
    const strictEmpty = options.strictEmpty ?? strictEmptyLinesEnabled();
    const lines = text.split(/\r?\n/);

    let lastDataIndex = -1;
    for (let i = lines.length - 1; i >= 1; i--) {
      if (lines[i].trim() !== '') {
        lastDataIndex = i;
        break;
      }
    }

    const pending: PendingLine[] = [];
    for (let i = 1; i <= lastDataIndex; i++) {
      const line = lines[i];
      if (line.trim() === '') {
        if (strictEmpty) {
          throw new MalformedRecordError(i + 1, line, ['empty line']);
        }
        continue;
      }
      pending.push({ raw: line, lineNumber: i + 1 });
    }

    return new RecordStore(pending, { decode: options.decode });
  }

  get length(): number {
    return this.entries.length;
  }

  at(index: number): StatsRecord {
    const resolved = index < 0 ? this.entries.length + index : index;
    if (!Number.isInteger(resolved) || resolved < 0 || resolved >= this.entries.length) {
      throw new RangeError(`record index ${index} out of range for ${this.entries.length} records`);
    }
    const entry = this.entries[resolved];
    if (!isPending(entry)) {
      return entry;
    }
    const record = this.decode(entry.raw, entry.lineNumber);
    this.entries[resolved] = record;
    return record;
  }

  /** Number of lines decoded so far. */
  decodedCount(): number {
    return this.entries.filter((entry) => !isPending(entry)).length;
  }
}
