import { access } from 'node:fs/promises';
import { join, resolve } from 'node:path';

/** Decides where a chart is written. */
export interface ChartOutputNamer {
  /** When false, the chosen file must not exist yet at write time. */
  readonly overwrite: boolean;
  next(): Promise<string>;
}

export interface SequentialNamerOptions {
  readonly dir: string;
  readonly stem?: string;
  readonly extension?: string;
  readonly limit?: number;
}

async function isFree(path: string): Promise<boolean> {
  try {
    await access(path);
    return false;
  } catch {
    return true;
  }
}

/** `figure1.svg`, `figure2.svg`, ...: the first name not yet taken in `dir`. */
export function sequentialNamer(options: SequentialNamerOptions): ChartOutputNamer {
  const stem = options.stem ?? 'figure';
  const extension = options.extension ?? '.svg';
  const limit = options.limit ?? 99;
  return {
    overwrite: false,
    async next() {
      for (let index = 1; index <= limit; index++) {
        const candidate = join(options.dir, `${stem}${index}${extension}`);
        if (await isFree(candidate)) {
          return candidate;
        }
      }
      throw new Error(`No free chart file name in ${resolve(options.dir)} (tried ${stem}1${extension} to ${stem}${limit}${extension})`);
    },
  };
}

export function fixedNamer(path: string): ChartOutputNamer {
  return {
    overwrite: true,
    next: async () => path,
  };
}
