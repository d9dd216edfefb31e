import { access, readdir, stat } from 'node:fs/promises';
import { join, posix } from 'node:path';

export const INFO_FILE = 'info';

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export function hasInfoFile(dir: string): Promise<boolean> {
  return exists(join(dir, INFO_FILE));
}

// Checks every child of a directory before descending, in name order. Symbolic links are not followed.
async function walk(dir: string, found: string[]): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  const children = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => join(dir, entry.name))
    .sort();
  for (const child of children) {
    if (await hasInfoFile(child)) {
      found.push(child);
    }
  }
  for (const child of children) {
    await walk(child, found);
  }
}

/**
 * A root holding an `info` file is a run directory; any other root is searched
 * for run directories below it. Roots that are not directories are ignored.
 */
export async function discoverRunDirs(roots: readonly string[]): Promise<string[]> {
  const found: string[] = [];
  for (const root of roots) {
    if (await hasInfoFile(root)) {
      found.push(root);
    } else if (await isDirectory(root)) {
      await walk(root, found);
    }
  }
  return found;
}

function splitPath(path: string): string[] {
  const normalized = posix.normalize(path);
  const trimmed = normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
  return trimmed.split('/');
}

/** Drops the leading path components shared by every path, keeping at least the last shared one. */
export function stripCommonPathPrefix(paths: readonly string[]): string[] {
  if (paths.length === 0) {
    return [];
  }
  const parts = paths.map(splitPath);
  const shortest = Math.min(...parts.map((segments) => segments.length));
  let index = 0;
  while (index < shortest && new Set(parts.map((segments) => segments[index])).size === 1) {
    index += 1;
  }
  const start = Math.min(index, shortest - 1);
  return parts.map((segments) => segments.slice(start).join('/'));
}
