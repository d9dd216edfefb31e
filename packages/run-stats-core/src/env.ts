// Cached environment flags for log decoding.
let _strictEmpty: boolean | undefined;

export function strictEmptyLinesEnabled(): boolean {
  if (_strictEmpty === undefined) {
    const v = (process.env.RUN_STATS_STRICT_EMPTY || '').toLowerCase();
    _strictEmpty = v === '1' || v === 'true';
  }
  return _strictEmpty;
}

// For tests only: reset the cached flag.
export function resetEnvCacheForTests(): void {
  _strictEmpty = undefined;
}
