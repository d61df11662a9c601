import { log } from '../logging/logger';

export type ProgressEmitter = (line: string) => void;

const defaultEmit: ProgressEmitter = (line) => log.progress.info(line);

/** Every how many completions a non-verbose run prints: a quarter of the batch, at most 25. */
export function progressThreshold(total: number): number {
  return Math.max(1, Math.min(25, Math.floor((total * 25) / 100)));
}

/**
 * Prints `"{label} {current}/{total}"` when verbose, or at 0, at total and on every
 * threshold-th completion otherwise. Returns whether a line was emitted.
 */
export function reportProgress(
  current: number,
  total: number,
  label: string,
  verbose: boolean,
  emit: ProgressEmitter = defaultEmit,
): boolean {
  const due = verbose || current === 0 || current === total || current % progressThreshold(total) === 0;
  if (due) emit(`${label} ${current}/${total}`);
  return due;
}

export interface ProgressTracker {
  /** Records one finished unit and reports the new completion count. */
  complete(): number;
  readonly completed: number;
}

/**
 * Completion counter for a concurrent phase. Units finish on the event loop one at a time,
 * so the count handed to reportProgress only ever grows.
 */
export function createProgressTracker(
  label: string,
  total: number,
  verbose: boolean,
  emit: ProgressEmitter = defaultEmit,
): ProgressTracker {
  let completed = 0;
  reportProgress(0, total, label, verbose, emit);
  return {
    complete() {
      completed += 1;
      reportProgress(completed, total, label, verbose, emit);
      return completed;
    },
    get completed() {
      return completed;
    },
  };
}
