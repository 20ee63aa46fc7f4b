/**
 * Polling schedules and the clock that drives them.
 *
 * Document ingestion and document analysis are both observed by polling,
 * but with different defaults and terminal vocabularies, so each loop is
 * parameterized by its own schedule rather than sharing one mechanism:
 *   - Ingestion: 300s budget, checked every 2s.
 *   - Analysis: 300s budget, checked every 5s.
 *
 * Loops read time and sleep through a Clock so tests can simulate hours
 * of waiting without real delays.
 */

import { CancelledError } from './errors';

/** Budget for one polling loop. */
export interface PollingSchedule {
  /** Total wall-clock budget (ms) before the loop gives up. */
  maxWaitMs: number;
  /** Interval (ms) between status checks. */
  pollIntervalMs: number;
}

/** Progress info emitted after each status check. */
export interface PollingProgress {
  /** What is being waited on, e.g. "file 12" or "analysis 7". */
  subject: string;
  /** Raw status value reported by the service. */
  status: string;
  /** Number of status checks so far. */
  pollCount: number;
  /** Elapsed time in milliseconds since the loop started. */
  elapsedMs: number;
}

/** Callback invoked with progress updates during polling. */
export type PollingProgressCallback = (progress: PollingProgress) => void;

/** Default schedule for waiting on file ingestion. */
export const DEFAULT_INGESTION_POLLING: Readonly<PollingSchedule> = {
  maxWaitMs: 300_000,
  pollIntervalMs: 2_000,
};

/** Default schedule for waiting on document analysis jobs. */
export const DEFAULT_ANALYSIS_POLLING: Readonly<PollingSchedule> = {
  maxWaitMs: 300_000,
  pollIntervalMs: 5_000,
};

/** Schedule used before an execution to let attached files finish ingesting. */
export const DEFAULT_ATTACHMENT_READINESS_POLLING: Readonly<PollingSchedule> = {
  maxWaitMs: 60_000,
  pollIntervalMs: 3_000,
};

/**
 * Merge a partial schedule onto a base schedule.
 * Undefined fields keep the base value. The merged interval must be positive.
 */
export function mergePollingSchedule(
  base: Readonly<PollingSchedule>,
  override?: Partial<PollingSchedule>,
): PollingSchedule {
  const schedule = {
    maxWaitMs: override?.maxWaitMs ?? base.maxWaitMs,
    pollIntervalMs: override?.pollIntervalMs ?? base.pollIntervalMs,
  };
  if (!(schedule.pollIntervalMs > 0)) {
    throw new RangeError(`pollIntervalMs must be greater than 0, got ${schedule.pollIntervalMs}`);
  }
  return schedule;
}

/** Time source and sleeper for polling loops. */
export interface Clock {
  /** Current time in milliseconds. */
  now(): number;
  /** Resolve after `ms`; reject with CancelledError when `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Clock backed by Date.now() and setTimeout. */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new CancelledError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, Math.max(0, ms));
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};
