/**
 * Poll with backoff
 * Runs a check at each point of an explicit interval schedule until it settles
 */

export type PollOutcome<T> =
  | { done: true; value: T }
  | { done: false };

export interface PollOptions {
  /** Delay before each attempt, in ms (e.g. [100, 200, 500]) */
  intervals: number[];
  /** Upper bound on attempts; defaults to intervals.length */
  maxAttempts?: number;
}

export interface PollAttempt {
  /** 1-based attempt number */
  attempt: number;
  /** Time since polling began, in ms */
  elapsedMs: number;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Wait `intervals[i]` then run `check`, stopping at the first `done` outcome.
 * Attempts beyond the schedule reuse its last interval.
 * Returns null when every attempt came back not done.
 */
export async function pollWithBackoff<T>(
  check: (attempt: PollAttempt) => Promise<PollOutcome<T>>,
  options: PollOptions
): Promise<T | null> {
  const { intervals } = options;
  if (intervals.length === 0) {
    throw new Error('pollWithBackoff requires at least one interval');
  }

  const maxAttempts = options.maxAttempts ?? intervals.length;
  const startedAt = Date.now();

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const delay = intervals[Math.min(attempt - 1, intervals.length - 1)] ?? 0;
    await sleep(delay);

    const outcome = await check({ attempt, elapsedMs: Date.now() - startedAt });
    if (outcome.done) {
      return outcome.value;
    }
  }

  return null;
}
