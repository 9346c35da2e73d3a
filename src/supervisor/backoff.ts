/**
 * Poll scheduling for long-running operations.
 */

export interface BackoffSchedule {
  initialIntervalMs: number;
  maxIntervalMs: number;
  multiplier: number;
}

/**
 * Delay before the poll that follows `retry` earlier polls:
 * `initialIntervalMs * multiplier^retry`, capped at `maxIntervalMs`.
 */
export function backoffDelay(schedule: BackoffSchedule, retry: number): number {
  const delay = schedule.initialIntervalMs * Math.pow(schedule.multiplier, retry);
  return Math.min(Math.round(delay), schedule.maxIntervalMs);
}
