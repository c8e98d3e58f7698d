import { logger as rootLogger, type Logger } from '../config/logger';

export interface Timer {
  /** Logs and returns the elapsed milliseconds. */
  stop: (extra?: Record<string, unknown>) => number;
}

/**
 * Measure how long a run phase takes.
 *   const timer = startTimer('run.fetchBookings', log);
 *   await fetchAll();
 *   timer.stop({ bookings: 42 });
 */
export function startTimer(label: string, log: Logger = rootLogger): Timer {
  const start = performance.now();

  return {
    stop(extra?: Record<string, unknown>): number {
      const durationMs = Math.round(performance.now() - start);
      log.debug({ label, durationMs, ...extra }, 'Timer completed');
      return durationMs;
    },
  };
}
