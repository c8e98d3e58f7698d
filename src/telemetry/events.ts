import { logger as rootLogger, type Logger } from '../config/logger';

export type RunEventType =
  | 'run.started'
  | 'run.completed'
  | 'run.failed'
  | 'property.fetch_failed'
  | 'guest.resolution_failed'
  | 'guest.skipped'
  | 'guest.message_sent'
  | 'guest.send_failed'
  | 'guest.dry_run';

export interface LogEventInput {
  type: RunEventType;
  payload?: Record<string, unknown>;
}

/**
 * Emit a structured run event. This is the single entry point for outcome
 * lines, so every event carries an `event` key that log tooling can filter on.
 *
 * Never throws: a serialization failure in the logger is reported and dropped.
 */
export function logEvent(input: LogEventInput, log: Logger = rootLogger): void {
  const level = eventLevel(input.type);
  try {
    log[level]({ event: input.type, ...input.payload }, input.type);
  } catch (err) {
    rootLogger.error({ err, eventType: input.type }, 'Failed to write run event');
  }
}

function eventLevel(type: RunEventType): 'info' | 'warn' | 'error' {
  switch (type) {
    case 'run.failed':
    case 'guest.send_failed':
      return 'error';
    case 'property.fetch_failed':
    case 'guest.resolution_failed':
      return 'warn';
    default:
      return 'info';
  }
}
