/**
 * Errors that end a run. Everything else (a property that fails to load, a
 * guest that cannot be resolved or messaged) is reported as an outcome and
 * the run carries on.
 */

/** The messaging system is unreachable or missing the field/list the run needs. */
export class BootstrapError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BootstrapError';
  }
}

/**
 * A message was accepted but the new cadence state could not be written.
 * Continuing would risk re-sending to this guest on every future run.
 */
export class StatePersistenceError extends Error {
  constructor(
    readonly phone: string,
    readonly contactId: number,
    readonly newState: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to persist cadence state "${newState}" for contact ${contactId} (${phone})`, options);
    this.name = 'StatePersistenceError';
  }
}
