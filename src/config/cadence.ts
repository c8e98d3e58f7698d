/**
 * Guest messaging cadence configuration.
 * Thresholds for the deterministic template decision and the send schedule.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

export const cadenceConfig = {
  /** A never-messaged guest who left within this window gets RECENT, otherwise OLD. */
  RECENT_STAY_WINDOW_MS: 30 * DAY_MS,

  /**
   * A guest last sent RECENT is messaged again once their latest departure
   * is more than this long after that message.
   */
  RECENT_RESEND_GAP_MS: 180 * DAY_MS,

  /** Local hour (24h clock) at which messages are scheduled. */
  SEND_HOUR: 19,

  /** Booking status that excludes a reservation from aggregation. */
  CANCELLED_STATUS: 'cancelled',
} as const;
