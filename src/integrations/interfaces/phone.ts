/**
 * Turns loosely formatted guest phone numbers into one canonical form so
 * that bookings from different channels map to the same guest.
 */
export interface IPhoneNormalizer {
  /**
   * Canonical E.164 form of `raw`, or `raw` unchanged when it cannot be
   * parsed. Never throws.
   */
  normalize(raw: string, regionHint: string): string;
}
