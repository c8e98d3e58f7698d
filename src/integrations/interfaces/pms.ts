/**
 * Interface for Property Management System (PMS) integrations.
 * The PMS is the source of truth for properties and reservations.
 */
import type { Booking, Property } from '../../types/common';

export interface IPmsAdapter {
  /** Human-readable name of this PMS (e.g. "Uplisting") */
  readonly pmsName: string;

  listProperties(): Promise<Property[]>;

  /**
   * Every booking for a property overlapping [from, to], in PMS order.
   * Pagination is handled inside the adapter; the result is fully buffered.
   */
  listBookings(property: Property, from: Date, to: Date): Promise<Booking[]>;
}
