import type { Booking, Property } from '../../types/common';
import type { IPmsAdapter } from '../interfaces/pms';

export interface ListBookingsCall {
  propertyExternalId: string;
  from: Date;
  to: Date;
}

/**
 * In-memory PMS adapter. Serves canned properties and bookings and records
 * every listBookings call. Properties listed in `failingProperties` reject.
 */
export class StubPmsAdapter implements IPmsAdapter {
  readonly pmsName = 'StubPMS';

  readonly calls: ListBookingsCall[] = [];
  readonly failingProperties = new Set<string>();
  failPropertyList = false;

  constructor(
    private readonly properties: Property[] = [],
    private readonly bookingsByProperty: Record<string, Booking[]> = {},
  ) {}

  async listProperties(): Promise<Property[]> {
    if (this.failPropertyList) throw new Error('stub: property list unavailable');
    return [...this.properties];
  }

  async listBookings(property: Property, from: Date, to: Date): Promise<Booking[]> {
    this.calls.push({ propertyExternalId: property.externalId, from, to });
    if (this.failingProperties.has(property.externalId)) {
      throw new Error(`stub: bookings unavailable for ${property.externalId}`);
    }
    return [...(this.bookingsByProperty[property.externalId] ?? [])];
  }
}
