import { logger as rootLogger, type Logger } from '../../config/logger';
import type { Booking, Property } from '../../types/common';
import { UplistingApiError } from '../errors';
import type { IPmsAdapter } from '../interfaces/pms';
import {
  uplistingBookingSchema,
  uplistingBookingsPageSchema,
  uplistingPropertiesResponseSchema,
  type UplistingBooking,
} from '../validation';

export interface UplistingAdapterOptions {
  apiKey: string;
  baseUrl?: string;
  logger?: Logger;
}

export interface UplistingBookingsPage {
  bookings: Booking[];
  total: number;
  totalPages: number;
}

const DEFAULT_BASE_URL = 'https://connect.uplisting.io';

/**
 * Uplisting PMS adapter. Read-only: lists properties and pages through
 * each property's bookings.
 */
export class UplistingPmsAdapter implements IPmsAdapter {
  readonly pmsName = 'Uplisting' as const;

  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly log: Logger;

  constructor(options: UplistingAdapterOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.authorization = `Basic ${Buffer.from(options.apiKey).toString('base64')}`;
    this.log = (options.logger ?? rootLogger).child({ adapter: 'uplisting' });
  }

  async listProperties(): Promise<Property[]> {
    const body = uplistingPropertiesResponseSchema.parse(await this.get('/properties'));

    return body.data.map((item) => ({
      externalId: item.id,
      name: item.attributes.name,
    }));
  }

  async listBookings(property: Property, from: Date, to: Date): Promise<Booking[]> {
    const bookings: Booking[] = [];
    let totalPages = 1;

    // Pages are zero-based; total_pages comes back with every page.
    for (let page = 0; page < totalPages; page++) {
      const result = await this.fetchBookingsPage(property, from, to, page);
      bookings.push(...result.bookings);
      totalPages = result.totalPages;
    }

    this.log.debug(
      { property: property.name, count: bookings.length, pages: totalPages },
      'Fetched bookings',
    );
    return bookings;
  }

  async fetchBookingsPage(
    property: Property,
    from: Date,
    to: Date,
    page: number,
  ): Promise<UplistingBookingsPage> {
    const query = new URLSearchParams({
      from: isoDay(from),
      to: isoDay(to),
      page: String(page),
    });
    const path = `/bookings/${encodeURIComponent(property.externalId)}?${query.toString()}`;
    const body = uplistingBookingsPageSchema.parse(await this.get(path));

    const bookings: Booking[] = [];
    for (const raw of body.bookings) {
      const parsed = uplistingBookingSchema.safeParse(raw);
      if (!parsed.success) {
        this.log.warn(
          { property: property.name, issues: parsed.error.issues },
          'Skipping malformed booking',
        );
        continue;
      }

      const booking = toBooking(parsed.data, property);
      if (!booking) {
        this.log.warn(
          { property: property.name, bookingId: parsed.data.id },
          'Skipping booking with invalid stay window',
        );
        continue;
      }
      bookings.push(booking);
    }

    return { bookings, total: body.meta.total, totalPages: body.meta.total_pages };
  }

  private async get(path: string): Promise<unknown> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method: 'GET',
      headers: {
        Authorization: this.authorization,
        Accept: 'application/json; charset=utf-8',
      },
    });

    if (res.status !== 200) {
      const text = await res.text().catch(() => '');
      throw new UplistingApiError(res.status, path, text);
    }
    return res.json();
  }
}

/**
 * Map a validated Uplisting booking onto the domain shape. Check-in/out
 * dates plus arrival/departure times are read as UTC wall-clock; a missing
 * time of day counts as midnight. Returns null when the window is unusable.
 */
export function toBooking(raw: UplistingBooking, property: Property): Booking | null {
  const arrivalAt = new Date(`${raw.check_in}T${withSeconds(raw.arrival_time)}Z`);
  const departureAt = new Date(`${raw.check_out}T${withSeconds(raw.departure_time)}Z`);

  if (isNaN(arrivalAt.getTime()) || isNaN(departureAt.getTime())) return null;
  if (departureAt.getTime() < arrivalAt.getTime()) return null;

  return {
    externalId: raw.id,
    propertyExternalId: raw.property_id ?? property.externalId,
    propertyName: raw.property_name ?? property.name,
    guestName: raw.guest_name,
    guestEmail: raw.guest_email,
    guestPhone: raw.guest_phone,
    arrivalAt,
    departureAt,
    channel: raw.channel,
    status: raw.status,
  };
}

function withSeconds(time: string | null | undefined): string {
  if (!time) return '00:00:00';
  return time.length === 5 ? `${time}:00` : time;
}

function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}
