import { cadenceConfig } from '../config/cadence';
import { logger as rootLogger, type Logger } from '../config/logger';
import type { IPmsAdapter } from '../integrations/interfaces/pms';
import { logEvent } from '../telemetry/events';
import type { Booking, GuestIdentity, GuestRunRecord, Property } from '../types/common';
import type { ContactResolver } from './identity-resolver.service';

export interface FetchBookingsResult {
  bookings: Booking[];
  failedProperties: string[];
}

/**
 * Load every property's bookings, one property at a time. A property whose
 * bookings cannot be fetched is logged and left out; the rest still count.
 */
export async function fetchAllBookings(
  pms: IPmsAdapter,
  properties: Property[],
  window: { from: Date; to: Date },
  log: Logger = rootLogger,
): Promise<FetchBookingsResult> {
  const bookings: Booking[] = [];
  const failedProperties: string[] = [];

  for (const property of properties) {
    try {
      const fetched = await pms.listBookings(property, window.from, window.to);
      log.info({ property: property.name, count: fetched.length }, 'Bookings fetched');
      bookings.push(...fetched);
    } catch (err) {
      failedProperties.push(property.externalId);
      logEvent(
        {
          type: 'property.fetch_failed',
          payload: { property: property.name, propertyId: property.externalId, err },
        },
        log,
      );
    }
  }

  return { bookings, failedProperties };
}

export interface GuestStay {
  identity: GuestIdentity;
  lastStay: Booking;
}

/**
 * Fold bookings into one "last relevant stay" per guest, keyed by phone.
 * Cancelled bookings are dropped; for repeat guests the latest departure
 * wins and ties keep the booking seen first. Stays that have not ended yet
 * are kept, since suppressing those is the cadence decision's job.
 */
export function collectLastStays(
  bookings: Iterable<Booking>,
  toIdentity: (booking: Booking) => GuestIdentity,
): Map<string, GuestStay> {
  const stays = new Map<string, GuestStay>();

  for (const booking of bookings) {
    if (booking.status === cadenceConfig.CANCELLED_STATUS) continue;

    const identity = toIdentity(booking);
    const current = stays.get(identity.phone);
    if (!current || booking.departureAt.getTime() > current.lastStay.departureAt.getTime()) {
      stays.set(identity.phone, { identity, lastStay: booking });
    }
  }

  return stays;
}

export interface BuildRecordsResult {
  records: GuestRunRecord[];
  resolutionFailed: number;
  contactsCreated: number;
}

/**
 * Attach a messaging contact to every guest stay. Guests whose contact
 * cannot be found or created are skipped for this run.
 */
export async function buildGuestRunRecords(
  stays: Map<string, GuestStay>,
  resolver: ContactResolver,
  log: Logger = rootLogger,
): Promise<BuildRecordsResult> {
  const records: GuestRunRecord[] = [];
  let resolutionFailed = 0;
  let contactsCreated = 0;

  for (const { identity, lastStay } of stays.values()) {
    const result = await resolver.resolve(identity, lastStay);
    if (!result.success) {
      resolutionFailed++;
      logEvent(
        {
          type: 'guest.resolution_failed',
          payload: { phone: identity.phone, property: lastStay.propertyName, error: result.error },
        },
        log,
      );
      continue;
    }

    if (result.created) contactsCreated++;
    records.push({ identity, contact: result.contact, lastStay });
  }

  return { records, resolutionFailed, contactsCreated };
}
