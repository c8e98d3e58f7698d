import type { Booking, Contact, MessageTemplates } from '@/types/common';

export const DAY_MS = 24 * 60 * 60 * 1000;

export function daysBefore(date: Date, days: number): Date {
  return new Date(date.getTime() - days * DAY_MS);
}

export function daysAfter(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

let bookingSeq = 0;

export function makeBooking(overrides: Partial<Booking> = {}): Booking {
  bookingSeq++;
  const departureAt = overrides.departureAt ?? new Date('2026-06-05T11:00:00Z');
  return {
    externalId: `bk-${bookingSeq}`,
    propertyExternalId: 'prop-1',
    propertyName: 'Harbour View',
    guestName: 'Jane Doe',
    guestEmail: 'jane@example.test',
    guestPhone: '+447700900001',
    arrivalAt: overrides.arrivalAt ?? daysBefore(departureAt, 3),
    departureAt,
    channel: 'airbnb',
    status: 'confirmed',
    ...overrides,
  };
}

export function makeContact(overrides: Partial<Contact> = {}): Contact {
  return {
    id: 1,
    firstName: 'Jane',
    lastName: 'Doe',
    phone: '+447700900001',
    email: 'jane@example.test',
    customFields: [],
    ...overrides,
  };
}

export const TEMPLATES: MessageTemplates = {
  OLD: 'Hi {{FirstName}}, we miss you!',
  RECENT: 'Thanks for staying, {{FirstName}}.',
  DIRECT: 'Thanks for booking direct, {{FirstName}}!',
};
