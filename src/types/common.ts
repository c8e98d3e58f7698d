/**
 * Shared domain types for a guest messaging run.
 * Integration adapters map their wire formats into these shapes; services
 * never see raw API payloads.
 */

/** Message body variants. `null` stands for "send nothing" in decisions. */
export type TemplateTag = 'OLD' | 'RECENT' | 'DIRECT';

export const TEMPLATE_TAGS: readonly TemplateTag[] = ['OLD', 'RECENT', 'DIRECT'];

export function isTemplateTag(value: string): value is TemplateTag {
  return (TEMPLATE_TAGS as readonly string[]).includes(value);
}

export interface Property {
  externalId: string;
  name: string;
}

/** One reservation as read from the PMS. Never mutated during a run. */
export interface Booking {
  externalId: string;
  propertyExternalId: string;
  propertyName: string;
  guestName: string;
  guestEmail: string;
  guestPhone: string;
  arrivalAt: Date;
  /** Always >= arrivalAt; adapters reject anything else. */
  departureAt: Date;
  /** Sales channel tag, e.g. "uplisting" for direct or "airbnb". */
  channel: string;
  /** PMS status, e.g. "confirmed", "needs_check_in", "cancelled". */
  status: string;
}

/** Canonical key for a guest: the normalized phone number. */
export interface GuestIdentity {
  phone: string;
}

export interface CustomFieldValue {
  fieldId: number;
  value: string;
}

/** The guest's record in the messaging system. */
export interface Contact {
  id: number;
  firstName: string;
  lastName: string;
  phone: string;
  email: string;
  customFields: CustomFieldValue[];
}

export function customFieldValue(contact: Contact, fieldId: number): string | undefined {
  return contact.customFields.find((f) => f.fieldId === fieldId)?.value;
}

export interface CustomField {
  id: number;
  name: string;
}

export interface ContactList {
  id: number;
  name: string;
}

/** A guest, their contact and the stay that drives this run's decision. */
export interface GuestRunRecord {
  identity: GuestIdentity;
  contact: Contact;
  lastStay: Booking;
}

export type MessageTemplates = Record<TemplateTag, string>;
