/**
 * Interface for the contact/messaging platform (TextMagic, etc.)
 *
 * The platform owns guest contacts and the one custom field that holds
 * each guest's cadence state. This system keeps no other storage.
 */
import type { Contact, ContactList, CustomField } from '../../types/common';

export interface NewContactInput {
  firstName: string;
  lastName: string;
  phone: string;
  email: string;
  /** Lists the contact is enrolled in on creation. */
  listIds: number[];
}

export interface ScheduledMessageInput {
  text: string;
  contactIds: number[];
  sendAt: Date;
  /** IANA zone the platform should schedule `sendAt` in. */
  timeZone: string;
}

export interface IMessagingAdapter {
  /** Human-readable name of this messaging platform */
  readonly platformName: string;

  /** Verify credentials. Resolves with the account's user id. */
  ping(): Promise<number>;

  getCustomFields(): Promise<CustomField[]>;

  getLists(): Promise<ContactList[]>;

  /** Resolves null when no contact has this phone; rejects on any other failure. */
  findContactByPhone(phone: string): Promise<Contact | null>;

  /** Custom-field values cannot be set here; use setCustomFieldValue afterwards. */
  createContact(input: NewContactInput): Promise<Contact>;

  setCustomFieldValue(fieldId: number, contactId: number, value: string): Promise<void>;

  /** Submit (or schedule) a message. Resolves with the platform's message id. */
  sendMessageToContacts(input: ScheduledMessageInput): Promise<string>;
}
