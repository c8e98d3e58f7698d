import type { Contact, ContactList, CustomField } from '../../types/common';
import { TextMagicApiError } from '../errors';
import type {
  IMessagingAdapter,
  NewContactInput,
  ScheduledMessageInput,
} from '../interfaces/messaging';

export interface StubSentMessage extends ScheduledMessageInput {
  messageId: string;
}

export interface StubFieldWrite {
  fieldId: number;
  contactId: number;
  value: string;
}

/**
 * In-memory messaging adapter. Contacts live in a map keyed by phone; sent
 * messages and custom-field writes are recorded instead of leaving the
 * process. Failure sets let tests break individual calls per phone.
 */
export class StubMessagingAdapter implements IMessagingAdapter {
  readonly platformName = 'StubMessaging';

  readonly contacts = new Map<string, Contact>();
  readonly created: NewContactInput[] = [];
  readonly sent: StubSentMessage[] = [];
  readonly fieldWrites: StubFieldWrite[] = [];

  readonly failLookupFor = new Set<string>();
  readonly failCreateFor = new Set<string>();
  readonly failSendFor = new Set<string>();
  readonly failFieldWriteFor = new Set<string>();
  failPing = false;

  lookups = 0;
  private nextId = 1000;

  constructor(
    private readonly customFields: CustomField[] = [],
    private readonly lists: ContactList[] = [],
  ) {}

  addContact(contact: Omit<Contact, 'id'> & { id?: number }): Contact {
    const stored: Contact = { ...contact, id: contact.id ?? this.nextId++ };
    this.contacts.set(stored.phone, stored);
    return stored;
  }

  async ping(): Promise<number> {
    if (this.failPing) throw new Error('stub: ping failed');
    return 1;
  }

  async getCustomFields(): Promise<CustomField[]> {
    return [...this.customFields];
  }

  async getLists(): Promise<ContactList[]> {
    return [...this.lists];
  }

  async findContactByPhone(phone: string): Promise<Contact | null> {
    this.lookups++;
    if (this.failLookupFor.has(phone)) {
      throw new TextMagicApiError(500, { message: 'Internal Server Error', code: 500 });
    }
    return this.contacts.get(phone) ?? null;
  }

  async createContact(input: NewContactInput): Promise<Contact> {
    if (this.failCreateFor.has(input.phone)) {
      throw new TextMagicApiError(400, {
        message: 'Validation Failed',
        code: 400,
        errors: { fields: { phone: ['is not valid'] } },
      });
    }
    this.created.push(input);
    return this.addContact({
      firstName: input.firstName,
      lastName: input.lastName,
      phone: input.phone,
      email: input.email,
      customFields: [],
    });
  }

  async setCustomFieldValue(fieldId: number, contactId: number, value: string): Promise<void> {
    const contact = [...this.contacts.values()].find((c) => c.id === contactId);
    if (contact && this.failFieldWriteFor.has(contact.phone)) {
      throw new Error(`stub: custom field write failed for ${contact.phone}`);
    }
    this.fieldWrites.push({ fieldId, contactId, value });
    if (contact) {
      contact.customFields = [
        ...contact.customFields.filter((f) => f.fieldId !== fieldId),
        { fieldId, value },
      ];
    }
  }

  async sendMessageToContacts(input: ScheduledMessageInput): Promise<string> {
    const phones = [...this.contacts.values()]
      .filter((c) => input.contactIds.includes(c.id))
      .map((c) => c.phone);
    if (phones.some((p) => this.failSendFor.has(p))) {
      throw new Error('stub: send rejected');
    }
    const messageId = `stub-msg-${this.sent.length + 1}`;
    this.sent.push({ ...input, messageId });
    return messageId;
  }
}
