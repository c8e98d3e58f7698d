import { formatInTimeZone } from 'date-fns-tz';
import { logger as rootLogger, type Logger } from '../../config/logger';
import type { Contact, ContactList, CustomField } from '../../types/common';
import { TextMagicApiError, TextMagicAuthError, TextMagicNotFoundError } from '../errors';
import type {
  IMessagingAdapter,
  NewContactInput,
  ScheduledMessageInput,
} from '../interfaces/messaging';
import {
  textMagicContactSchema,
  textMagicCreateContactRequestSchema,
  textMagicCreatedResponseSchema,
  textMagicCustomFieldsResponseSchema,
  textMagicErrorBodySchema,
  textMagicListsResponseSchema,
  textMagicMessageResponseSchema,
  textMagicPingSchema,
  textMagicSendMessageRequestSchema,
} from '../validation';

export interface TextMagicAdapterOptions {
  username: string;
  apiKey: string;
  baseUrl?: string;
  logger?: Logger;
}

type HttpMethod = 'GET' | 'POST' | 'PUT';

const DEFAULT_BASE_URL = 'https://rest.textmagic.com';
const SUCCESS_STATUSES = new Set([200, 201, 202, 204]);

/**
 * TextMagic REST v2 adapter: contacts, custom fields, lists and messages.
 */
export class TextMagicAdapter implements IMessagingAdapter {
  readonly platformName = 'TextMagic' as const;

  private readonly baseUrl: string;
  private readonly log: Logger;

  constructor(private readonly options: TextMagicAdapterOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.log = (options.logger ?? rootLogger).child({ adapter: 'textmagic' });
  }

  async ping(): Promise<number> {
    const body = textMagicPingSchema.parse(await this.request('GET', '/api/v2/ping'));
    return body.id;
  }

  async getCustomFields(): Promise<CustomField[]> {
    const body = textMagicCustomFieldsResponseSchema.parse(
      await this.request('GET', '/api/v2/customfields?page=1&limit=999'),
    );
    return body.resources.map(({ id, name }) => ({ id, name }));
  }

  async getLists(): Promise<ContactList[]> {
    const body = textMagicListsResponseSchema.parse(
      await this.request('GET', '/api/v2/lists?page=1&limit=999'),
    );
    return body.resources.map(({ id, name }) => ({ id, name }));
  }

  async findContactByPhone(phone: string): Promise<Contact | null> {
    try {
      const body = textMagicContactSchema.parse(
        await this.request('GET', `/api/v2/contacts/phone/${encodeURIComponent(phone)}`),
      );
      return {
        id: body.id,
        firstName: body.firstName,
        lastName: body.lastName,
        phone: body.phone,
        email: body.email,
        customFields: body.customFields.flatMap((f) =>
          f.value == null ? [] : [{ fieldId: f.id, value: f.value }],
        ),
      };
    } catch (err) {
      if (err instanceof TextMagicNotFoundError) return null;
      throw err;
    }
  }

  async createContact(input: NewContactInput): Promise<Contact> {
    const payload = textMagicCreateContactRequestSchema.parse({
      firstName: input.firstName || undefined,
      lastName: input.lastName || undefined,
      phone: input.phone,
      email: input.email,
      lists: input.listIds.join(','),
      type: -1,
    });

    const body = textMagicCreatedResponseSchema.parse(
      await this.request('POST', '/api/v2/contacts/normalized', payload),
    );

    return {
      id: body.id,
      firstName: input.firstName,
      lastName: input.lastName,
      phone: input.phone,
      email: input.email,
      customFields: [],
    };
  }

  async setCustomFieldValue(fieldId: number, contactId: number, value: string): Promise<void> {
    await this.request('PUT', `/api/v2/customfields/${fieldId}/update`, {
      contactId: String(contactId),
      value,
    });
  }

  async sendMessageToContacts(input: ScheduledMessageInput): Promise<string> {
    // A send time already in the past means "send now".
    const scheduled = input.sendAt.getTime() > Date.now();
    const payload = textMagicSendMessageRequestSchema.parse({
      text: input.text,
      contacts: input.contactIds.join(','),
      ...(scheduled
        ? {
            sendingDateTime: formatInTimeZone(input.sendAt, input.timeZone, 'yyyy-MM-dd HH:mm:ss'),
            sendingTimeZone: input.timeZone,
          }
        : {}),
    });

    const body = textMagicMessageResponseSchema.parse(
      await this.request('POST', '/api/v2/messages', payload),
    );

    // Immediate sends carry a messageId; scheduled ones only a scheduleId.
    // A 2xx without either is still an accepted message.
    const id = body.messageId || body.scheduleId || body.id;
    if (!id) {
      this.log.warn({ contacts: payload.contacts }, 'TextMagic accepted message without an id');
      return '';
    }
    return String(id);
  }

  private async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: {
        'X-TM-Username': this.options.username,
        'X-TM-Key': this.options.apiKey,
        Accept: 'application/json; charset=utf-8',
        'Content-Type': 'application/json; charset=utf-8',
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (SUCCESS_STATUSES.has(res.status)) {
      const text = await res.text();
      return text.length > 0 ? JSON.parse(text) : null;
    }
    if (res.status === 401) throw new TextMagicAuthError();
    if (res.status === 404) throw new TextMagicNotFoundError(path);

    const errorBody = textMagicErrorBodySchema.safeParse(await res.json().catch(() => ({})));
    const detail = errorBody.success
      ? errorBody.data
      : { message: `HTTP ${res.status}`, code: res.status };

    this.log.debug({ method, path, status: res.status }, 'TextMagic request failed');
    throw new TextMagicApiError(res.status, detail);
  }
}
