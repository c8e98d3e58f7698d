import { addDays, format, parseISO } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { cadenceConfig } from '../config/cadence';
import { logger as rootLogger, type Logger } from '../config/logger';
import type { IMessagingAdapter } from '../integrations/interfaces/messaging';
import { logEvent } from '../telemetry/events';
import type { Contact, GuestRunRecord, MessageTemplates, TemplateTag } from '../types/common';
import { StatePersistenceError } from '../types/errors';

const FIRST_NAME_PLACEHOLDER = /\{\{\s*\.?FirstName\s*\}\}/g;

/** Substitute the contact's trimmed first name into the template body. */
export function renderTemplate(
  templates: MessageTemplates,
  tag: TemplateTag,
  contact: Pick<Contact, 'firstName'>,
): string {
  const firstName = contact.firstName.trim();
  return templates[tag].replace(FIRST_NAME_PLACEHOLDER, () => firstName);
}

/**
 * Guests book in the evening, so messages go out at SEND_HOUR local time:
 * today if that is still ahead of `now`, otherwise tomorrow.
 */
export function computeSendAt(
  now: Date,
  timeZone: string,
  hour: number = cadenceConfig.SEND_HOUR,
): Date {
  const today = formatInTimeZone(now, timeZone, 'yyyy-MM-dd');
  const sendAt = atLocalHour(today, hour, timeZone);
  if (sendAt.getTime() >= now.getTime()) return sendAt;

  const tomorrow = format(addDays(parseISO(today), 1), 'yyyy-MM-dd');
  return atLocalHour(tomorrow, hour, timeZone);
}

function atLocalHour(day: string, hour: number, timeZone: string): Date {
  return fromZonedTime(`${day}T${String(hour).padStart(2, '0')}:00:00`, timeZone);
}

export interface DispatchInput {
  record: GuestRunRecord;
  template: TemplateTag;
  newState: string;
  now: Date;
}

export interface DispatchDeps {
  messaging: IMessagingAdapter;
  stateFieldId: number;
  templates: MessageTemplates;
  timeZone: string;
  dryRun: boolean;
  log?: Logger;
}

export type DispatchResult =
  | { status: 'sent'; messageId: string; sendAt: Date; newState: string }
  | { status: 'dry_run'; sendAt: Date; newState: string; text: string }
  | { status: 'send_failed'; error: string };

/**
 * Schedule one guest message and record it in the contact's cadence field.
 *
 * A failed send leaves the stored state alone so the guest is evaluated
 * again next run. A failed state write after a successful send throws
 * StatePersistenceError: the message is out and nothing remembers it.
 * The two calls are not atomic; a crash in between re-sends next run.
 */
export async function dispatchMessage(
  input: DispatchInput,
  deps: DispatchDeps,
): Promise<DispatchResult> {
  const log = deps.log ?? rootLogger;
  const { contact, identity } = input.record;

  const text = renderTemplate(deps.templates, input.template, contact);
  const sendAt = computeSendAt(input.now, deps.timeZone);

  if (deps.dryRun) {
    logEvent(
      {
        type: 'guest.dry_run',
        payload: {
          phone: identity.phone,
          template: input.template,
          sendAt: sendAt.toISOString(),
          newState: input.newState,
        },
      },
      log,
    );
    return { status: 'dry_run', sendAt, newState: input.newState, text };
  }

  let messageId: string;
  try {
    messageId = await deps.messaging.sendMessageToContacts({
      text,
      contactIds: [contact.id],
      sendAt,
      timeZone: deps.timeZone,
    });
  } catch (err) {
    logEvent(
      {
        type: 'guest.send_failed',
        payload: { phone: identity.phone, template: input.template, err },
      },
      log,
    );
    return { status: 'send_failed', error: err instanceof Error ? err.message : String(err) };
  }

  try {
    await deps.messaging.setCustomFieldValue(deps.stateFieldId, contact.id, input.newState);
  } catch (err) {
    throw new StatePersistenceError(identity.phone, contact.id, input.newState, { cause: err });
  }

  logEvent(
    {
      type: 'guest.message_sent',
      payload: {
        phone: identity.phone,
        template: input.template,
        messageId,
        sendAt: sendAt.toISOString(),
        newState: input.newState,
      },
    },
    log,
  );
  return { status: 'sent', messageId, sendAt, newState: input.newState };
}
