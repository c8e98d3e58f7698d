import { v4 as uuid } from 'uuid';
import { logger as rootLogger, type Logger } from '../config/logger';
import type { IMessagingAdapter } from '../integrations/interfaces/messaging';
import type { IPhoneNormalizer } from '../integrations/interfaces/phone';
import type { IPmsAdapter } from '../integrations/interfaces/pms';
import { logEvent } from '../telemetry/events';
import { startTimer } from '../telemetry/timing';
import {
  customFieldValue,
  type ContactList,
  type CustomField,
  type MessageTemplates,
  type Property,
} from '../types/common';
import { BootstrapError } from '../types/errors';
import { decideCadence, decodeCadenceState } from './cadence.service';
import { dispatchMessage } from './dispatch.service';
import { ContactResolver, toGuestIdentity } from './identity-resolver.service';
import {
  buildGuestRunRecords,
  collectLastStays,
  fetchAllBookings,
} from './stay-aggregator.service';

export interface RunSettings {
  /** Name of the contact custom field holding cadence state. */
  stateFieldName: string;
  /** Name of the list new contacts are enrolled in. */
  listName: string;
  templates: MessageTemplates;
  phoneRegion: string;
  sendTimeZone: string;
  directChannels: readonly string[];
  lookbackHours: number;
  dryRun: boolean;
}

export interface GuestMessagingRunDeps {
  pms: IPmsAdapter;
  messaging: IMessagingAdapter;
  normalizer: IPhoneNormalizer;
  settings: RunSettings;
  log?: Logger;
}

export interface RunSummary {
  runId: string;
  properties: number;
  failedProperties: string[];
  bookings: number;
  guests: number;
  contactsCreated: number;
  resolutionFailed: number;
  skipped: number;
  sent: number;
  sendFailed: number;
  dryRun: number;
}

export interface MessagingBootstrap {
  stateField: CustomField;
  list: ContactList;
}

/**
 * Check credentials and locate the cadence field and target list by name.
 * Any failure here aborts the run before a single guest is touched.
 */
export async function bootstrapMessaging(
  messaging: IMessagingAdapter,
  settings: Pick<RunSettings, 'stateFieldName' | 'listName'>,
): Promise<MessagingBootstrap> {
  try {
    await messaging.ping();
  } catch (err) {
    throw new BootstrapError(`${messaging.platformName} did not answer ping`, { cause: err });
  }

  let fields: CustomField[];
  try {
    fields = await messaging.getCustomFields();
  } catch (err) {
    throw new BootstrapError(`${messaging.platformName} did not return custom fields`, {
      cause: err,
    });
  }
  const stateField = fields.find((f) => f.name === settings.stateFieldName);
  if (!stateField) {
    throw new BootstrapError(`Custom field "${settings.stateFieldName}" does not exist`);
  }

  let lists: ContactList[];
  try {
    lists = await messaging.getLists();
  } catch (err) {
    throw new BootstrapError(`${messaging.platformName} did not return lists`, { cause: err });
  }
  const list = lists.find((l) => l.name === settings.listName);
  if (!list) {
    throw new BootstrapError(`Contact list "${settings.listName}" does not exist`);
  }

  return { stateField, list };
}

/**
 * One batch run: bootstrap, gather every property's bookings over the
 * lookback window, reduce them to one stay per guest, then decide and
 * dispatch guest by guest.
 *
 * Resolves with a summary. Rejects with BootstrapError before any guest is
 * processed, or with StatePersistenceError part-way through.
 */
export async function runGuestMessaging(
  deps: GuestMessagingRunDeps,
  now: Date,
): Promise<RunSummary> {
  const runId = uuid();
  const log = (deps.log ?? rootLogger).child({ runId });
  const { settings } = deps;
  const timer = startTimer('run.guestMessaging', log);

  logEvent({ type: 'run.started', payload: { now: now.toISOString(), dryRun: settings.dryRun } }, log);

  try {
    const { stateField, list } = await bootstrapMessaging(deps.messaging, settings);

    let properties: Property[];
    try {
      properties = await deps.pms.listProperties();
    } catch (err) {
      throw new BootstrapError(`${deps.pms.pmsName} did not return properties`, { cause: err });
    }

    const from = new Date(now.getTime() - settings.lookbackHours * 60 * 60 * 1000);
    const fetched = await fetchAllBookings(deps.pms, properties, { from, to: now }, log);

    const stays = collectLastStays(fetched.bookings, (booking) =>
      toGuestIdentity(booking, deps.normalizer, settings.phoneRegion),
    );
    const resolver = new ContactResolver({ messaging: deps.messaging, listId: list.id, log });
    const built = await buildGuestRunRecords(stays, resolver, log);

    const summary: RunSummary = {
      runId,
      properties: properties.length,
      failedProperties: fetched.failedProperties,
      bookings: fetched.bookings.length,
      guests: stays.size,
      contactsCreated: built.contactsCreated,
      resolutionFailed: built.resolutionFailed,
      skipped: 0,
      sent: 0,
      sendFailed: 0,
      dryRun: 0,
    };

    for (const record of built.records) {
      const decision = decideCadence({
        now,
        lastStay: record.lastStay,
        previous: decodeCadenceState(customFieldValue(record.contact, stateField.id)),
        directChannels: settings.directChannels,
      });

      if (decision.template === null) {
        summary.skipped++;
        logEvent(
          {
            type: 'guest.skipped',
            payload: {
              phone: record.identity.phone,
              reason: decision.reason,
              departure: record.lastStay.departureAt.toISOString(),
            },
          },
          log,
        );
        continue;
      }

      const result = await dispatchMessage(
        { record, template: decision.template, newState: decision.newState, now },
        {
          messaging: deps.messaging,
          stateFieldId: stateField.id,
          templates: settings.templates,
          timeZone: settings.sendTimeZone,
          dryRun: settings.dryRun,
          log,
        },
      );

      if (result.status === 'sent') summary.sent++;
      else if (result.status === 'dry_run') summary.dryRun++;
      else summary.sendFailed++;
    }

    logEvent({ type: 'run.completed', payload: { ...summary } }, log);
    return summary;
  } catch (err) {
    logEvent({ type: 'run.failed', payload: { err } }, log);
    throw err;
  } finally {
    timer.stop();
  }
}
