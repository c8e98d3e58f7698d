import { describe, it, expect } from 'vitest';
import { LibPhoneNumberNormalizer } from '@/integrations/adapters/libphonenumber';
import { StubMessagingAdapter } from '@/integrations/adapters/stub-messaging';
import { StubPmsAdapter } from '@/integrations/adapters/stub-pms';
import {
  bootstrapMessaging,
  runGuestMessaging,
  type RunSettings,
} from '@/services/guest-messaging-run.service';
import { BootstrapError, StatePersistenceError } from '@/types/errors';
import { TEMPLATES, daysAfter, daysBefore, makeBooking, makeContact } from '../fixtures';

const NOW = new Date('2026-10-19T12:00:00Z');
const NOW_UNIX = 1792411200;
const STATE_FIELD = { id: 42, name: 'Guest texter state' };
const GUEST_LIST = { id: 7, name: 'Guests' };

const SETTINGS: RunSettings = {
  stateFieldName: STATE_FIELD.name,
  listName: GUEST_LIST.name,
  templates: TEMPLATES,
  phoneRegion: 'GB',
  sendTimeZone: 'Europe/London',
  directChannels: ['uplisting'],
  lookbackHours: 1000,
  dryRun: false,
};

/**
 * Three properties, the second of which fails to load.
 *   A  +447700900001  two stays (one per property), left 10 days ago, new contact -> RECENT
 *   B  +447700900002  direct booking, last sent OLD before this stay         -> DIRECT
 *   C  +447700900003  still in the house                                      -> skipped
 *   D  +447700900004  sent RECENT 20 days ago                                 -> skipped
 *   E  +447700900005  cancelled                                               -> ignored
 *   F  +447700900006  contact lookup fails                                    -> unresolved
 */
function buildWorld() {
  const pms = new StubPmsAdapter(
    [
      { externalId: 'p1', name: 'Harbour View' },
      { externalId: 'p2', name: 'Old Mill' },
      { externalId: 'p3', name: 'Garden Flat' },
    ],
    {
      p1: [
        makeBooking({ guestName: 'Alice Walker', guestPhone: '+44 7700 900001', departureAt: daysBefore(NOW, 10) }),
        makeBooking({
          guestName: 'Bob Stone',
          guestPhone: '07700 900002',
          departureAt: daysBefore(NOW, 5),
          channel: 'uplisting',
        }),
        makeBooking({ guestName: 'Cara Lane', guestPhone: '+447700900003', departureAt: daysAfter(NOW, 2) }),
        makeBooking({ guestPhone: '+447700900005', departureAt: daysBefore(NOW, 3), status: 'cancelled' }),
      ],
      p2: [makeBooking({ guestPhone: '+447700900009' })],
      p3: [
        makeBooking({ guestName: 'Alice W', guestPhone: '447700900001', departureAt: daysBefore(NOW, 100) }),
        makeBooking({ guestPhone: '+447700900004', departureAt: daysBefore(NOW, 25) }),
        makeBooking({ guestPhone: '+447700900006', departureAt: daysBefore(NOW, 8) }),
      ],
    },
  );
  pms.failingProperties.add('p2');

  const messaging = new StubMessagingAdapter([STATE_FIELD], [GUEST_LIST]);
  messaging.addContact(
    makeContact({
      id: 11,
      firstName: 'Bob',
      phone: '+447700900002',
      customFields: [{ fieldId: STATE_FIELD.id, value: 'OLD,1788220800' }],
    }),
  );
  messaging.addContact(
    makeContact({
      id: 14,
      firstName: 'Dan',
      phone: '+447700900004',
      customFields: [{ fieldId: STATE_FIELD.id, value: 'RECENT,1790683200' }],
    }),
  );
  messaging.failLookupFor.add('+447700900006');

  const deps = { pms, messaging, normalizer: new LibPhoneNumberNormalizer(), settings: SETTINGS };
  return { pms, messaging, deps };
}

describe('guest-messaging-run.service', () => {
  describe('bootstrapMessaging', () => {
    it('finds the cadence field and the target list by name', async () => {
      const messaging = new StubMessagingAdapter(
        [{ id: 1, name: 'Other' }, STATE_FIELD],
        [GUEST_LIST],
      );
      await expect(bootstrapMessaging(messaging, SETTINGS)).resolves.toEqual({
        stateField: STATE_FIELD,
        list: GUEST_LIST,
      });
    });

    it('fails when the ping fails', async () => {
      const messaging = new StubMessagingAdapter([STATE_FIELD], [GUEST_LIST]);
      messaging.failPing = true;
      await expect(bootstrapMessaging(messaging, SETTINGS)).rejects.toThrow(
        'StubMessaging did not answer ping',
      );
    });

    it('fails when the custom field is missing', async () => {
      const messaging = new StubMessagingAdapter([], [GUEST_LIST]);
      await expect(bootstrapMessaging(messaging, SETTINGS)).rejects.toThrow(
        'Custom field "Guest texter state" does not exist',
      );
    });

    it('fails when the list is missing', async () => {
      const messaging = new StubMessagingAdapter([STATE_FIELD], []);
      await expect(bootstrapMessaging(messaging, SETTINGS)).rejects.toThrow(
        'Contact list "Guests" does not exist',
      );
    });
  });

  describe('runGuestMessaging', () => {
    it('decides and dispatches per guest and summarises the run', async () => {
      const { pms, messaging, deps } = buildWorld();

      const summary = await runGuestMessaging(deps, NOW);

      expect(summary).toMatchObject({
        properties: 3,
        failedProperties: ['p2'],
        bookings: 7,
        guests: 5,
        contactsCreated: 2,
        resolutionFailed: 1,
        skipped: 2,
        sent: 2,
        sendFailed: 0,
        dryRun: 0,
      });
      expect(summary.runId).toMatch(/^[0-9a-f-]{36}$/);

      expect(pms.calls[0]?.from).toEqual(new Date(NOW.getTime() - 1000 * 60 * 60 * 1000));
      expect(pms.calls[0]?.to).toEqual(NOW);

      expect(messaging.created.map((c) => [c.phone, c.firstName, c.lastName, c.listIds])).toEqual([
        ['+447700900001', 'Alice', 'Walker', [7]],
        ['+447700900003', 'Cara', 'Lane', [7]],
      ]);

      expect(messaging.sent.map((m) => [m.contactIds, m.text])).toEqual([
        [[1000], 'Thanks for staying, Alice.'],
        [[11], 'Thanks for booking direct, Bob!'],
      ]);
      expect(messaging.sent[0]?.sendAt).toEqual(new Date('2026-10-19T18:00:00Z'));

      expect(messaging.fieldWrites).toEqual([
        { fieldId: 42, contactId: 1000, value: `RECENT,${NOW_UNIX}` },
        { fieldId: 42, contactId: 11, value: `DIRECT,${NOW_UNIX}` },
      ]);
    });

    it('sends nothing on a second run the same day', async () => {
      const { messaging, deps } = buildWorld();

      await runGuestMessaging(deps, NOW);
      const second = await runGuestMessaging(deps, NOW);

      expect(second.sent).toBe(0);
      expect(second.skipped).toBe(4);
      expect(second.contactsCreated).toBe(0);
      expect(messaging.sent).toHaveLength(2);
    });

    it('keeps going when a send fails', async () => {
      const { messaging, deps } = buildWorld();
      messaging.failSendFor.add('+447700900001');

      const summary = await runGuestMessaging(deps, NOW);

      expect(summary.sendFailed).toBe(1);
      expect(summary.sent).toBe(1);
      expect(messaging.fieldWrites).toEqual([
        { fieldId: 42, contactId: 11, value: `DIRECT,${NOW_UNIX}` },
      ]);
    });

    it('halts when a state write fails after a send', async () => {
      const { messaging, deps } = buildWorld();
      messaging.failFieldWriteFor.add('+447700900001');

      await expect(runGuestMessaging(deps, NOW)).rejects.toBeInstanceOf(StatePersistenceError);
      expect(messaging.sent).toHaveLength(1);
      expect(messaging.fieldWrites).toEqual([]);
    });

    it('touches no guest when bootstrap fails', async () => {
      const { pms, messaging, deps } = buildWorld();
      const run = runGuestMessaging(
        { ...deps, settings: { ...SETTINGS, stateFieldName: 'Missing field' } },
        NOW,
      );

      await expect(run).rejects.toBeInstanceOf(BootstrapError);
      expect(pms.calls).toEqual([]);
      expect(messaging.lookups).toBe(0);
    });

    it('aborts when the property list cannot be loaded', async () => {
      const { pms, deps } = buildWorld();
      pms.failPropertyList = true;

      await expect(runGuestMessaging(deps, NOW)).rejects.toThrow('StubPMS did not return properties');
    });

    it('only logs decisions in dry-run mode', async () => {
      const { messaging, deps } = buildWorld();

      const summary = await runGuestMessaging(
        { ...deps, settings: { ...SETTINGS, dryRun: true } },
        NOW,
      );

      expect(summary.dryRun).toBe(2);
      expect(summary.sent).toBe(0);
      expect(messaging.sent).toEqual([]);
      expect(messaging.fieldWrites).toEqual([]);
    });
  });
});
