import { describe, it, expect } from 'vitest';
import { StubMessagingAdapter } from '@/integrations/adapters/stub-messaging';
import type { IPhoneNormalizer } from '@/integrations/interfaces/phone';
import {
  ContactResolver,
  splitGuestName,
  toGuestIdentity,
} from '@/services/identity-resolver.service';
import { makeBooking, makeContact } from '../fixtures';

const LIST_ID = 77;

describe('identity-resolver.service', () => {
  describe('splitGuestName', () => {
    it('splits on the first whitespace', () => {
      expect(splitGuestName('Doris Rodríguez')).toEqual({ firstName: 'Doris', lastName: 'Rodríguez' });
      expect(splitGuestName('Mary Ann Smith')).toEqual({ firstName: 'Mary', lastName: 'Ann Smith' });
    });

    it('trims surrounding whitespace and collapses the split gap', () => {
      expect(splitGuestName('  Ana   Lopez ')).toEqual({ firstName: 'Ana', lastName: 'Lopez' });
    });

    it('leaves the last name empty for a single token', () => {
      expect(splitGuestName('Cher')).toEqual({ firstName: 'Cher', lastName: '' });
      expect(splitGuestName('')).toEqual({ firstName: '', lastName: '' });
    });
  });

  describe('toGuestIdentity', () => {
    it('keys the guest by the normalized phone', () => {
      const calls: Array<[string, string]> = [];
      const normalizer: IPhoneNormalizer = {
        normalize(raw, region) {
          calls.push([raw, region]);
          return raw.replace(/\s/g, '');
        },
      };
      const identity = toGuestIdentity(makeBooking({ guestPhone: '+44 7700 900123' }), normalizer, 'GB');
      expect(identity).toEqual({ phone: '+447700900123' });
      expect(calls).toEqual([['+44 7700 900123', 'GB']]);
    });
  });

  describe('ContactResolver', () => {
    it('returns an existing contact without creating one', async () => {
      const messaging = new StubMessagingAdapter();
      const existing = messaging.addContact(makeContact({ id: 5, phone: '+447700900123' }));
      const resolver = new ContactResolver({ messaging, listId: LIST_ID });

      const result = await resolver.resolve({ phone: '+447700900123' }, makeBooking());

      expect(result).toEqual({ success: true, contact: existing, created: false });
      expect(messaging.created).toHaveLength(0);
    });

    it('creates a missing contact in the target list with a split name', async () => {
      const messaging = new StubMessagingAdapter();
      const resolver = new ContactResolver({ messaging, listId: LIST_ID });
      const booking = makeBooking({
        guestName: 'Doris Rodríguez',
        guestEmail: 'doris@example.test',
        guestPhone: '07700 900456',
      });

      const result = await resolver.resolve({ phone: '+447700900456' }, booking);

      expect(messaging.created).toEqual([
        {
          firstName: 'Doris',
          lastName: 'Rodríguez',
          phone: '+447700900456',
          email: 'doris@example.test',
          listIds: [LIST_ID],
        },
      ]);
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.created).toBe(true);
        expect(result.contact.id).toBe(1000);
        expect(result.contact.customFields).toEqual([]);
      }
    });

    it('looks up and creates at most once per phone', async () => {
      const messaging = new StubMessagingAdapter();
      const resolver = new ContactResolver({ messaging, listId: LIST_ID });
      const identity = { phone: '+447700900789' };

      const first = await resolver.resolve(identity, makeBooking());
      const second = await resolver.resolve(identity, makeBooking({ guestName: 'Someone Else' }));

      expect(second).toBe(first);
      expect(messaging.lookups).toBe(1);
      expect(messaging.created).toHaveLength(1);
    });

    it('reports a lookup failure without trying to create', async () => {
      const messaging = new StubMessagingAdapter();
      messaging.failLookupFor.add('+447700900111');
      const resolver = new ContactResolver({ messaging, listId: LIST_ID });

      const result = await resolver.resolve({ phone: '+447700900111' }, makeBooking());

      expect(result).toEqual({
        success: false,
        phone: '+447700900111',
        error: 'lookup_failed: Internal Server Error (500)',
      });
      expect(messaging.created).toHaveLength(0);
    });

    it('reports a creation failure', async () => {
      const messaging = new StubMessagingAdapter();
      messaging.failCreateFor.add('+447700900222');
      const resolver = new ContactResolver({ messaging, listId: LIST_ID });

      const result = await resolver.resolve({ phone: '+447700900222' }, makeBooking());

      expect(result).toEqual({
        success: false,
        phone: '+447700900222',
        error: 'create_failed: Validation Failed (400): phone: is not valid',
      });
    });
  });
});
