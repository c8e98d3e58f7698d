import { logger as rootLogger, type Logger } from '../config/logger';
import type { IMessagingAdapter } from '../integrations/interfaces/messaging';
import type { IPhoneNormalizer } from '../integrations/interfaces/phone';
import type { Booking, Contact, GuestIdentity } from '../types/common';

export interface GuestName {
  firstName: string;
  lastName: string;
}

/**
 * Best-effort display split: first token is the first name, the rest is the
 * last name. "Mary Ann Smith" -> { "Mary", "Ann Smith" }.
 */
export function splitGuestName(fullName: string): GuestName {
  const trimmed = fullName.trim();
  const match = /^(\S+)\s+([\s\S]+)$/.exec(trimmed);
  if (!match) return { firstName: trimmed, lastName: '' };
  return { firstName: match[1] ?? trimmed, lastName: match[2] ?? '' };
}

/** Two bookings with the same normalized phone are the same guest. */
export function toGuestIdentity(
  booking: Pick<Booking, 'guestPhone'>,
  normalizer: IPhoneNormalizer,
  regionHint: string,
): GuestIdentity {
  return { phone: normalizer.normalize(booking.guestPhone, regionHint) };
}

export type ResolveContactResult =
  | { success: true; contact: Contact; created: boolean }
  | { success: false; phone: string; error: string };

export interface ContactResolverDeps {
  messaging: IMessagingAdapter;
  /** Target list every new contact is enrolled in. */
  listId: number;
  log?: Logger;
}

/**
 * Finds or creates the messaging contact for a guest. Lookup always comes
 * first, so re-runs never duplicate contacts, and results are memoized per
 * phone for the lifetime of the resolver (one run).
 */
export class ContactResolver {
  private readonly resolved = new Map<string, ResolveContactResult>();
  private readonly log: Logger;

  constructor(private readonly deps: ContactResolverDeps) {
    this.log = deps.log ?? rootLogger;
  }

  async resolve(identity: GuestIdentity, booking: Booking): Promise<ResolveContactResult> {
    const cached = this.resolved.get(identity.phone);
    if (cached) return cached;

    const result = await this.lookupOrCreate(identity, booking);
    this.resolved.set(identity.phone, result);
    return result;
  }

  private async lookupOrCreate(
    identity: GuestIdentity,
    booking: Booking,
  ): Promise<ResolveContactResult> {
    const { phone } = identity;

    let existing: Contact | null;
    try {
      existing = await this.deps.messaging.findContactByPhone(phone);
    } catch (err) {
      this.log.error({ err, phone }, 'Contact lookup failed');
      return { success: false, phone, error: `lookup_failed: ${errorMessage(err)}` };
    }
    if (existing) return { success: true, contact: existing, created: false };

    const name = splitGuestName(booking.guestName);
    try {
      const contact = await this.deps.messaging.createContact({
        ...name,
        phone,
        email: booking.guestEmail,
        listIds: [this.deps.listId],
      });
      this.log.info({ phone, contactId: contact.id }, 'Created contact');
      return { success: true, contact, created: true };
    } catch (err) {
      this.log.warn({ err, phone }, 'Contact creation failed');
      return { success: false, phone, error: `create_failed: ${errorMessage(err)}` };
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
