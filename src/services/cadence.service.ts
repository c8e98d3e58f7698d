import { cadenceConfig } from '../config/cadence';
import { isTemplateTag, type Booking, type TemplateTag } from '../types/common';

/**
 * What was last sent to a guest, decoded from the contact's cadence field.
 * The stored form is "<TAG>,<unix seconds>"; anything that does not parse
 * is treated as never messaged.
 */
export type CadenceState =
  | { kind: 'never_messaged' }
  | { kind: 'messaged'; template: TemplateTag; sentAt: Date };

export const NEVER_MESSAGED: CadenceState = { kind: 'never_messaged' };

export function decodeCadenceState(raw: string | undefined): CadenceState {
  if (!raw) return NEVER_MESSAGED;

  const [tag, seconds] = raw.split(',');
  if (tag === undefined || seconds === undefined) return NEVER_MESSAGED;
  if (!isTemplateTag(tag)) return NEVER_MESSAGED;
  if (!/^\d+$/.test(seconds)) return NEVER_MESSAGED;

  const unix = Number(seconds);
  if (!Number.isSafeInteger(unix)) return NEVER_MESSAGED;

  return { kind: 'messaged', template: tag, sentAt: new Date(unix * 1000) };
}

export function encodeCadenceState(template: TemplateTag, sentAt: Date): string {
  return `${template},${Math.floor(sentAt.getTime() / 1000)}`;
}

export interface CadenceInput {
  /** Fixed for the whole run. */
  now: Date;
  lastStay: Pick<Booking, 'departureAt' | 'channel'>;
  previous: CadenceState;
  /** Channels that mean the guest booked with us directly. */
  directChannels: readonly string[];
}

export type SkipReason = 'stay_not_finished' | 'not_due';

export type CadenceDecision =
  | { template: null; reason: SkipReason; previous: CadenceState }
  | { template: TemplateTag; newState: string; previous: CadenceState };

/**
 * Pick the message for one guest, or null for none.
 *
 *   departure in the future          -> none
 *   never messaged                   -> RECENT if they left < 30 days ago, else OLD
 *   last sent OLD                    -> RECENT if they have checked out since
 *   last sent RECENT                 -> RECENT if they left > 180 days after it
 *   last sent DIRECT                 -> none
 *   any send on a direct channel     -> DIRECT instead
 */
export function chooseTemplate(input: CadenceInput): TemplateTag | null {
  const { now, lastStay, previous } = input;
  const departure = lastStay.departureAt.getTime();

  if (departure > now.getTime()) return null;

  let chosen: TemplateTag | null = null;

  if (previous.kind === 'never_messaged') {
    chosen = now.getTime() - departure < cadenceConfig.RECENT_STAY_WINDOW_MS ? 'RECENT' : 'OLD';
  } else if (previous.template === 'OLD') {
    if (departure > previous.sentAt.getTime()) chosen = 'RECENT';
  } else if (previous.template === 'RECENT') {
    if (departure - previous.sentAt.getTime() > cadenceConfig.RECENT_RESEND_GAP_MS) chosen = 'RECENT';
  }

  if (chosen !== null && input.directChannels.includes(lastStay.channel)) {
    chosen = 'DIRECT';
  }
  return chosen;
}

/**
 * chooseTemplate plus the state string to persist once the send succeeds.
 */
export function decideCadence(input: CadenceInput): CadenceDecision {
  const template = chooseTemplate(input);

  if (template === null) {
    const reason: SkipReason =
      input.lastStay.departureAt.getTime() > input.now.getTime() ? 'stay_not_finished' : 'not_due';
    return { template: null, reason, previous: input.previous };
  }

  return {
    template,
    newState: encodeCadenceState(template, input.now),
    previous: input.previous,
  };
}
