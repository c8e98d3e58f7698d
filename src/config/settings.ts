import type { RunSettings } from '../services/guest-messaging-run.service';
import type { Env } from './env';

/** Map validated environment variables onto the settings a run consumes. */
export function buildRunSettings(env: Env): RunSettings {
  return {
    stateFieldName: env.TEXTMAGIC_CONTACT_STATE_NAME,
    listName: env.TEXTMAGIC_LIST_NAME,
    templates: {
      OLD: env.TEMPLATE_OLD,
      RECENT: env.TEMPLATE_RECENT,
      DIRECT: env.TEMPLATE_DIRECT,
    },
    phoneRegion: env.PHONE_REGION,
    sendTimeZone: env.SEND_TIME_ZONE,
    directChannels: env.DIRECT_BOOKING_CHANNELS,
    lookbackHours: env.BOOKING_LOOKBACK_HOURS,
    dryRun: env.DRY_RUN,
  };
}
