import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat(undefined, { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const commaList = z
  .string()
  .transform((v) =>
    v
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z
    .enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'])
    .default('info'),

  TEXTMAGIC_USERNAME: z.string().min(1),
  TEXTMAGIC_API_KEY: z.string().min(1),
  TEXTMAGIC_API_BASE: z.string().url().default('https://rest.textmagic.com'),
  TEXTMAGIC_CONTACT_STATE_NAME: z.string().min(1),
  TEXTMAGIC_LIST_NAME: z.string().min(1),

  UPLISTING_API_KEY: z.string().min(1),
  UPLISTING_API_BASE: z.string().url().default('https://connect.uplisting.io'),

  TEMPLATE_OLD: z.string().min(1),
  TEMPLATE_RECENT: z.string().min(1),
  TEMPLATE_DIRECT: z.string().min(1),

  /** Region used to parse national-format numbers (leading 0). */
  PHONE_REGION: z.string().length(2).default('GB'),
  /** IANA zone in which the evening send hour is computed. */
  SEND_TIME_ZONE: z
    .string()
    .min(1)
    .refine(isTimeZone, { message: 'Must be an IANA time zone' })
    .default('Europe/London'),
  /** Booking channels that count as direct (not via a marketplace). */
  DIRECT_BOOKING_CHANNELS: commaList.default('uplisting'),
  BOOKING_LOOKBACK_HOURS: z.coerce.number().int().positive().default(1000),
  DRY_RUN: booleanFlag,
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validate a raw environment. Throws a ZodError listing every missing or
 * malformed variable.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}
