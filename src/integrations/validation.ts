/**
 * Zod schemas for validating integration payloads.
 * Every response that enters the system and every request body that leaves
 * it goes through these schemas.
 */
import { z } from 'zod';

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

const isoDateField = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Must be ISO YYYY-MM-DD');
const timeOfDayField = z.string().regex(/^\d{2}:\d{2}(:\d{2})?$/, 'Must be HH:mm or HH:mm:ss');
const idField = z.union([z.string().min(1), z.number().int()]).transform((v) => String(v));
const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? '');

// ---------------------------------------------------------------------------
// Uplisting
// ---------------------------------------------------------------------------

export const uplistingPropertySchema = z.object({
  id: idField,
  type: z.string().optional(),
  attributes: z.object({
    name: optionalText,
    nickname: z.string().nullish(),
  }),
});

export const uplistingPropertiesResponseSchema = z.object({
  data: z.array(uplistingPropertySchema),
});

export const uplistingBookingSchema = z.object({
  id: idField,
  property_id: idField.nullish(),
  property_name: z.string().nullish(),
  check_in: isoDateField,
  check_out: isoDateField,
  arrival_time: timeOfDayField.nullish(),
  departure_time: timeOfDayField.nullish(),
  guest_name: optionalText,
  guest_email: optionalText,
  guest_phone: optionalText,
  channel: optionalText,
  status: z.string().min(1),
});

export type UplistingBooking = z.infer<typeof uplistingBookingSchema>;

// Bookings are validated one by one so a single malformed record does not
// discard the rest of the page.
export const uplistingBookingsPageSchema = z.object({
  bookings: z.array(z.unknown()),
  meta: z.object({
    total: z.number().int().nonnegative(),
    total_pages: z.number().int().nonnegative(),
  }),
});

// ---------------------------------------------------------------------------
// TextMagic
// ---------------------------------------------------------------------------

export const textMagicErrorBodySchema = z.object({
  message: z.string().default('Unknown error'),
  code: z.number().int().default(0),
  errors: z
    .object({
      common: z.array(z.string()).optional(),
      fields: z.record(z.array(z.string())).optional(),
    })
    .nullish(),
});

export const textMagicPingSchema = z.object({
  id: z.number().int(),
  ping: z.string().optional(),
  utcDateTime: z.string().optional(),
});

const namedResourceSchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

export const textMagicCustomFieldsResponseSchema = z.object({
  resources: z.array(namedResourceSchema),
});

export const textMagicListsResponseSchema = z.object({
  resources: z.array(namedResourceSchema),
});

export const textMagicContactSchema = z.object({
  id: z.number().int(),
  firstName: optionalText,
  lastName: optionalText,
  phone: z.string(),
  email: optionalText,
  customFields: z
    .array(
      z.object({
        id: z.number().int(),
        value: z.string().nullish(),
      }),
    )
    .nullish()
    .transform((v) => v ?? []),
});

export const textMagicCreatedResponseSchema = z.object({
  id: z.number().int(),
  href: z.string().optional(),
});

export const textMagicMessageResponseSchema = z.object({
  id: z.number().int().nullish(),
  messageId: z.number().int().nullish(),
  sessionId: z.number().int().nullish(),
  bulkId: z.number().int().nullish(),
  scheduleId: z.number().int().nullish(),
});

const idListField = z.string().regex(/^\d+(,\d+)*$/, 'Must be a comma-separated id list');

// Strict: custom-field values are rejected by TextMagic on create and must
// only ever be written through the custom-field update endpoint.
export const textMagicCreateContactRequestSchema = z
  .object({
    firstName: z.string().optional(),
    lastName: z.string().optional(),
    phone: z.string().min(1),
    email: z.string(),
    lists: idListField,
    type: z.literal(-1),
  })
  .strict();

export const textMagicSendMessageRequestSchema = z
  .object({
    text: z.string().min(1),
    contacts: idListField,
    sendingDateTime: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/, 'Must be YYYY-MM-DD HH:mm:ss')
      .optional(),
    sendingTimeZone: z.string().min(1).optional(),
  })
  .strict();
