// src/schemas/extract.schema.ts
import { isValid, parseISO } from "date-fns";
import { DateTime } from "luxon";
import { z } from "zod";
import { isValidTimeZone } from "../lib/dates";

const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;
const TIME_KEY = /^([01]\d|2[0-3]):[0-5]\d$/;
// Local reference time, e.g. 2025-08-29T17:00 or 2025-08-29T17:00:00
const LOCAL_ISO = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2})?$/;

export const timezoneField = z.string().min(1).refine(isValidTimeZone, "Unknown IANA time zone");

export const ExtractBody = z.object({
  text: z.string().max(20_000),
  now: z
    .string()
    .regex(LOCAL_ISO, "Expected YYYY-MM-DDTHH:mm[:ss]")
    .refine((v) => isValid(parseISO(v)), "Not a real date")
    .optional(),
  timezone: timezoneField.optional(),
});
export type ExtractBody = z.infer<typeof ExtractBody>;

/** multipart fields sent next to the flyer image */
export const UploadFields = z.object({
  timezone: timezoneField.optional(),
});

export const EventEditsBody = z
  .object({
    title: z.string().trim().min(1).max(500),
    startDate: z.string().regex(DATE_KEY, "Expected YYYY-MM-DD"),
    startTime: z.string().regex(TIME_KEY, "Expected HH:mm").nullable(),
    endTime: z.string().regex(TIME_KEY, "Expected HH:mm").nullable(),
    location: z.string().trim().min(1).nullable(),
    description: z.string().nullable(),
    hosts: z.array(z.string().trim().min(1)),
    timezone: timezoneField,
  })
  .partial()
  .strict();
export type EventEditsBody = z.infer<typeof EventEditsBody>;

export const CalendarCreateBody = z.object({
  eventId: z.string().regex(/^[A-Za-z0-9-]+$/, "Invalid event id"),
});

/** A zone-less ISO string is read as wall-clock time in `zone` */
export function parseLocalNow(value: string, zone: string): Date {
  return DateTime.fromISO(value, { zone }).toJSDate();
}
