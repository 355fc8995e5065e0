// src/services/icsService.ts
import { createEvent, type DateTime, type EventAttributes } from "ics";
import { DateTime as LuxonDateTime } from "luxon";
import type { DraftEvent } from "../types/drafts";
import { addDaysToKey } from "../lib/dates";
import { AppError } from "../lib/errors";
import { EXTRACTION_DEFAULTS, type ExtractionConfig } from "../config/extraction";

export const ICS_PRODUCT_ID = "flyer-calendar/ics";

function dateTuple(dateKey: string): DateTime {
  const [y, m, d] = dateKey.split("-").map(Number);
  return [y, m, d];
}

// Wall time in the draft's zone -> UTC tuple, so the file needs no VTIMEZONE block
function utcTuple(dateKey: string, timeKey: string, zone: string): DateTime {
  const local = LuxonDateTime.fromISO(`${dateKey}T${timeKey}`, { zone });
  if (!local.isValid) throw new AppError("E_ICS", `Invalid event time ${dateKey} ${timeKey} (${zone})`, 422);
  const utc = local.toUTC();
  return [utc.year, utc.month, utc.day, utc.hour, utc.minute];
}

function describe(draft: DraftEvent): string | undefined {
  const { event } = draft;
  const parts = [event.description, event.hosts.length > 0 ? `Hosts: ${event.hosts.join(", ")}` : undefined];
  const text = parts.filter((p): p is string => Boolean(p)).join("\n\n");
  return text || undefined;
}

function attributesFor(draft: DraftEvent, config: ExtractionConfig): EventAttributes {
  const { event } = draft;
  const common = {
    uid: `${draft.id}@flyer-calendar`,
    productId: ICS_PRODUCT_ID,
    title: event.title,
    location: event.location ?? config.unknownLocation,
    description: describe(draft),
    alarms: config.reminders
      .filter((r) => r.method === "popup")
      .map((r) => ({ action: "display" as const, description: event.title, trigger: { minutes: r.minutes, before: true } })),
  };

  if (event.allDay || event.startTime === undefined || event.endTime === undefined) {
    // DTEND of an all-day VEVENT is exclusive
    return { ...common, start: dateTuple(event.startDate), end: dateTuple(addDaysToKey(event.endDate, 1)) };
  }
  return {
    ...common,
    start: utcTuple(event.startDate, event.startTime, draft.timezone),
    startInputType: "utc",
    startOutputType: "utc",
    end: utcTuple(event.endDate, event.endTime, draft.timezone),
    endInputType: "utc",
    endOutputType: "utc",
  };
}

/** One-event iCalendar file for a draft */
export function generateIcs(draft: DraftEvent, config: ExtractionConfig = EXTRACTION_DEFAULTS): string {
  const { error, value } = createEvent(attributesFor(draft, config));
  if (error || !value) {
    throw new AppError("E_ICS", `Could not build calendar file: ${error?.message ?? "empty output"}`, 500, undefined, {
      cause: error,
    });
  }
  return value;
}

export function icsFileName(draft: DraftEvent): string {
  const slug = draft.event.title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 60);
  return `${slug || "event"}.ics`;
}
