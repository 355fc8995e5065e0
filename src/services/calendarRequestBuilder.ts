// src/services/calendarRequestBuilder.ts
import type { CalendarEventPayload, CalendarEventTime, EventRecord } from "../types/events";
import { EXTRACTION_DEFAULTS, type ExtractionConfig } from "../config/extraction";
import { addDaysToKey } from "../lib/dates";

export type BuildOptions = {
  /** IANA zone the flyer's wall times are in, e.g. "America/New_York" */
  timezone: string;
  config?: ExtractionConfig;
};

function describe(record: EventRecord): string | undefined {
  const parts: string[] = [];
  if (record.description) parts.push(record.description);
  if (record.hosts.length > 0) parts.push(`Hosts: ${record.hosts.join(", ")}`);
  return parts.length > 0 ? parts.join("\n\n") : undefined;
}

function times(record: EventRecord, timeZone: string): { start: CalendarEventTime; end: CalendarEventTime } {
  if (record.allDay || record.startTime === undefined || record.endTime === undefined) {
    // Google treats an all-day end date as exclusive
    return { start: { date: record.startDate }, end: { date: addDaysToKey(record.endDate, 1) } };
  }
  return {
    start: { dateTime: `${record.startDate}T${record.startTime}:00`, timeZone },
    end: { dateTime: `${record.endDate}T${record.endTime}:00`, timeZone },
  };
}

/** Maps an EventRecord to a Google Calendar events.insert body. Pure. */
export function build(record: EventRecord, opts: BuildOptions): CalendarEventPayload {
  const config = opts.config ?? EXTRACTION_DEFAULTS;
  const description = describe(record);
  return {
    summary: record.title,
    location: record.location ?? config.unknownLocation,
    ...(description === undefined ? {} : { description }),
    ...times(record, opts.timezone),
    reminders: {
      useDefault: false,
      overrides: config.reminders.map((r) => ({ ...r })),
    },
  };
}
