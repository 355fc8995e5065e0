// src/services/extractDate/eventAssembler.ts
import type { EventDetails, EventRecord, FieldKind, FieldReport, Resolution, ResolvedField } from "../../types/events";
import { EXTRACTION_DEFAULTS, type ExtractionConfig } from "../../config/extraction";
import { addDaysToKey, dateKeyOf, minutesOf, shiftWallTime } from "../../lib/dates";

const NO_DETAILS: EventDetails = { hosts: [] };

function report<K extends FieldKind>(field: ResolvedField<K> | undefined, missing: "defaulted" | "absent"): FieldReport {
  if (!field) return { status: missing, confidence: 0, ambiguous: false };
  return {
    status: "resolved",
    confidence: field.candidate.confidence,
    ambiguous: field.ambiguous,
    source: field.candidate.raw,
  };
}

function clipTitle(title: string, max: number): string {
  const t = title.replace(/\s+/g, " ").trim();
  return t.length > max ? t.slice(0, max).trimEnd() : t;
}

type Schedule = Pick<EventRecord, "startDate" | "startTime" | "endDate" | "endTime" | "allDay">;

/** End from an explicit end time, else start + default duration; ends at or before the start roll to the next day */
function schedule(startDate: string, startTime: string | undefined, endTime: string | undefined, durationMinutes: number): Schedule {
  if (startTime === undefined) {
    return { startDate, endDate: startDate, allDay: true };
  }
  if (endTime !== undefined) {
    const endDate = minutesOf(endTime) <= minutesOf(startTime) ? addDaysToKey(startDate, 1) : startDate;
    return { startDate, startTime, endDate, endTime, allDay: false };
  }
  const end = shiftWallTime(startDate, startTime, durationMinutes);
  return { startDate, startTime, endDate: end.date, endTime: end.time, allDay: false };
}

function summaryConfidence(fields: Readonly<Record<FieldKind, FieldReport>>): number {
  return Math.min(fields.title.confidence, fields.date.confidence);
}

/**
 * Turns a resolution into a complete EventRecord. Never throws: a missing title
 * or date falls back to defaults and is reported in `fields`.
 */
export function assemble(
  resolution: Resolution,
  now: Date,
  details: EventDetails = NO_DETAILS,
  config: ExtractionConfig = EXTRACTION_DEFAULTS,
  timezone?: string
): EventRecord {
  const resolvedTitle = resolution.title ? clipTitle(resolution.title.candidate.value, config.maxTitleLength) : "";
  const title = resolvedTitle || config.untitledTitle;
  const startDate = resolution.date?.candidate.value ?? dateKeyOf(now, timezone);
  const time = resolution.time?.candidate.value;

  const fields: Record<FieldKind, FieldReport> = {
    title: resolvedTitle ? report(resolution.title, "defaulted") : report(undefined, "defaulted"),
    date: report(resolution.date, "defaulted"),
    time: report(resolution.time, "absent"),
    location: report(resolution.location, "absent"),
  };

  const record: EventRecord = {
    title,
    ...schedule(startDate, time?.start, time?.end, config.defaultDurationMinutes),
    location: resolution.location?.candidate.value,
    description: details.description,
    hosts: [...details.hosts],
    confidence: summaryConfidence(fields),
    fields,
  };
  return record;
}

//  User edits on a draft
// -----------------------------
// - undefined leaves a value alone, null clears it (startTime: null makes the event all-day).
// - Edited fields are marked "confirmed" with confidence 1.
// =============================

export type EventEdits = {
  title?: string;
  startDate?: string;
  startTime?: string | null;
  endTime?: string | null;
  location?: string | null;
  description?: string | null;
  hosts?: string[];
};

const confirmed: FieldReport = { status: "confirmed", confidence: 1, ambiguous: false };

export function applyEdits(
  record: EventRecord,
  edits: EventEdits,
  config: ExtractionConfig = EXTRACTION_DEFAULTS,
  timezone?: string
): EventRecord {
  const title = edits.title !== undefined ? clipTitle(edits.title, config.maxTitleLength) || record.title : record.title;
  const startDate = edits.startDate ?? record.startDate;
  const startTime = edits.startTime === undefined ? record.startTime : edits.startTime ?? undefined;

  // A new start time without a new end drops the old end so the default duration applies
  let endTime: string | undefined;
  if (edits.endTime !== undefined) endTime = edits.endTime ?? undefined;
  else if (edits.startTime === undefined) endTime = record.endTime;

  const timeEdited = edits.startTime !== undefined || edits.endTime !== undefined;
  const fields: Record<FieldKind, FieldReport> = {
    title: edits.title !== undefined ? confirmed : record.fields.title,
    date: edits.startDate !== undefined ? confirmed : record.fields.date,
    time: timeEdited ? (startTime === undefined ? { ...confirmed, status: "absent" } : confirmed) : record.fields.time,
    location:
      edits.location !== undefined ? (edits.location === null ? { ...confirmed, status: "absent" } : confirmed) : record.fields.location,
  };

  return {
    title,
    ...schedule(startDate, startTime, endTime, config.defaultDurationMinutes),
    location: edits.location === undefined ? record.location : edits.location ?? undefined,
    description: edits.description === undefined ? record.description : edits.description ?? undefined,
    hosts: edits.hosts ? [...edits.hosts] : [...record.hosts],
    confidence: summaryConfidence(fields),
    fields,
  };
}
