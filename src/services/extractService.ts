// src/services/extractService.ts
// raw OCR text -> normalize -> extract -> resolve -> assemble -> calendar payload
import { FIELD_KINDS, type EventRecord, type ExtractionResult } from "../types/events";
import { EXTRACTION_DEFAULTS, type ExtractionConfig } from "../config/extraction";
import { OcrFailureError } from "../lib/errors";
import { build } from "./calendarRequestBuilder";
import { resolve } from "./extractDate/candidateResolver";
import { assemble } from "./extractDate/eventAssembler";
import { extractDetails } from "./extractDate/eventDetails";
import { extract, findWeekdayHints } from "./extractDate/fieldExtractor";
import { normalize } from "./extractDate/normalizer";

// Below this many letters/digits the OCR output is noise, not a flyer
const MIN_SIGNAL_CHARS = 3;

export type ExtractOptions = {
  /** Reference time for year defaulting and "not in the past" checks */
  now: Date;
  /** IANA zone of the event: decides what "today" is and goes into the calendar payload */
  timezone: string;
  config?: ExtractionConfig;
};

export function warningsFor(event: EventRecord, config: ExtractionConfig): string[] {
  const warnings: string[] = [];
  const { fields } = event;

  if (fields.title.status === "defaulted") warnings.push(`No title found; using "${event.title}"`);
  if (fields.date.status === "defaulted") warnings.push(`No date found; using ${event.startDate}`);
  if (fields.time.status === "absent") warnings.push("No start time found; treating as an all-day event");
  if (fields.location.status === "absent") {
    warnings.push(`No location found; calendar entry will say "${config.unknownLocation}"`);
  }

  for (const kind of FIELD_KINDS) {
    const field = fields[kind];
    if (field.ambiguous) warnings.push(`Ambiguous ${kind}: picked "${field.source ?? ""}" over close alternatives`);
  }

  if (event.confidence < config.reviewBelow) {
    warnings.push(`Low extraction confidence (${event.confidence}); review before adding to your calendar`);
  }
  return warnings;
}

/**
 * Runs the whole pipeline on one flyer's OCR text.
 * Throws OcrFailureError when the text is empty or unusable; everything else
 * is resolved with defaults and reported through `warnings`.
 */
export function extractEvent(rawText: string, opts: ExtractOptions): ExtractionResult {
  const config = opts.config ?? EXTRACTION_DEFAULTS;

  const lines = normalize(rawText);
  if (lines.length === 0) {
    throw new OcrFailureError("empty", "No text was recognized on the flyer");
  }
  const signal = lines.reduce((n, l) => n + (l.text.match(/[A-Za-z0-9]/g)?.length ?? 0), 0);
  if (signal < MIN_SIGNAL_CHARS) {
    throw new OcrFailureError("unusable", "Recognized text is too short or garbled to extract an event");
  }

  const { now, timezone } = opts;
  const candidates = extract(lines, { now, timezone });
  const resolution = resolve(candidates, {
    now,
    timezone,
    weekdayHints: findWeekdayHints(lines),
    config,
  });
  const event = assemble(resolution, now, extractDetails(lines, resolution), config, timezone);
  const payload = build(event, { timezone, config });

  return { event, payload, candidates, warnings: warningsFor(event, config) };
}
