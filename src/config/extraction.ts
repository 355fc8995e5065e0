// src/config/extraction.ts
import type { CalendarReminder, FieldKind } from "../types/events";

export type ConfidenceThresholds = Readonly<Record<FieldKind, number>>;

export type ExtractionConfig = {
  /** Minimum score a candidate needs to be used at all */
  readonly thresholds: ConfidenceThresholds;
  /** Runner-up within this distance of the winner marks the field ambiguous */
  readonly ambiguityMargin: number;
  /** Summary confidence under this value adds a review warning */
  readonly reviewBelow: number;
  readonly defaultDurationMinutes: number;
  readonly untitledTitle: string;
  readonly unknownLocation: string;
  readonly maxTitleLength: number;
  readonly reminders: readonly CalendarReminder[];
};

export const DEFAULT_THRESHOLDS: ConfidenceThresholds = {
  date: 0.5,
  time: 0.4,
  location: 0.3,
  title: 0.2,
};

export const EXTRACTION_DEFAULTS: ExtractionConfig = {
  thresholds: DEFAULT_THRESHOLDS,
  ambiguityMargin: 0.1,
  reviewBelow: 0.5,
  defaultDurationMinutes: 60,
  untitledTitle: "Untitled Event",
  unknownLocation: "TBD",
  maxTitleLength: 120,
  reminders: [
    { method: "popup", minutes: 60 },
    { method: "email", minutes: 24 * 60 },
  ],
};

export function withThresholds(overrides: Partial<Record<FieldKind, number>> = {}): ExtractionConfig {
  return {
    ...EXTRACTION_DEFAULTS,
    thresholds: { ...EXTRACTION_DEFAULTS.thresholds, ...overrides },
  };
}
