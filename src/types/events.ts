//  Flyer extraction types
// -----------------------------
// - Everything the pipeline passes between stages lives here.
// - Dates are "yyyy-MM-dd" strings and times "HH:mm" strings (no Date objects),
//   so records serialise to JSON and back without drift.
// - Candidates and records are readonly: later stages select, never edit.
// =============================

export type FieldKind = "title" | "date" | "time" | "location";

export const FIELD_KINDS: readonly FieldKind[] = ["title", "date", "time", "location"];

/** One non-empty line of cleaned OCR text; `index` is its line number in the raw text. */
export type NormalizedLine = {
  readonly index: number;
  readonly text: string;
};

type CandidateBase = {
  /** Substring of the normalized line that produced this candidate */
  readonly raw: string;
  readonly lineIndex: number;
  /** Heuristic score in [0, 1] */
  readonly confidence: number;
  /** Name of the matcher that produced it (handy when reviewing a bad extraction) */
  readonly matcher: string;
};

export type DateOrder = "month-first" | "day-first";

export type TitleCandidate = CandidateBase & {
  readonly kind: "title";
  readonly value: string;
  /** Consecutive lines joined into this title, starting at lineIndex */
  readonly lineCount: number;
};

export type DateCandidate = CandidateBase & {
  readonly kind: "date";
  /** yyyy-MM-dd */
  readonly value: string;
  /** Weekday named inside the match itself (0 = Sunday) */
  readonly weekday?: number;
  /** Set on both readings of a numeric date like 3/4 */
  readonly ambiguity?: {
    readonly group: string;
    readonly order: DateOrder;
  };
};

export type TimeValue = {
  /** HH:mm, 24-hour */
  readonly start: string;
  /** Implicit end of a range like 7-9pm */
  readonly end?: string;
};

export type TimeCandidate = CandidateBase & {
  readonly kind: "time";
  readonly value: TimeValue;
};

export type LocationCandidate = CandidateBase & {
  readonly kind: "location";
  readonly value: string;
};

export type FieldCandidate = TitleCandidate | DateCandidate | TimeCandidate | LocationCandidate;

export type CandidateOf<K extends FieldKind> = Extract<FieldCandidate, { kind: K }>;

export type ResolvedField<K extends FieldKind = FieldKind> = {
  readonly candidate: CandidateOf<K>;
  /** A different value scored within the ambiguity margin of the winner */
  readonly ambiguous: boolean;
  /** How many other candidates of this kind were considered */
  readonly competitors: number;
};

export type Resolution = {
  readonly title?: ResolvedField<"title">;
  readonly date?: ResolvedField<"date">;
  readonly time?: ResolvedField<"time">;
  readonly location?: ResolvedField<"location">;
};

export type EventDetails = {
  readonly hosts: readonly string[];
  readonly description?: string;
};

//  EventRecord: assembled result of one flyer
// -----------------------------
// - Always carries a title and a start date (defaults applied).
// - No startTime means an all-day event.
// - `fields` tells the caller which values were found, defaulted or left out,
//   so a low-confidence flyer can be sent back to the user for review.
// =============================

export type FieldStatus = "resolved" | "defaulted" | "absent" | "confirmed";

export type FieldReport = {
  readonly status: FieldStatus;
  readonly confidence: number;
  readonly ambiguous: boolean;
  /** Raw text the value came from, when it came from the flyer */
  readonly source?: string;
};

export type EventRecord = {
  readonly title: string;
  /** yyyy-MM-dd */
  readonly startDate: string;
  /** HH:mm; absent for all-day events */
  readonly startTime?: string;
  readonly endDate: string;
  readonly endTime?: string;
  readonly allDay: boolean;
  readonly location?: string;
  readonly description?: string;
  readonly hosts: readonly string[];
  /** min(title confidence, date confidence), unresolved counting as 0 */
  readonly confidence: number;
  readonly fields: Readonly<Record<FieldKind, FieldReport>>;
};

//  CalendarEventPayload: Google Calendar events.insert body
// -----------------------------
// - All-day events use { date } with an exclusive end date.
// - Timed events use local wall time plus an IANA zone.
// =============================

export type CalendarEventTime =
  | { readonly date: string }
  | { readonly dateTime: string; readonly timeZone: string };

export type CalendarReminder = {
  readonly method: "popup" | "email";
  readonly minutes: number;
};

export type CalendarEventPayload = {
  readonly summary: string;
  readonly location: string;
  readonly description?: string;
  readonly start: CalendarEventTime;
  readonly end: CalendarEventTime;
  readonly reminders: {
    readonly useDefault: boolean;
    readonly overrides: readonly CalendarReminder[];
  };
};

//  ExtractionResult: response envelope for one flyer
// -----------------------------
// - `warnings`: non-fatal notes (missing date, ambiguous time, defaults used).
// - `candidates` are returned for review screens and debugging.
// =============================

export type ExtractionResult = {
  readonly event: EventRecord;
  readonly payload: CalendarEventPayload;
  readonly candidates: readonly FieldCandidate[];
  readonly warnings: readonly string[];
};
