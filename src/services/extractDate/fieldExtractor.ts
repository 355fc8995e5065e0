// src/services/extractDate/fieldExtractor.ts
import type { FieldCandidate, NormalizedLine } from "../../types/events";
import { dateKeyOf } from "../../lib/dates";
import { DATE_MATCHERS } from "./matchers/dateMatchers";
import { LOCATION_MATCHERS } from "./matchers/locationMatchers";
import { runLineMatchers, type MatchContext } from "./matchers/shared";
import { TIME_MATCHERS } from "./matchers/timeMatchers";
import { TITLE_MATCHERS } from "./matchers/titleMatchers";

export { findWeekdayHints } from "./matchers/dateMatchers";

// Location lines at or above this score are kept out of title guessing
const STRONG_LOCATION = 0.5;

/**
 * Scans normalized lines for date, time, location and title candidates.
 * A field with no match simply has no candidates.
 */
export function extract(
  lines: readonly NormalizedLine[],
  opts: { now: Date; timezone?: string }
): FieldCandidate[] {
  const ctx: MatchContext = { now: opts.now, today: dateKeyOf(opts.now, opts.timezone) };

  const dates = runLineMatchers(lines, DATE_MATCHERS, ctx);
  const times = runLineMatchers(lines, TIME_MATCHERS, ctx);
  const locations = runLineMatchers(lines, LOCATION_MATCHERS, ctx);

  const fieldLines = new Set<number>([
    ...dates.map((c) => c.lineIndex),
    ...times.map((c) => c.lineIndex),
    ...locations.filter((c) => c.confidence >= STRONG_LOCATION).map((c) => c.lineIndex),
  ]);
  const titles = TITLE_MATCHERS.flatMap((m) => m.match(lines, { fieldLines }));

  return [...titles, ...dates, ...times, ...locations];
}
