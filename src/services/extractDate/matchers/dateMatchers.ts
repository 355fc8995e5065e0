// src/services/extractDate/matchers/dateMatchers.ts
import type { DateCandidate, DateOrder, NormalizedLine } from "../../../types/events";
import {
  addDaysToKey,
  fullYear,
  monthFromToken,
  nextOccurrence,
  nextWeekday,
  toDateKey,
  weekdayFromToken,
  weekdayOf,
} from "../../../lib/dates";
import { hitSpan, score, type LineMatcher, type MatchContext, type MatcherHit } from "./shared";

const MONTH =
  "(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sept?(?:ember)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)";
const WEEKDAY =
  "(sun(?:day)?|mon(?:day)?|tue(?:s(?:day)?)?|wed(?:nesday)?|thu(?:r(?:s(?:day)?)?)?|fri(?:day)?|sat(?:urday)?)";

// 2024-07-20
const ISO_RE = /(?<![\d-])(\d{4})-(\d{1,2})-(\d{1,2})(?![\d-])/g;
// [Saturday,] July 20[th][, 2024]
const MONTH_NAME_RE = new RegExp(
  `\\b(?:${WEEKDAY}\\.?,?\\s+)?${MONTH}\\.?\\s+(\\d{1,2})(?:st|nd|rd|th)?\\b(?:,?\\s+(\\d{4})\\b)?`,
  "gi"
);
// [Sat] 20[th] [of] July [2024]
const DAY_MONTH_NAME_RE = new RegExp(
  `\\b(?:${WEEKDAY}\\.?,?\\s+)?(\\d{1,2})(?:st|nd|rd|th)?\\s+(?:of\\s+)?${MONTH}\\b\\.?(?:,?\\s+(\\d{4})\\b)?`,
  "gi"
);
// 7/20/2024, 7/20, 20.07.2024 (dash and dot forms need a year)
const NUMERIC_RE = /(?<![\d/:-])(?<!\d\.)(\d{1,2})([/.-])(\d{1,2})(?:\2(\d{4}|\d{2}))?(?![\d/:-]|\.\d)/g;
const RELATIVE_DAY_RE = /\b(today|tonight|tomorrow)\b/gi;
const RELATIVE_WEEKDAY_RE = /\b(this|next|coming)\s+(sunday|monday|tuesday|wednesday|thursday|friday|saturday)\b/gi;

const WEEKDAY_WORD_RE = /\b(sunday|monday|tuesday|wednesday|thursday|friday|saturday)s?\b/gi;

function dateCandidate(
  line: NormalizedLine,
  m: RegExpMatchArray,
  matcher: string,
  value: string,
  confidence: number,
  extra: { weekday?: number; ambiguity?: { group: string; order: DateOrder } } = {}
): DateCandidate {
  const candidate: DateCandidate = {
    kind: "date",
    raw: m[0].trim(),
    lineIndex: line.index,
    confidence: score(confidence),
    matcher,
    value,
    ...extra,
  };
  return Object.freeze(candidate);
}

// A weekday printed next to the date either backs it up or casts doubt on it.
function weekdayAdjustment(value: string, weekday: number | undefined): number {
  if (weekday === undefined) return 0;
  return weekdayOf(value) === weekday ? 0.05 : -0.2;
}

type NamedParts = {
  weekdayTok?: string;
  monthTok: string;
  dayTok: string;
  yearTok?: string;
};

function namedDate(
  line: NormalizedLine,
  m: RegExpMatchArray,
  matcher: string,
  parts: NamedParts,
  ctx: MatchContext,
  base: { withYear: number; withoutYear: number }
): MatcherHit<"date"> | null {
  const month = monthFromToken(parts.monthTok);
  const day = Number(parts.dayTok);
  const weekday = parts.weekdayTok ? weekdayFromToken(parts.weekdayTok) ?? undefined : undefined;
  if (month === null) return null;

  let value: string | null;
  let confidence: number;
  if (parts.yearTok) {
    value = toDateKey(Number(parts.yearTok), month, day);
    confidence = base.withYear;
  } else {
    // Year-less: next occurrence of this weekday/month/day, else of month/day alone
    value =
      (weekday !== undefined ? nextOccurrence(month, day, ctx.today, weekday) : null) ??
      nextOccurrence(month, day, ctx.today);
    confidence = base.withoutYear;
  }
  if (!value) return null;

  const extra = weekday === undefined ? {} : { weekday };
  return {
    ...hitSpan(m),
    candidates: [dateCandidate(line, m, matcher, value, confidence + weekdayAdjustment(value, weekday), extra)],
  };
}

export const isoDate: LineMatcher<"date"> = {
  name: "iso",
  match(line) {
    const hits: MatcherHit<"date">[] = [];
    for (const m of line.text.matchAll(ISO_RE)) {
      const value = toDateKey(Number(m[1]), Number(m[2]), Number(m[3]));
      if (!value) continue;
      hits.push({ ...hitSpan(m), candidates: [dateCandidate(line, m, "iso", value, 0.95)] });
    }
    return hits;
  },
};

export const monthNameDate: LineMatcher<"date"> = {
  name: "month-name",
  match(line, ctx) {
    const hits: MatcherHit<"date">[] = [];
    for (const m of line.text.matchAll(MONTH_NAME_RE)) {
      const weekdayTok: string | undefined = m[1];
      const yearTok: string | undefined = m[4];
      const hit = namedDate(
        line,
        m,
        "month-name",
        { weekdayTok, monthTok: m[2], dayTok: m[3], yearTok },
        ctx,
        { withYear: 0.9, withoutYear: 0.65 }
      );
      if (hit) hits.push(hit);
    }
    return hits;
  },
};

export const dayMonthNameDate: LineMatcher<"date"> = {
  name: "day-month-name",
  match(line, ctx) {
    const hits: MatcherHit<"date">[] = [];
    for (const m of line.text.matchAll(DAY_MONTH_NAME_RE)) {
      const weekdayTok: string | undefined = m[1];
      const yearTok: string | undefined = m[4];
      const hit = namedDate(
        line,
        m,
        "day-month-name",
        { weekdayTok, dayTok: m[2], monthTok: m[3], yearTok },
        ctx,
        { withYear: 0.85, withoutYear: 0.6 }
      );
      if (hit) hits.push(hit);
    }
    return hits;
  },
};

export const numericDate: LineMatcher<"date"> = {
  name: "numeric",
  match(line, ctx) {
    const hits: MatcherHit<"date">[] = [];
    for (const m of line.text.matchAll(NUMERIC_RE)) {
      const first = Number(m[1]);
      const separator = m[2];
      const second = Number(m[3]);
      const yearTok: string | undefined = m[4];
      if (separator !== "/" && !yearTok) continue;

      const readings: Array<{ order: DateOrder; month: number; day: number }> = [];
      if (first <= 12) readings.push({ order: "month-first", month: first, day: second });
      if (second <= 12 && first !== second) readings.push({ order: "day-first", month: second, day: first });

      const valued = readings.flatMap((r) => {
        const value = yearTok
          ? toDateKey(fullYear(yearTok), r.month, r.day)
          : nextOccurrence(r.month, r.day, ctx.today);
        return value ? [{ ...r, value }] : [];
      });
      if (valued.length === 0) continue;

      const span = hitSpan(m);
      if (valued.length === 1) {
        const [only] = valued;
        hits.push({ ...span, candidates: [dateCandidate(line, m, "numeric", only.value, yearTok ? 0.85 : 0.6)] });
        continue;
      }

      // 3/4 may be March 4 or April 3: keep both, the resolver decides
      const group = `${line.index}:${span.start}`;
      hits.push({
        ...span,
        candidates: valued.map((r) =>
          dateCandidate(line, m, "numeric", r.value, yearTok ? 0.7 : 0.55, { ambiguity: { group, order: r.order } })
        ),
      });
    }
    return hits;
  },
};

export const relativeDate: LineMatcher<"date"> = {
  name: "relative",
  match(line, ctx) {
    const hits: MatcherHit<"date">[] = [];
    for (const m of line.text.matchAll(RELATIVE_DAY_RE)) {
      const word = m[1].toLowerCase();
      const value = word === "tomorrow" ? addDaysToKey(ctx.today, 1) : ctx.today;
      hits.push({ ...hitSpan(m), candidates: [dateCandidate(line, m, "relative", value, 0.6)] });
    }
    for (const m of line.text.matchAll(RELATIVE_WEEKDAY_RE)) {
      const weekday = weekdayFromToken(m[2]);
      if (weekday === null) continue;
      const value = nextWeekday(ctx.today, weekday, m[1].toLowerCase() !== "next");
      hits.push({ ...hitSpan(m), candidates: [dateCandidate(line, m, "relative", value, 0.55, { weekday })] });
    }
    return hits;
  },
};

export const DATE_MATCHERS: readonly LineMatcher<"date">[] = [
  isoDate,
  monthNameDate,
  dayMonthNameDate,
  numericDate,
  relativeDate,
];

/** Every weekday named anywhere on the flyer (0 = Sunday), in first-seen order */
export function findWeekdayHints(lines: readonly NormalizedLine[]): number[] {
  const seen: number[] = [];
  for (const line of lines) {
    for (const m of line.text.matchAll(WEEKDAY_WORD_RE)) {
      const weekday = weekdayFromToken(m[1]);
      if (weekday !== null && !seen.includes(weekday)) seen.push(weekday);
    }
  }
  return seen;
}
