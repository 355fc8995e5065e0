// src/services/extractDate/matchers/timeMatchers.ts
import type { NormalizedLine, TimeCandidate, TimeValue } from "../../../types/events";
import { toTimeKey } from "../../../lib/dates";
import { hitSpan, score, type LineMatcher, type MatcherHit } from "./shared";

// am / pm / a.m. / P.M., not the start of a longer word
const MER = "([ap])\\.?m\\.?(?![a-z])";

// 7-9pm, 7:00 PM - 9:00 PM, 19:00-21:00, 7pm to 11pm
const RANGE_RE = new RegExp(
  `(?<![\\d:/.-])(\\d{1,2})(?::(\\d{2}))?\\s*(?:${MER})?\\s*(?:-|to|until|till|til)\\s*(\\d{1,2})(?::(\\d{2}))?\\s*(?:${MER})?(?![\\d:/])`,
  "gi"
);
const HOUR_MINUTE_MER_RE = new RegExp(`(?<![\\d:])(\\d{1,2}):(\\d{2})\\s*${MER}`, "gi");
const HOUR_MER_RE = new RegExp(`(?<![\\d:./])(\\d{1,2})\\s*${MER}`, "gi");
const NOON_MIDNIGHT_RE = /\b(noon|midnight)\b/gi;
const CLOCK_RE = /(?<![\d:])(\d{1,2}):(\d{2})(?![\d:])/g;

type Meridiem = "a" | "p";

function asMeridiem(tok: string | undefined): Meridiem | undefined {
  const t = tok?.toLowerCase();
  return t === "a" || t === "p" ? t : undefined;
}

/** 12-hour clock to minutes since midnight, null when out of range */
function from12h(hours: number, minutes: number, mer: Meridiem): number | null {
  if (hours < 1 || hours > 12 || minutes > 59) return null;
  return ((hours % 12) + (mer === "p" ? 12 : 0)) * 60 + minutes;
}

function from24h(hours: number, minutes: number): number | null {
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

function keyOf(totalMinutes: number): string {
  return toTimeKey(Math.floor(totalMinutes / 60), totalMinutes % 60);
}

function timeCandidate(
  line: NormalizedLine,
  m: RegExpMatchArray,
  matcher: string,
  value: TimeValue,
  confidence: number
): TimeCandidate {
  const candidate: TimeCandidate = {
    kind: "time",
    raw: m[0].trim(),
    lineIndex: line.index,
    confidence: score(confidence),
    matcher,
    value: Object.freeze({ ...value }),
  };
  return Object.freeze(candidate);
}

function single(line: NormalizedLine, m: RegExpMatchArray, matcher: string, total: number | null, confidence: number) {
  if (total === null) return null;
  return { ...hitSpan(m), candidates: [timeCandidate(line, m, matcher, { start: keyOf(total) }, confidence)] };
}

export const timeRange: LineMatcher<"time"> = {
  name: "range",
  match(line) {
    const hits: MatcherHit<"time">[] = [];
    for (const m of line.text.matchAll(RANGE_RE)) {
      const h1 = Number(m[1]);
      const m1: string | undefined = m[2];
      const mer1 = asMeridiem(m[3]);
      const h2 = Number(m[4]);
      const m2: string | undefined = m[5];
      const mer2 = asMeridiem(m[6]);

      // "10-12" alone is more likely a date range or a count than a time range
      if (!mer1 && !mer2 && !(m1 && m2)) continue;

      const min1 = Number(m1 ?? "0");
      const min2 = Number(m2 ?? "0");
      let start: number | null;
      let end: number | null;
      let confidence: number;

      if (mer1 && mer2) {
        start = from12h(h1, min1, mer1);
        end = from12h(h2, min2, mer2);
        confidence = 0.9;
      } else if (mer1 || mer2) {
        // The printed meridiem covers both ends unless that puts the start after the end
        const known = mer1 ?? mer2 ?? "p";
        const other: Meridiem = known === "a" ? "p" : "a";
        if (mer2) {
          end = from12h(h2, min2, mer2);
          start = from12h(h1, min1, known);
          if (start !== null && end !== null && start > end) start = from12h(h1, min1, other);
        } else {
          start = from12h(h1, min1, known);
          end = from12h(h2, min2, known);
          if (start !== null && end !== null && end < start) end = from12h(h2, min2, other);
        }
        confidence = 0.75;
      } else {
        start = from24h(h1, min1);
        end = from24h(h2, min2);
        const unambiguous = [h1, h2].some((h) => h === 0 || h >= 13);
        confidence = unambiguous ? 0.8 : 0.5;
      }
      if (start === null || end === null) continue;

      hits.push({
        ...hitSpan(m),
        candidates: [timeCandidate(line, m, "range", { start: keyOf(start), end: keyOf(end) }, confidence)],
      });
    }
    return hits;
  },
};

export const hourMinuteMeridiem: LineMatcher<"time"> = {
  name: "hour-minute-meridiem",
  match(line) {
    const hits: MatcherHit<"time">[] = [];
    for (const m of line.text.matchAll(HOUR_MINUTE_MER_RE)) {
      const mer = asMeridiem(m[3]);
      if (!mer) continue;
      const hit = single(line, m, "hour-minute-meridiem", from12h(Number(m[1]), Number(m[2]), mer), 0.85);
      if (hit) hits.push(hit);
    }
    return hits;
  },
};

export const hourMeridiem: LineMatcher<"time"> = {
  name: "hour-meridiem",
  match(line) {
    const hits: MatcherHit<"time">[] = [];
    for (const m of line.text.matchAll(HOUR_MER_RE)) {
      const mer = asMeridiem(m[2]);
      if (!mer) continue;
      const hit = single(line, m, "hour-meridiem", from12h(Number(m[1]), 0, mer), 0.8);
      if (hit) hits.push(hit);
    }
    return hits;
  },
};

export const noonMidnight: LineMatcher<"time"> = {
  name: "noon-midnight",
  match(line) {
    const hits: MatcherHit<"time">[] = [];
    for (const m of line.text.matchAll(NOON_MIDNIGHT_RE)) {
      const total = m[1].toLowerCase() === "noon" ? 12 * 60 : 0;
      const hit = single(line, m, "noon-midnight", total, 0.7);
      if (hit) hits.push(hit);
    }
    return hits;
  },
};

export const clockTime: LineMatcher<"time"> = {
  name: "clock",
  match(line) {
    const hits: MatcherHit<"time">[] = [];
    for (const m of line.text.matchAll(CLOCK_RE)) {
      const hours = Number(m[1]);
      // 19:00 can only be 24-hour; 7:00 with no am/pm is a guess
      const confidence = hours === 0 || hours >= 13 ? 0.7 : 0.45;
      const hit = single(line, m, "clock", from24h(hours, Number(m[2])), confidence);
      if (hit) hits.push(hit);
    }
    return hits;
  },
};

export const TIME_MATCHERS: readonly LineMatcher<"time">[] = [
  timeRange,
  hourMinuteMeridiem,
  hourMeridiem,
  noonMidnight,
  clockTime,
];

