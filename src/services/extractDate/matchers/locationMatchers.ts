// src/services/extractDate/matchers/locationMatchers.ts
import type { LocationCandidate, NormalizedLine } from "../../../types/events";
import { score, wholeLine, type LineMatcher, type MatcherHit } from "./shared";

const STREET_RE =
  /\b\d{1,5}\s+(?:[A-Za-z0-9.'-]+\s+){0,4}?(?:street|st|avenue|ave|road|rd|boulevard|blvd|lane|ln|drive|dr|court|ct|plaza|plz|square|sq|highway|hwy|broadway|parkway|pkwy|way|place|pl|terrace|ter)\b\.?/i;

const VENUE_RE =
  /\b(?:hall|center|centre|park|theatre|theater|arena|stadium|gallery|museum|cafe|restaurant|club|bar|lounge|library|church|auditorium|ballroom|venue|pavilion|gym|campus|studio|brewery|gardens?|plaza|room)\b/i;

// "at", "@", "Location:" ... followed by the place
const LOCATIVE_RE = /(?<=^|\s)(?:(?:at|location:|venue:|where:|place:)\s+|@\s*)/gi;

const TIME_TOKEN = "\\d{1,2}(?::\\d{2})?\\s*[ap]\\.?m\\.?(?![a-z])|\\d{1,2}:\\d{2}(?!\\d)";

// What follows "at" is sometimes just the time ("Doors open at 7pm")
const TIME_ONLY_RE = new RegExp(`^(?:${TIME_TOKEN}|\\d{1,2}$|noon\\b|midnight\\b)`, "i");
// ... or ends with one ("Central Park at 7pm", "Central Park, 7-9pm")
const TRAILING_TIME_RE = new RegExp(
  `[\\s,;-]+(?:(?:at|from|@)\\s+)?(?:\\d{1,2}(?::\\d{2})?\\s*(?:[ap]\\.?m\\.?)?\\s*(?:-|to)\\s*)?(?:${TIME_TOKEN})$`,
  "i"
);

function cleanPlace(text: string): string {
  return text
    .replace(TRAILING_TIME_RE, "")
    .replace(/^[\s:,-]+|[\s.,;:!|-]+$/g, "")
    .trim();
}

function locationCandidate(
  line: NormalizedLine,
  raw: string,
  matcher: string,
  value: string,
  confidence: number
): LocationCandidate {
  const candidate: LocationCandidate = {
    kind: "location",
    raw,
    lineIndex: line.index,
    confidence: score(confidence),
    matcher,
    value,
  };
  return Object.freeze(candidate);
}

export const locativeKeyword: LineMatcher<"location"> = {
  name: "locative",
  match(line) {
    for (const m of line.text.matchAll(LOCATIVE_RE)) {
      const start = m.index ?? 0;
      const rest = line.text.slice(start + m[0].length);
      if (TIME_ONLY_RE.test(rest.trim())) continue;
      const value = cleanPlace(rest);
      if (!/[A-Za-z]/.test(value)) continue;

      let confidence = 0.5;
      if (STREET_RE.test(value)) confidence += 0.3;
      if (VENUE_RE.test(value)) confidence += 0.15;
      const hit: MatcherHit<"location"> = {
        start,
        end: line.text.length,
        candidates: [locationCandidate(line, line.text.slice(start).trim(), "locative", value, confidence)],
      };
      return [hit];
    }
    return [];
  },
};

export const streetAddress: LineMatcher<"location"> = {
  name: "street-address",
  match(line) {
    if (!STREET_RE.test(line.text)) return [];
    const value = cleanPlace(line.text);
    if (!value) return [];
    return [{ ...wholeLine(line), candidates: [locationCandidate(line, line.text, "street-address", value, 0.8)] }];
  },
};

export const venueWord: LineMatcher<"location"> = {
  name: "venue-word",
  match(line) {
    if (!VENUE_RE.test(line.text)) return [];
    const value = cleanPlace(line.text);
    if (!value) return [];
    return [{ ...wholeLine(line), candidates: [locationCandidate(line, line.text, "venue-word", value, 0.4)] }];
  },
};

export const LOCATION_MATCHERS: readonly LineMatcher<"location">[] = [locativeKeyword, streetAddress, venueWord];
