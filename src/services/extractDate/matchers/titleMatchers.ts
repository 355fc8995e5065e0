// src/services/extractDate/matchers/titleMatchers.ts
import type { NormalizedLine, TitleCandidate } from "../../../types/events";
import { hostOf } from "../eventDetails";
import { score } from "./shared";

export type TitleContext = {
  /** Lines that already produced a date, time or strong location candidate */
  readonly fieldLines: ReadonlySet<number>;
};

// Titles need the whole page (first line, runs of lines), not one line at a time.
export type TitleMatcher = {
  readonly name: string;
  match(lines: readonly NormalizedLine[], ctx: TitleContext): TitleCandidate[];
};

const MAX_CAPS_WORDS = 6;
const MAX_CAPS_CHARS = 40;
const MAX_JOINED_LINES = 3;

function titleCandidate(
  first: NormalizedLine,
  value: string,
  lineCount: number,
  matcher: string,
  confidence: number
): TitleCandidate {
  const candidate: TitleCandidate = {
    kind: "title",
    raw: value,
    lineIndex: first.index,
    confidence: score(confidence),
    matcher,
    value,
    lineCount,
  };
  return Object.freeze(candidate);
}

/** Printed large on the flyer, as far as plain text can tell */
function isCapsShort(text: string): boolean {
  const letters = text.match(/[A-Za-z]/g) ?? [];
  if (letters.length < 2 || /[a-z]/.test(text)) return false;
  return text.split(" ").length <= MAX_CAPS_WORDS && text.length <= MAX_CAPS_CHARS;
}

export const firstLineTitle: TitleMatcher = {
  name: "first-line",
  match(lines, ctx) {
    const [first] = lines;
    if (!first) return [];
    const confidence = ctx.fieldLines.has(first.index) ? 0.25 : 0.5;
    return [titleCandidate(first, first.text, 1, "first-line", confidence)];
  },
};

export const capitalizedTitle: TitleMatcher = {
  name: "capitalized",
  match(lines, ctx) {
    const eligible = (line: NormalizedLine) =>
      isCapsShort(line.text) && !ctx.fieldLines.has(line.index) && hostOf(line.text) === null;

    const out: TitleCandidate[] = [];
    for (let i = 0; i < lines.length; i++) {
      if (!eligible(lines[i])) continue;
      // SUMMER / BLOCK PARTY printed on two lines is one title
      const run = [lines[i]];
      while (
        run.length < MAX_JOINED_LINES &&
        i + 1 < lines.length &&
        lines[i + 1].index === run[run.length - 1].index + 1 &&
        eligible(lines[i + 1])
      ) {
        run.push(lines[++i]);
      }
      out.push(titleCandidate(run[0], run.map((l) => l.text).join(" "), run.length, "capitalized", 0.7));
    }
    return out;
  },
};

export const TITLE_MATCHERS: readonly TitleMatcher[] = [firstLineTitle, capitalizedTitle];
