// src/services/extractDate/normalizer.ts
import type { NormalizedLine } from "../../types/events";

// Look-alikes tesseract tends to emit inside numbers ("7:OO", "2O24", "l0am").
const OCR_DIGIT_CONFUSIONS: Readonly<Record<string, string>> = {
  O: "0",
  o: "0",
  I: "1",
  l: "1",
  "|": "1",
};

// A standalone run of digits/look-alikes, optionally joined by : / . -
// It may be followed by am/pm or an ordinal suffix but not by other letters,
// so words such as "Hall" or "Oct" never match.
const DIGIT_RUN =
  /(?<![A-Za-z0-9|])[0-9OoIl|]+(?:[:/.-][0-9OoIl|]+)*(?=(?:[AaPp]\.?[Mm]\.?|st|nd|rd|th)?(?![A-Za-z0-9|]))/g;

function fixDigitRun(run: string): string {
  if (!/[0-9]/.test(run)) return run;
  return run.replace(/[OoIl|]/g, (ch) => OCR_DIGIT_CONFUSIONS[ch] ?? ch);
}

export function correctDigitConfusions(text: string): string {
  return text.replace(DIGIT_RUN, fixDigitRun);
}

function cleanLine(line: string): string {
  return line
    .replace(/[\u2013\u2014\u2212]/g, "-")
    .replace(/[ \t\u00A0\f\v]+/g, " ")
    .trim();
}

/**
 * Splits OCR output into cleaned, non-empty lines.
 * Each line keeps the index it had in the raw text.
 */
export function normalize(rawText: string): NormalizedLine[] {
  const out: NormalizedLine[] = [];
  rawText.split(/\r\n|\r|\n/).forEach((line, index) => {
    const text = cleanLine(line);
    if (!text) return;
    out.push(Object.freeze({ index, text: correctDigitConfusions(text) }));
  });
  return out;
}
