// src/services/extractDate/matchers/shared.ts
import type { CandidateOf, FieldKind, NormalizedLine } from "../../../types/events";

export type MatchContext = {
  readonly now: Date;
  /** now's calendar date in the event's zone, yyyy-MM-dd */
  readonly today: string;
};

/** One regex hit on a line; the span keeps later matchers off the same text */
export type MatcherHit<K extends FieldKind> = {
  readonly start: number;
  readonly end: number;
  readonly candidates: readonly CandidateOf<K>[];
};

export type LineMatcher<K extends FieldKind> = {
  readonly name: string;
  match(line: NormalizedLine, ctx: MatchContext): MatcherHit<K>[];
};

export function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

/** Clamps to [0, 1] and rounds to two decimals so sums like 0.9 + 0.05 stay exact */
export function score(value: number): number {
  return Math.round(clamp01(value) * 100) / 100;
}

export function hitSpan(m: RegExpMatchArray): { start: number; end: number } {
  const start = m.index ?? 0;
  return { start, end: start + m[0].length };
}

export function wholeLine(line: NormalizedLine): { start: number; end: number } {
  return { start: 0, end: line.text.length };
}

/** Runs matchers in order; a hit overlapping one already taken on the same line is dropped */
export function runLineMatchers<K extends FieldKind>(
  lines: readonly NormalizedLine[],
  matchers: readonly LineMatcher<K>[],
  ctx: MatchContext
): CandidateOf<K>[] {
  const out: CandidateOf<K>[] = [];
  for (const line of lines) {
    const taken: Array<{ start: number; end: number }> = [];
    for (const matcher of matchers) {
      for (const hit of matcher.match(line, ctx)) {
        if (taken.some((t) => hit.start < t.end && t.start < hit.end)) continue;
        taken.push({ start: hit.start, end: hit.end });
        out.push(...hit.candidates);
      }
    }
  }
  return out;
}
