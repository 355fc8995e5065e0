// src/services/extractDate/candidateResolver.ts
import type {
  CandidateOf,
  DateCandidate,
  FieldCandidate,
  FieldKind,
  ResolvedField,
  Resolution,
} from "../../types/events";
import { EXTRACTION_DEFAULTS, type ExtractionConfig } from "../../config/extraction";
import { dateKeyOf, daysBetween, weekdayOf } from "../../lib/dates";

export type ResolveContext = {
  /** Reference instant for "is this date in the past"; never read from the clock here */
  readonly now: Date;
  /** IANA zone whose calendar date counts as today; this machine's when unset */
  readonly timezone?: string;
  /** Weekdays named anywhere on the flyer */
  readonly weekdayHints?: readonly number[];
  readonly config?: ExtractionConfig;
};

type Ranked<K extends FieldKind> = { candidate: CandidateOf<K>; order: number };

function ofKind<K extends FieldKind>(kind: K) {
  return (c: FieldCandidate): c is CandidateOf<K> => c.kind === kind;
}

/** Confidence desc, then earlier line (more prominent on a flyer), then extraction order */
function rank<K extends FieldKind>(candidates: readonly FieldCandidate[], kind: K): Ranked<K>[] {
  return candidates
    .filter(ofKind(kind))
    .map((candidate, order) => ({ candidate, order }))
    .sort(
      (a, b) =>
        b.candidate.confidence - a.candidate.confidence ||
        a.candidate.lineIndex - b.candidate.lineIndex ||
        a.order - b.order
    );
}

function sameValue(a: FieldCandidate, b: FieldCandidate): boolean {
  if (a.kind === "time" && b.kind === "time") {
    return a.value.start === b.value.start && a.value.end === b.value.end;
  }
  if (a.kind === "time" || b.kind === "time") return false;
  return a.value.trim().toLowerCase() === b.value.trim().toLowerCase();
}

/**
 * Picks between the readings of an ambiguous numeric date (3/4):
 * not in the past, then a weekday printed elsewhere, then the nearer date, then month-first.
 */
function pickDateReading(
  winner: DateCandidate,
  ranked: readonly Ranked<"date">[],
  today: string,
  weekdayHints: readonly number[]
): DateCandidate {
  const group = winner.ambiguity?.group;
  if (group === undefined) return winner;

  const readings = ranked
    .map((r) => r.candidate)
    .filter((c) => c.ambiguity?.group === group && c.confidence === winner.confidence);

  const key = (c: DateCandidate): number[] => [
    c.value < today ? 1 : 0,
    weekdayHints.includes(weekdayOf(c.value)) ? 0 : 1,
    Math.abs(daysBetween(c.value, today)),
    c.ambiguity?.order === "month-first" ? 0 : 1,
  ];
  const compare = (a: DateCandidate, b: DateCandidate) => {
    const ka = key(a);
    const kb = key(b);
    for (let i = 0; i < ka.length; i++) {
      if (ka[i] !== kb[i]) return ka[i] - kb[i];
    }
    return 0;
  };
  return [...readings].sort(compare)[0] ?? winner;
}

function finish<K extends FieldKind>(
  winner: CandidateOf<K>,
  ranked: readonly Ranked<K>[],
  config: ExtractionConfig
): ResolvedField<K> | undefined {
  if (winner.confidence < config.thresholds[winner.kind]) return undefined;
  const others = ranked.map((r) => r.candidate).filter((c) => c !== winner);
  const ambiguous = others.some(
    (c) =>
      !sameValue(c, winner) &&
      Math.round((winner.confidence - c.confidence) * 100) / 100 < config.ambiguityMargin
  );
  return { candidate: winner, ambiguous, competitors: others.length };
}

function resolveKind<K extends FieldKind>(
  candidates: readonly FieldCandidate[],
  kind: K,
  config: ExtractionConfig
): ResolvedField<K> | undefined {
  const ranked = rank(candidates, kind);
  const [top] = ranked;
  return top ? finish(top.candidate, ranked, config) : undefined;
}

/**
 * Chooses one candidate per field kind. Deterministic: the same candidates,
 * `now` and hints always give the same resolution.
 */
export function resolve(candidates: readonly FieldCandidate[], ctx: ResolveContext): Resolution {
  const config = ctx.config ?? EXTRACTION_DEFAULTS;

  const rankedDates = rank(candidates, "date");
  const [topDate] = rankedDates;
  const date = topDate
    ? finish(
        pickDateReading(topDate.candidate, rankedDates, dateKeyOf(ctx.now, ctx.timezone), ctx.weekdayHints ?? []),
        rankedDates,
        config
      )
    : undefined;

  return {
    title: resolveKind(candidates, "title", config),
    date,
    time: resolveKind(candidates, "time", config),
    location: resolveKind(candidates, "location", config),
  };
}
