import { describe, expect, it } from "vitest";
import type { NormalizedLine } from "../../../types/events";
import { LOCATION_MATCHERS, locativeKeyword, streetAddress, venueWord } from "./locationMatchers";
import { runLineMatchers, type MatchContext } from "./shared";

const ctx: MatchContext = { now: new Date(2024, 5, 1, 12, 0), today: "2024-06-01" };
const line = (text: string, index = 0): NormalizedLine => ({ index, text });

describe("locativeKeyword", () => {
  it("takes the place after 'at' and scores venue words", () => {
    const [hit] = locativeKeyword.match(line("Live music at The Blue Note Cafe"), ctx);
    expect(hit.candidates[0]).toMatchObject({
      value: "The Blue Note Cafe",
      raw: "at The Blue Note Cafe",
      confidence: 0.65,
    });
  });

  it("scores street addresses after a label", () => {
    const [hit] = locativeKeyword.match(line("Location: 123 Main St, Springfield"), ctx);
    expect(hit.candidates[0]).toMatchObject({ value: "123 Main St, Springfield", confidence: 0.8 });
  });

  it("skips 'at' followed by a time", () => {
    expect(locativeKeyword.match(line("Doors open at 7pm"), ctx)).toEqual([]);
  });

  it("does not read email addresses as @ places", () => {
    expect(locativeKeyword.match(line("rsvp: host@example.com"), ctx)).toEqual([]);
  });
});

describe("whole-line matchers", () => {
  it("recognises street addresses", () => {
    const [hit] = streetAddress.match(line("450 Elm Street, Suite 12"), ctx);
    expect(hit.candidates[0]).toMatchObject({ value: "450 Elm Street, Suite 12", confidence: 0.8 });
  });

  it("strips a trailing time from a venue line", () => {
    const [hit] = venueWord.match(line("Central Park at 7pm"), ctx);
    expect(hit.candidates[0]).toMatchObject({ value: "Central Park", confidence: 0.4 });
  });
});

describe("LOCATION_MATCHERS together", () => {
  it("produces one candidate per line when the keyword covers it", () => {
    const candidates = runLineMatchers([line("at Riverside Gallery")], LOCATION_MATCHERS, ctx);
    expect(candidates.map((c) => [c.matcher, c.value])).toEqual([["locative", "Riverside Gallery"]]);
  });
});
