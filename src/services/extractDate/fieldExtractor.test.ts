import { describe, expect, it } from "vitest";
import { extract } from "./fieldExtractor";
import { normalize } from "./normalizer";

const now = new Date(2024, 5, 1, 12, 0);

const byKind = (text: string, kind: string) =>
  extract(normalize(text), { now }).filter((c) => c.kind === kind);

describe("extract", () => {
  it("returns candidates grouped title, date, time, location", () => {
    const kinds = extract(normalize("Summer Block Party\nSaturday, July 20, 2024\n7-9pm\nat Central Park"), { now }).map(
      (c) => c.kind
    );
    expect(kinds).toEqual(["title", "date", "time", "location"]);
  });

  it("returns no candidates for a field it cannot find", () => {
    expect(byKind("Open Mic Night\n8pm", "date")).toEqual([]);
    expect(byKind("Open Mic Night\n8pm", "location")).toEqual([]);
  });

  it("joins consecutive capitalised lines into one title", () => {
    const titles = byKind("JAZZ NIGHT\nUNDER THE STARS\nFriday 6/9 8pm\nRiverside Gallery", "title");
    expect(titles.map((t) => t.kind === "title" && [t.value, t.confidence, t.lineCount])).toEqual([
      ["JAZZ NIGHT", 0.5, 1],
      ["JAZZ NIGHT UNDER THE STARS", 0.7, 2],
    ]);
  });

  it("scores the first line lower when it already holds a date", () => {
    const [first] = byKind("July 20 Cookout\nBring a dish", "title");
    expect(first).toMatchObject({ value: "July 20 Cookout", confidence: 0.25 });
  });

  it("does not take host lines as capitalised titles", () => {
    const titles = byKind("Summer Social\nDJ KOOL", "title");
    expect(titles.map((t) => t.raw)).toEqual(["Summer Social"]);
  });
});
