import { describe, expect, it } from "vitest";
import type { Resolution, TimeValue } from "../../types/events";
import { applyEdits, assemble } from "./eventAssembler";

const now = new Date(2024, 5, 1, 12, 0);

function withTime(value: TimeValue, date = "2024-07-20"): Resolution {
  return {
    date: {
      candidate: { kind: "date", value: date, raw: date, lineIndex: 1, confidence: 0.95, matcher: "iso" },
      ambiguous: false,
      competitors: 0,
    },
    time: {
      candidate: { kind: "time", value, raw: "t", lineIndex: 2, confidence: 0.8, matcher: "test" },
      ambiguous: false,
      competitors: 0,
    },
  };
}

describe("assemble", () => {
  it("fills defaults for an empty resolution", () => {
    const record = assemble({}, now);
    expect(record).toMatchObject({
      title: "Untitled Event",
      startDate: "2024-06-01",
      endDate: "2024-06-01",
      allDay: true,
      hosts: [],
      confidence: 0,
    });
    expect(record.startTime).toBeUndefined();
    expect(record.location).toBeUndefined();
    expect(record.fields).toEqual({
      title: { status: "defaulted", confidence: 0, ambiguous: false },
      date: { status: "defaulted", confidence: 0, ambiguous: false },
      time: { status: "absent", confidence: 0, ambiguous: false },
      location: { status: "absent", confidence: 0, ambiguous: false },
    });
  });

  it("adds the default duration when no end time was printed", () => {
    const record = assemble(withTime({ start: "19:00" }), now);
    expect(record).toMatchObject({ startDate: "2024-07-20", startTime: "19:00", endDate: "2024-07-20", endTime: "20:00" });
    expect(record.allDay).toBe(false);
  });

  it("carries a late start past midnight", () => {
    const record = assemble(withTime({ start: "23:30" }), now);
    expect([record.endDate, record.endTime]).toEqual(["2024-07-21", "00:30"]);
  });

  it("rolls an end time before the start into the next day", () => {
    const record = assemble(withTime({ start: "22:00", end: "01:00" }), now);
    expect([record.endDate, record.endTime]).toEqual(["2024-07-21", "01:00"]);
  });

  it("reports where resolved values came from", () => {
    const record = assemble(withTime({ start: "19:00" }), now);
    expect(record.fields.date).toEqual({ status: "resolved", confidence: 0.95, ambiguous: false, source: "2024-07-20" });
    expect(record.fields.time.confidence).toBe(0.8);
    expect(record.confidence).toBe(0);
  });

  it("clips very long titles", () => {
    const res: Resolution = {
      title: {
        candidate: { kind: "title", value: "A".repeat(200), raw: "x", lineIndex: 0, confidence: 0.5, matcher: "t", lineCount: 1 },
        ambiguous: false,
        competitors: 0,
      },
    };
    expect(assemble(res, now).title).toHaveLength(120);
  });
});

describe("applyEdits", () => {
  const base = assemble(withTime({ start: "19:00", end: "21:00" }), now, { hosts: ["DJ Kool"] });

  it("marks edited fields confirmed", () => {
    const edited = applyEdits(base, { title: "Block Party" });
    expect(edited.title).toBe("Block Party");
    expect(edited.fields.title).toEqual({ status: "confirmed", confidence: 1, ambiguous: false });
    expect(edited.confidence).toBe(0.95);
    expect(edited.endTime).toBe("21:00");
  });

  it("drops the old end when only the start moves", () => {
    const edited = applyEdits(base, { startTime: "18:00" });
    expect([edited.startTime, edited.endTime]).toEqual(["18:00", "19:00"]);
  });

  it("makes the event all-day when the start time is cleared", () => {
    const edited = applyEdits(base, { startTime: null });
    expect(edited).toMatchObject({ allDay: true, endDate: "2024-07-20" });
    expect(edited.startTime).toBeUndefined();
    expect(edited.endTime).toBeUndefined();
    expect(edited.fields.time.status).toBe("absent");
  });

  it("clears and replaces optional values", () => {
    const edited = applyEdits({ ...base, location: "Hall" }, { location: null, hosts: [] });
    expect(edited.location).toBeUndefined();
    expect(edited.fields.location.status).toBe("absent");
    expect(edited.hosts).toEqual([]);
  });

  it("leaves the record alone for empty edits", () => {
    expect(applyEdits(base, {})).toEqual(base);
  });
});
