import { describe, expect, it } from "vitest";
import type { EventRecord } from "../types/events";
import type { DraftEvent } from "../types/drafts";
import { generateIcs, icsFileName } from "./icsService";

const report = { status: "resolved", confidence: 0.9, ambiguous: false } as const;

const event: EventRecord = {
  title: "Summer Block Party",
  startDate: "2024-07-20",
  startTime: "19:00",
  endDate: "2024-07-20",
  endTime: "21:00",
  allDay: false,
  location: "Central Park",
  hosts: [],
  confidence: 0.9,
  fields: { title: report, date: report, time: report, location: report },
};

const draft: DraftEvent = {
  id: "draft-1",
  createdAt: "2024-06-01T16:00:00.000Z",
  updatedAt: "2024-06-01T16:00:00.000Z",
  rawText: "Summer Block Party",
  timezone: "America/New_York",
  event,
  warnings: [],
};

const lines = (ics: string) => ics.split(/\r?\n/);

describe("generateIcs", () => {
  it("converts wall times in the draft's zone to UTC", () => {
    const out = lines(generateIcs(draft));
    expect(out).toContain("DTSTART:20240720T230000Z");
    expect(out).toContain("DTEND:20240721T010000Z");
    expect(out).toContain("SUMMARY:Summer Block Party");
    expect(out).toContain("UID:draft-1@flyer-calendar");
  });

  it("writes all-day events as dates with an exclusive end", () => {
    const allDay: DraftEvent = {
      ...draft,
      event: { ...event, startTime: undefined, endTime: undefined, allDay: true },
    };
    const out = lines(generateIcs(allDay));
    expect(out).toContain("DTSTART;VALUE=DATE:20240720");
    expect(out).toContain("DTEND;VALUE=DATE:20240721");
  });
});

describe("icsFileName", () => {
  it("slugs the title", () => {
    expect(icsFileName(draft)).toBe("summer-block-party.ics");
    expect(icsFileName({ ...draft, event: { ...event, title: "!!!" } })).toBe("event.ics");
  });
});
