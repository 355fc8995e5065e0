import { describe, expect, it } from "vitest";
import type { EventRecord } from "../types/events";
import { EXTRACTION_DEFAULTS } from "../config/extraction";
import { build } from "./calendarRequestBuilder";

const report = { status: "resolved", confidence: 0.9, ambiguous: false } as const;

const timed: EventRecord = {
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

describe("build", () => {
  it("maps a timed event to wall times in the given zone", () => {
    expect(build(timed, { timezone: "America/New_York" })).toEqual({
      summary: "Summer Block Party",
      location: "Central Park",
      start: { dateTime: "2024-07-20T19:00:00", timeZone: "America/New_York" },
      end: { dateTime: "2024-07-20T21:00:00", timeZone: "America/New_York" },
      reminders: {
        useDefault: false,
        overrides: [
          { method: "popup", minutes: 60 },
          { method: "email", minutes: 1440 },
        ],
      },
    });
  });

  it("uses an exclusive end date for all-day events", () => {
    const allDay: EventRecord = { ...timed, startTime: undefined, endTime: undefined, allDay: true };
    const payload = build(allDay, { timezone: "UTC" });
    expect(payload.start).toEqual({ date: "2024-07-20" });
    expect(payload.end).toEqual({ date: "2024-07-21" });
  });

  it("falls back to TBD and folds hosts into the description", () => {
    const payload = build(
      { ...timed, location: undefined, description: "Bring a blanket", hosts: ["DJ Kool", "Ana"] },
      { timezone: "UTC" }
    );
    expect(payload.location).toBe("TBD");
    expect(payload.description).toBe("Bring a blanket\n\nHosts: DJ Kool, Ana");
  });

  it("does not share reminder objects with the config", () => {
    const payload = build(timed, { timezone: "UTC" });
    expect(payload.reminders.overrides[0]).not.toBe(EXTRACTION_DEFAULTS.reminders[0]);
  });
});
