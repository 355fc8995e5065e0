import { describe, expect, it } from "vitest";
import { OcrFailureError } from "../lib/errors";
import { extractEvent } from "./extractService";

// Saturday, June 1 2024, noon in New York
const now = new Date("2024-06-01T16:00:00Z");
const opts = { now, timezone: "America/New_York" };

describe("extractEvent", () => {
  it("extracts a clean flyer", () => {
    const result = extractEvent("Summer Block Party\nSaturday, July 20, 2024\n7-9pm\nat Central Park", opts);

    expect(result.event).toMatchObject({
      title: "Summer Block Party",
      startDate: "2024-07-20",
      startTime: "19:00",
      endDate: "2024-07-20",
      endTime: "21:00",
      allDay: false,
      location: "Central Park",
      hosts: [],
      confidence: 0.5,
    });
    expect(result.payload).toEqual({
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
    expect(result.warnings).toEqual([]);
  });

  it("reads a range written as 7:00 PM - 9:00 PM", () => {
    const result = extractEvent("Summer Block Party\nSaturday, July 20, 2024\n7:00 PM - 9:00 PM\nat Central Park", opts);

    expect(result.event).toMatchObject({
      title: "Summer Block Party",
      startDate: "2024-07-20",
      startTime: "19:00",
      endDate: "2024-07-20",
      endTime: "21:00",
      location: "Central Park",
    });
    expect(result.event.fields.time).toEqual({
      status: "resolved",
      confidence: 0.9,
      ambiguous: false,
      source: "7:00 PM - 9:00 PM",
    });
    expect(result.payload.end).toEqual({ dateTime: "2024-07-20T21:00:00", timeZone: "America/New_York" });
  });

  it("handles stacked capitals, weekday hints, hosts and leftover text", () => {
    const result = extractEvent(
      "JAZZ NIGHT\nUNDER THE STARS\nFriday 6/9 8pm\nRiverside Gallery\nHosted by DJ Kool\nBring a blanket and your friends",
      opts
    );

    expect(result.event).toMatchObject({
      title: "JAZZ NIGHT UNDER THE STARS",
      startDate: "2024-09-06",
      startTime: "20:00",
      endTime: "21:00",
      location: "Riverside Gallery",
      hosts: ["DJ Kool"],
      description: "Bring a blanket and your friends",
      confidence: 0.55,
    });
    expect(result.event.fields.date).toEqual({ status: "resolved", confidence: 0.55, ambiguous: true, source: "6/9" });
    expect(result.payload.description).toBe("Bring a blanket and your friends\n\nHosts: DJ Kool");
    expect(result.warnings).toEqual(['Ambiguous date: picked "6/9" over close alternatives']);
  });

  it("defaults a missing date to today and says so", () => {
    const result = extractEvent("Open Mic Night\n8pm\nat The Blue Note Cafe", opts);

    expect(result.event).toMatchObject({
      title: "Open Mic Night",
      startDate: "2024-06-01",
      startTime: "20:00",
      endTime: "21:00",
      location: "The Blue Note Cafe",
      confidence: 0,
    });
    expect(result.event.fields.date.status).toBe("defaulted");
    expect(result.warnings).toEqual([
      "No date found; using 2024-06-01",
      "Low extraction confidence (0); review before adding to your calendar",
    ]);
  });

  it("takes today from the event's zone rather than the machine's", () => {
    // 22:00 on May 31 in New York, 11:00 on June 1 in Tokyo
    const late = new Date("2024-06-01T02:00:00Z");
    const text = "Open Mic Night\n8pm tonight\nat The Blue Note Cafe";

    expect(extractEvent(text, { now: late, timezone: "America/New_York" }).event.startDate).toBe("2024-05-31");
    expect(extractEvent(text, { now: late, timezone: "Asia/Tokyo" }).event.startDate).toBe("2024-06-01");
    expect(extractEvent("Open Mic Night\n8pm", { now: late, timezone: "America/New_York" }).warnings).toContain(
      "No date found; using 2024-05-31"
    );
  });

  it("defaults the year and skips past dates by the event's calendar", () => {
    // Dec 31 2024 in New York, already Jan 1 2025 in Tokyo
    const newYearsEve = new Date("2025-01-01T03:00:00Z");

    expect(extractEvent("Countdown Party\nDec 31", { now: newYearsEve, timezone: "America/New_York" }).event.startDate).toBe(
      "2024-12-31"
    );
    expect(extractEvent("Countdown Party\nDec 31", { now: newYearsEve, timezone: "Asia/Tokyo" }).event.startDate).toBe(
      "2025-12-31"
    );
  });

  it("makes an all-day event with a TBD location when only a date is found", () => {
    const result = extractEvent("Bake Sale\nJuly 4", opts);

    expect(result.event).toMatchObject({ startDate: "2024-07-04", endDate: "2024-07-04", allDay: true });
    expect(result.payload.start).toEqual({ date: "2024-07-04" });
    expect(result.payload.end).toEqual({ date: "2024-07-05" });
    expect(result.payload.location).toBe("TBD");
    expect(result.warnings).toEqual([
      "No start time found; treating as an all-day event",
      'No location found; calendar entry will say "TBD"',
    ]);
  });

  it("corrects OCR digit confusions before matching", () => {
    const result = extractEvent("Game Night\nJuly 2O, 2O24 at 7:OO pm", opts);
    expect([result.event.startDate, result.event.startTime]).toEqual(["2024-07-20", "19:00"]);
  });

  it("is deterministic", () => {
    const text = "Summer Block Party\nSaturday, July 20, 2024\n7-9pm\nat Central Park";
    expect(extractEvent(text, opts)).toEqual(extractEvent(text, opts));
  });

  it("rejects empty text", () => {
    expect(() => extractEvent(" \n\n ", opts)).toThrow(OcrFailureError);
    try {
      extractEvent("", opts);
    } catch (err) {
      expect(err).toBeInstanceOf(OcrFailureError);
      expect(err instanceof OcrFailureError && err.reason).toBe("empty");
    }
  });

  it("rejects text with too little signal", () => {
    expect(() => extractEvent("~ ! .\n-- a", opts)).toThrow("too short or garbled");
  });
});
