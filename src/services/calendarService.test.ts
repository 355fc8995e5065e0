import { describe, expect, it } from "vitest";
import { CalendarSubmissionError } from "../lib/errors";
import { toSubmissionError } from "./calendarService";

function apiError(status: number, reason?: string, message = "request failed") {
  return Object.assign(new Error(message), {
    response: { status, data: { error: { errors: reason ? [{ reason }] : [] } } },
  });
}

describe("toSubmissionError", () => {
  it("maps 401 to an expired session", () => {
    const err = toSubmissionError(apiError(401));
    expect([err.kind, err.code, err.status]).toEqual(["auth-expired", "E_CALENDAR_AUTH", 401]);
  });

  it("maps 429 and rate-limit 403s to rate-limited", () => {
    expect(toSubmissionError(apiError(429)).kind).toBe("rate-limited");
    expect(toSubmissionError(apiError(403, "userRateLimitExceeded")).kind).toBe("rate-limited");
    expect(toSubmissionError({ code: 429 }).status).toBe(429);
  });

  it("maps 400 to a validation failure with the API message", () => {
    const err = toSubmissionError(apiError(400, "invalid", "Invalid start time."));
    expect([err.kind, err.status, err.message]).toEqual([
      "validation",
      422,
      "Google Calendar rejected the event: Invalid start time.",
    ]);
  });

  it("maps anything else to unknown", () => {
    expect(toSubmissionError(apiError(403, "forbidden")).kind).toBe("unknown");
    const err = toSubmissionError(new Error("socket hang up"));
    expect([err.kind, err.status, err.message]).toEqual(["unknown", 502, "Calendar request failed: socket hang up"]);
  });

  it("passes submission errors through", () => {
    const original = new CalendarSubmissionError("validation", "bad");
    expect(toSubmissionError(original)).toBe(original);
  });
});
