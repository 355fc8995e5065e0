// src/services/calendarService.ts
import { google, type calendar_v3 } from "googleapis";
import type { CalendarEventPayload } from "../types/events";
import { CalendarSubmissionError, errorMessage } from "../lib/errors";

export type InsertedEvent = {
  id: string;
  htmlLink?: string;
};

/** (payload, access token) -> remote event id. Failures are reported, never retried here. */
export interface CalendarGateway {
  insertEvent(payload: CalendarEventPayload, accessToken: string): Promise<InsertedEvent>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function statusOf(err: unknown): number | undefined {
  if (!isRecord(err)) return undefined;
  const response = err.response;
  const status = isRecord(response) ? response.status : undefined;
  if (typeof status === "number") return status;
  const code = err.code;
  return typeof code === "number" ? code : undefined;
}

// Google puts the reason in error.errors[0].reason ("rateLimitExceeded", "userRateLimitExceeded", ...)
function reasonOf(err: unknown): string {
  const response = isRecord(err) ? err.response : undefined;
  const data = isRecord(response) ? response.data : undefined;
  const body = isRecord(data) ? data.error : undefined;
  const errors: unknown = isRecord(body) ? body.errors : undefined;
  if (!Array.isArray(errors)) return "";
  const first: unknown = errors[0];
  const reason = isRecord(first) ? first.reason : undefined;
  return typeof reason === "string" ? reason : "";
}

export function toSubmissionError(err: unknown): CalendarSubmissionError {
  if (err instanceof CalendarSubmissionError) return err;
  const status = statusOf(err);
  const reason = reasonOf(err);
  const message = errorMessage(err);
  const details = { status, reason: reason || undefined };
  const options = { cause: err };

  if (status === 401) {
    return new CalendarSubmissionError("auth-expired", "Google rejected the access token; sign in again", details, options);
  }
  if (status === 429 || (status === 403 && /ratelimit/i.test(reason))) {
    return new CalendarSubmissionError("rate-limited", "Google Calendar rate limit hit; try again shortly", details, options);
  }
  if (status === 400) {
    return new CalendarSubmissionError("validation", `Google Calendar rejected the event: ${message}`, details, options);
  }
  return new CalendarSubmissionError("unknown", `Calendar request failed: ${message}`, details, options);
}

function toRequestBody(payload: CalendarEventPayload): calendar_v3.Schema$Event {
  return {
    summary: payload.summary,
    location: payload.location,
    description: payload.description,
    start: { ...payload.start },
    end: { ...payload.end },
    reminders: {
      useDefault: payload.reminders.useDefault,
      overrides: payload.reminders.overrides.map((r) => ({ ...r })),
    },
  };
}

export class GoogleCalendarGateway implements CalendarGateway {
  constructor(private readonly calendarId = "primary") {}

  async insertEvent(payload: CalendarEventPayload, accessToken: string): Promise<InsertedEvent> {
    const auth = new google.auth.OAuth2();
    auth.setCredentials({ access_token: accessToken });
    const calendar = google.calendar({ version: "v3", auth });

    try {
      const res = await calendar.events.insert({ calendarId: this.calendarId, requestBody: toRequestBody(payload) });
      if (!res.data.id) throw new CalendarSubmissionError("unknown", "Google Calendar returned no event id");
      return { id: res.data.id, htmlLink: res.data.htmlLink ?? undefined };
    } catch (err) {
      throw toSubmissionError(err);
    }
  }
}
