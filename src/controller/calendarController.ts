// controllers/calendarController.ts
import type { Request, Response, NextFunction } from "express";
import { CalendarCreateBody } from "../schemas/extract.schema";
import { sendOk, sendErr } from "../lib/http";
import { AuthRequiredError, CalendarSubmissionError, ConflictError } from "../lib/errors";
import type { GoogleCredentials, SessionData } from "../lib/session";
import { build } from "../services/calendarRequestBuilder";
import type { AppDeps } from "../types/deps";

export function calendarController(deps: Pick<AppDeps, "drafts" | "calendar" | "googleAuth" | "sessions" | "extraction">) {
  // Draft ids with an insert under way; a second submit for one of them gets 409
  const submitting = new Set<string>();

  // post create: draft -> Google Calendar; a failed insert leaves the draft untouched
  async function postCreate(req: Request, res: Response, next: NextFunction) {
    const parsed = CalendarCreateBody.safeParse(req.body);
    if (!parsed.success) {
      return sendErr(res, "E_BAD_INPUT", "Invalid body", parsed.error.flatten(), 422);
    }

    try {
      const session = await deps.sessions.read(req);
      if (!session.google) throw new AuthRequiredError();

      const { eventId } = parsed.data;
      if (submitting.has(eventId)) {
        throw new ConflictError("Event is already being added to Google Calendar", { draftId: eventId });
      }
      submitting.add(eventId);
      try {
        return await submit(req, res, session, session.google, eventId);
      } finally {
        submitting.delete(eventId);
      }
    } catch (err) {
      return next(err);
    }
  }

  async function submit(req: Request, res: Response, session: SessionData, google: GoogleCredentials, eventId: string) {
    const draft = await deps.drafts.require(eventId);
    if (draft.googleEventId) {
      throw new ConflictError("Event was already added to Google Calendar", {
        googleEventId: draft.googleEventId,
        htmlLink: draft.googleEventLink,
      });
    }
    const payload = build(draft.event, { timezone: draft.timezone, config: deps.extraction });

    try {
      const grant = await deps.googleAuth.getAccessToken(google);
      if (grant.credentials.accessToken !== google.accessToken) {
        await deps.sessions.write(res, { ...session, google: grant.credentials });
      }
      const inserted = await deps.calendar.insertEvent(payload, grant.accessToken);

      const saved = await deps.drafts.update(draft.id, (d) => ({
        ...d,
        googleEventId: inserted.id,
        googleEventLink: inserted.htmlLink,
      }));
      req.log.info({ draftId: saved.id, googleEventId: inserted.id }, "calendar event created");
      return sendOk(res, { draft: saved, googleEventId: inserted.id, htmlLink: inserted.htmlLink }, 201);
    } catch (err) {
      if (!(err instanceof CalendarSubmissionError)) throw err;
      req.log.warn({ draftId: draft.id, kind: err.kind, err }, "calendar insert failed");
      if (err.kind === "auth-expired") {
        await deps.sessions.write(res, { ...session, google: undefined });
      }
      return sendErr(res, err.code, err.message, { kind: err.kind, draft }, err.status);
    }
  }

  return { postCreate };
}
