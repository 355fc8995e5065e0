// controllers/eventsController.ts
import type { Request, Response, NextFunction } from "express";
import { EventEditsBody } from "../schemas/extract.schema";
import { sendOk, sendErr } from "../lib/http";
import { ConflictError, NotFoundError } from "../lib/errors";
import { build } from "../services/calendarRequestBuilder";
import { applyEdits } from "../services/extractDate/eventAssembler";
import { warningsFor } from "../services/extractService";
import type { DraftEvent } from "../types/drafts";
import type { AppDeps } from "../types/deps";

export function eventsController(deps: Pick<AppDeps, "drafts" | "extraction">) {
  const withPayload = (draft: DraftEvent) => ({
    ...draft,
    payload: build(draft.event, { timezone: draft.timezone, config: deps.extraction }),
  });

  async function listEvents(_req: Request, res: Response, next: NextFunction) {
    try {
      const drafts = await deps.drafts.list();
      return sendOk(res, drafts);
    } catch (err) {
      return next(err);
    }
  }

  async function getEvent(req: Request, res: Response, next: NextFunction) {
    try {
      const draft = await deps.drafts.require(req.params.id);
      return sendOk(res, withPayload(draft));
    } catch (err) {
      return next(err);
    }
  }

  // put event: user corrections before sending to the calendar
  async function putEvent(req: Request, res: Response, next: NextFunction) {
    const parsed = EventEditsBody.safeParse(req.body);
    if (!parsed.success) {
      return sendErr(res, "E_BAD_INPUT", "Invalid body", parsed.error.flatten(), 422);
    }

    try {
      const { timezone, ...edits } = parsed.data;
      const draft = await deps.drafts.update(req.params.id, (d) => {
        if (d.googleEventId) {
          throw new ConflictError("Event was already added to Google Calendar", { googleEventId: d.googleEventId });
        }
        const event = applyEdits(d.event, edits, deps.extraction);
        return { ...d, event, timezone: timezone ?? d.timezone, warnings: warningsFor(event, deps.extraction) };
      });
      return sendOk(res, withPayload(draft));
    } catch (err) {
      return next(err);
    }
  }

  async function deleteEvent(req: Request, res: Response, next: NextFunction) {
    try {
      const removed = await deps.drafts.delete(req.params.id);
      if (!removed) throw new NotFoundError("Draft", req.params.id);
      return sendOk(res, { id: req.params.id, deleted: true });
    } catch (err) {
      return next(err);
    }
  }

  return { listEvents, getEvent, putEvent, deleteEvent };
}
