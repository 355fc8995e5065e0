// controllers/extractController.ts
import type { Request, Response, NextFunction } from "express";
import { ExtractBody, parseLocalNow } from "../schemas/extract.schema";
import { sendOk, sendErr } from "../lib/http";
import { extractEvent } from "../services/extractService";
import type { AppDeps } from "../types/deps";

export function extractController(deps: Pick<AppDeps, "clock" | "timezone" | "extraction">) {
  // post extract: text already recognized elsewhere, nothing stored
  async function postExtract(req: Request, res: Response, next: NextFunction) {
    const parsed = ExtractBody.safeParse(req.body);
    if (!parsed.success) {
      return sendErr(res, "E_BAD_INPUT", "Invalid body", parsed.error.flatten(), 422);
    }

    try {
      const { text, now } = parsed.data;
      const timezone = parsed.data.timezone ?? deps.timezone;
      const data = extractEvent(text, {
        now: now ? parseLocalNow(now, timezone) : deps.clock(),
        timezone,
        config: deps.extraction,
      });
      return sendOk(res, data);
    } catch (err) {
      return next(err);
    }
  }

  return { postExtract };
}
