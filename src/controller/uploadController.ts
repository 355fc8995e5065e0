// controllers/uploadController.ts
import type { Request, Response, NextFunction } from "express";
import { UploadFields } from "../schemas/extract.schema";
import { sendOk, sendErr } from "../lib/http";
import { extractEvent } from "../services/extractService";
import { newDraft } from "../services/draftStore";
import { recognizeWithTimeout } from "../services/ocrService";
import type { AppDeps } from "../types/deps";

export function uploadController(deps: AppDeps) {
  // post upload: flyer image -> OCR -> pipeline -> stored draft
  async function postUpload(req: Request, res: Response, next: NextFunction) {
    const file = req.file;
    if (!file) {
      return sendErr(res, "E_BAD_INPUT", 'No flyer uploaded (multipart field "file")', undefined, 400);
    }
    const fields = UploadFields.safeParse(req.body ?? {});
    if (!fields.success) {
      return sendErr(res, "E_BAD_INPUT", "Invalid form fields", fields.error.flatten(), 422);
    }

    try {
      const timezone = fields.data.timezone ?? deps.timezone;
      const rawText = await recognizeWithTimeout(deps.ocr, file.buffer, deps.ocrTimeoutMs);
      const now = deps.clock();
      const result = extractEvent(rawText, { now, timezone, config: deps.extraction });

      const draft = await deps.drafts.save(
        newDraft({
          rawText,
          timezone,
          event: result.event,
          warnings: result.warnings,
          imageName: file.originalname,
          now,
        })
      );
      req.log.info({ draftId: draft.id, confidence: draft.event.confidence }, "flyer extracted");

      return sendOk(
        res,
        { draftId: draft.id, event: result.event, payload: result.payload, warnings: result.warnings },
        201
      );
    } catch (err) {
      return next(err);
    }
  }

  return { postUpload };
}
