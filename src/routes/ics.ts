// src/routes/ics.ts
import { Router } from "express";
import { generateIcs, icsFileName } from "../services/icsService";
import type { AppDeps } from "../types/deps";

/** GET /api/events/:id/ics: the draft as a downloadable calendar file */
export function icsRouter(deps: AppDeps) {
  const router = Router();

  router.get("/:id/ics", async (req, res, next) => {
    try {
      const draft = await deps.drafts.require(req.params.id);
      const ics = generateIcs(draft, deps.extraction);
      res.setHeader("Content-Type", "text/calendar; charset=utf-8");
      res.setHeader("Content-Disposition", `attachment; filename="${icsFileName(draft)}"`);
      res.send(ics);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
