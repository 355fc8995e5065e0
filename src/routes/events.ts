// src/routes/events.ts
import { Router } from "express";
import { eventsController } from "../controller/eventsController";
import type { AppDeps } from "../types/deps";

/** Stored drafts: GET /api/events, GET|PUT|DELETE /api/events/:id */
export function eventsRouter(deps: AppDeps) {
  const c = eventsController(deps);
  const router = Router();
  router.get("/", c.listEvents);
  router.get("/:id", c.getEvent);
  router.put("/:id", c.putEvent);
  router.delete("/:id", c.deleteEvent);
  return router;
}
