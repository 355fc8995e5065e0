// src/routes/calendar.ts
import { Router } from "express";
import { calendarController } from "../controller/calendarController";
import type { AppDeps } from "../types/deps";

export function calendarRouter(deps: AppDeps) {
  const router = Router();
  router.post("/create", calendarController(deps).postCreate);
  return router;
}
