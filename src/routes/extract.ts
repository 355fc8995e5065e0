// src/routes/extract.ts
import { Router } from "express";
import { extractController } from "../controller/extractController";
import type { AppDeps } from "../types/deps";

/**
 * POST /api/extract
 * - Validates the body with Zod (inside the controller)
 * - Runs the rule pipeline on already-recognized text; nothing is stored
 * - Responds with { ok, data } or { ok:false, error }
 */
export function extractRouter(deps: AppDeps) {
  const router = Router();
  router.post("/", extractController(deps).postExtract);
  return router;
}
