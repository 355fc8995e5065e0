// src/routes/auth.ts
import { Router } from "express";
import { authController } from "../controller/authController";
import type { AppDeps } from "../types/deps";

/** Google consent round trip; credentials end up in the session cookie */
export function authRouter(deps: AppDeps) {
  const c = authController(deps);
  const router = Router();
  router.get("/google", c.startGoogleAuth);
  router.get("/google/callback", c.googleCallback);
  router.post("/signout", c.signOut);
  return router;
}
