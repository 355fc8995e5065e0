// controllers/authController.ts
import { randomBytes } from "node:crypto";
import type { Request, Response, NextFunction } from "express";
import { sendErr } from "../lib/http";
import type { AppDeps } from "../types/deps";

// Only same-site paths; "//host" would leave the app
function safeReturnTo(value: unknown): string | undefined {
  return typeof value === "string" && value.startsWith("/") && !value.startsWith("//") ? value : undefined;
}

export function authController(deps: Pick<AppDeps, "googleAuth" | "sessions">) {
  async function startGoogleAuth(req: Request, res: Response, next: NextFunction) {
    try {
      const state = randomBytes(24).toString("base64url");
      const session = await deps.sessions.read(req);
      await deps.sessions.write(res, { ...session, oauthState: state, returnTo: safeReturnTo(req.query.returnTo) });
      return res.redirect(deps.googleAuth.buildAuthUrl(state));
    } catch (err) {
      return next(err);
    }
  }

  async function googleCallback(req: Request, res: Response, next: NextFunction) {
    try {
      const { code, state, error } = req.query;
      const session = await deps.sessions.read(req);

      if (typeof error === "string") {
        await deps.sessions.write(res, { ...session, oauthState: undefined });
        return sendErr(res, "E_AUTH_DENIED", `Google sign-in failed: ${error}`, undefined, 401);
      }
      if (typeof state !== "string" || !session.oauthState || state !== session.oauthState) {
        return sendErr(res, "E_AUTH_STATE", "OAuth state mismatch; start sign-in again", undefined, 401);
      }
      if (typeof code !== "string" || !code) {
        return sendErr(res, "E_BAD_INPUT", "Missing authorization code", undefined, 400);
      }

      const google = await deps.googleAuth.exchangeCode(code);
      await deps.sessions.write(res, { google });
      req.log.info("google account connected");
      return res.redirect(session.returnTo ?? "/");
    } catch (err) {
      return next(err);
    }
  }

  async function signOut(_req: Request, res: Response) {
    deps.sessions.clear(res);
    return res.status(204).end();
  }

  return { startGoogleAuth, googleCallback, signOut };
}
