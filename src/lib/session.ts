// src/lib/session.ts
// Session state lives in an encrypted cookie: OAuth state during the consent
// round trip, then the Google credentials used for calendar inserts.
import { createHash } from "node:crypto";
import type { CookieOptions, Request, Response } from "express";
import { EncryptJWT, jwtDecrypt } from "jose";
import { z } from "zod";

export const SESSION_COOKIE_NAME = "flyer_session";
const SESSION_TTL_SECONDS = 7 * 24 * 60 * 60;

const googleCredentialsSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  expiryDate: z.number().int().optional(),
  scope: z.string().optional(),
});

const sessionSchema = z.object({
  oauthState: z.string().min(1).optional(),
  returnTo: z.string().optional(),
  google: googleCredentialsSchema.optional(),
});

export type GoogleCredentials = z.infer<typeof googleCredentialsSchema>;
export type SessionData = z.infer<typeof sessionSchema>;

export class SessionCodec {
  private readonly key: Uint8Array;

  constructor(
    secret: string,
    private readonly secureCookie = false
  ) {
    // A256GCM wants exactly 32 bytes
    this.key = createHash("sha256").update(secret).digest();
  }

  async encode(data: SessionData): Promise<string> {
    return new EncryptJWT({ session: data })
      .setProtectedHeader({ alg: "dir", enc: "A256GCM" })
      .setIssuedAt()
      .setExpirationTime(`${SESSION_TTL_SECONDS}s`)
      .encrypt(this.key);
  }

  /** Expired, tampered or foreign cookies read as an empty session */
  async decode(token: string): Promise<SessionData> {
    try {
      const { payload } = await jwtDecrypt(token, this.key);
      const parsed = sessionSchema.safeParse(payload.session);
      return parsed.success ? parsed.data : {};
    } catch {
      return {};
    }
  }

  async read(req: Request): Promise<SessionData> {
    const cookies: Record<string, unknown> = req.cookies ?? {};
    const token = cookies[SESSION_COOKIE_NAME];
    return typeof token === "string" && token ? this.decode(token) : {};
  }

  async write(res: Response, data: SessionData): Promise<void> {
    res.cookie(SESSION_COOKIE_NAME, await this.encode(data), this.cookieOptions());
  }

  clear(res: Response): void {
    res.clearCookie(SESSION_COOKIE_NAME, { ...this.cookieOptions(), maxAge: undefined });
  }

  private cookieOptions(): CookieOptions {
    return {
      httpOnly: true,
      sameSite: "lax",
      secure: this.secureCookie,
      path: "/",
      maxAge: SESSION_TTL_SECONDS * 1000,
    };
  }
}
