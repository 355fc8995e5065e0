// src/config/env.ts
// Read config (ensure `import "dotenv/config"` at the top of src/server.ts)
import { z } from "zod";
import { isValidTimeZone } from "../lib/dates";

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  // Browser origin allowed to send the session cookie; any origin when unset
  CORS_ORIGIN: z.string().url().optional(),
  DEFAULT_TIMEZONE: z
    .string()
    .min(1)
    .default("America/New_York")
    .refine(isValidTimeZone, "must be an IANA time zone such as America/New_York"),

  GOOGLE_CLIENT_ID: z.string().min(1),
  GOOGLE_CLIENT_SECRET: z.string().min(1),
  GOOGLE_REDIRECT_URI: z.string().url(),
  SESSION_SECRET: z.string().min(32),

  DRAFTS_DIR: z.string().min(1).default("data/drafts"),
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024),

  OCR_LANG: z.string().min(1).default("eng"),
  // Directory or URL holding <lang>.traineddata; tesseract.js fetches it from its CDN when unset
  OCR_LANG_PATH: z.string().min(1).optional(),
  OCR_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Missing/invalid environment variables: ${message}`);
  }
  return parsed.data;
}
