// src/lib/logger.ts
import { pino, type Logger } from "pino";

export type { Logger };

export function createLogger(opts: { level: string; pretty?: boolean }): Logger {
  return pino({
    level: opts.level,
    transport: opts.pretty
      ? {
          target: "pino-pretty",
          options: { translateTime: "HH:MM:ss Z", ignore: "pid,hostname" },
        }
      : undefined,
    // OAuth tokens travel in the session cookie
    redact: ["req.headers.authorization", "req.headers.cookie", 'res.headers["set-cookie"]'],
  });
}
