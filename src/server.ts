import "dotenv/config";
import path from "node:path";

import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { EXTRACTION_DEFAULTS } from "./config/extraction";
import { createLogger } from "./lib/logger";
import { SessionCodec } from "./lib/session";
import { GoogleCalendarGateway } from "./services/calendarService";
import { DraftStore } from "./services/draftStore";
import { GoogleAuthService } from "./services/googleAuth";
import { TesseractOcrEngine } from "./services/ocrService";

const env = loadEnv();
const logger = createLogger({ level: env.LOG_LEVEL, pretty: env.NODE_ENV === "development" });

const app = createApp({
  logger,
  drafts: new DraftStore(path.resolve(env.DRAFTS_DIR)),
  ocr: new TesseractOcrEngine({ lang: env.OCR_LANG, langPath: env.OCR_LANG_PATH, logger }),
  calendar: new GoogleCalendarGateway(),
  googleAuth: new GoogleAuthService({
    clientId: env.GOOGLE_CLIENT_ID,
    clientSecret: env.GOOGLE_CLIENT_SECRET,
    redirectUri: env.GOOGLE_REDIRECT_URI,
  }),
  sessions: new SessionCodec(env.SESSION_SECRET, env.NODE_ENV === "production"),
  clock: () => new Date(),
  timezone: env.DEFAULT_TIMEZONE,
  uploadMaxBytes: env.UPLOAD_MAX_BYTES,
  ocrTimeoutMs: env.OCR_TIMEOUT_MS,
  extraction: EXTRACTION_DEFAULTS,
  corsOrigin: env.CORS_ORIGIN,
});

app.listen(env.PORT, () => logger.info(`API listening on http://localhost:${env.PORT}`));
