import type { ExtractionConfig } from "../config/extraction";
import type { Logger } from "../lib/logger";
import type { SessionCodec } from "../lib/session";
import type { CalendarGateway } from "../services/calendarService";
import type { DraftStore } from "../services/draftStore";
import type { GoogleAuth } from "../services/googleAuth";
import type { OcrEngine } from "../services/ocrService";

/** Everything the HTTP layer needs; server.ts wires the real ones, tests pass fakes */
export type AppDeps = {
  logger: Logger;
  drafts: DraftStore;
  ocr: OcrEngine;
  calendar: CalendarGateway;
  googleAuth: GoogleAuth;
  sessions: SessionCodec;
  /** Reference time for extraction */
  clock: () => Date;
  /** Zone used when a request names none */
  timezone: string;
  uploadMaxBytes: number;
  ocrTimeoutMs: number;
  extraction: ExtractionConfig;
  /** Allowed CORS origin; any origin when unset */
  corsOrigin?: string;
};
