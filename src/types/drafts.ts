import type { EventRecord } from "./events";

/** A flyer extraction kept on disk until it is reviewed and sent to the calendar */
export type DraftEvent = {
  readonly id: string;
  /** ISO timestamps */
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly imageName?: string;
  /** OCR output the event was extracted from */
  readonly rawText: string;
  /** IANA zone the event's wall times are in */
  readonly timezone: string;
  readonly event: EventRecord;
  readonly warnings: readonly string[];
  /** Set once the event was inserted into Google Calendar */
  readonly googleEventId?: string;
  readonly googleEventLink?: string;
};
