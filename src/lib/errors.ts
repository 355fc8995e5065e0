// src/lib/errors.ts
// Errors that reach the HTTP layer carry their own code and status.

export class AppError extends Error {
  readonly code: string;
  readonly status: number;
  readonly details?: unknown;

  constructor(code: string, message: string, status = 500, details?: unknown, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

export type OcrFailureReason = "empty" | "unusable" | "timeout" | "engine";

/** OCR gave nothing worth extracting from; extraction never runs on it */
export class OcrFailureError extends AppError {
  readonly reason: OcrFailureReason;

  constructor(reason: OcrFailureReason, message: string, options?: ErrorOptions) {
    super("E_OCR_FAILURE", message, 422, { reason }, options);
    this.reason = reason;
  }
}

export class NotFoundError extends AppError {
  constructor(what: string, id: string) {
    super("E_NOT_FOUND", `${what} ${id} not found`, 404);
  }
}

export class AuthRequiredError extends AppError {
  constructor(message = "Not authenticated with Google") {
    super("E_AUTH_REQUIRED", message, 401);
  }
}

export class UnsupportedFileError extends AppError {
  constructor(filename: string) {
    super("E_UNSUPPORTED_FILE", `File type not allowed: ${filename}`, 415);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: unknown) {
    super("E_CONFLICT", message, 409, details);
  }
}

export type CalendarFailureKind = "auth-expired" | "rate-limited" | "validation" | "unknown";

const CALENDAR_FAILURES: Record<CalendarFailureKind, { code: string; status: number }> = {
  "auth-expired": { code: "E_CALENDAR_AUTH", status: 401 },
  "rate-limited": { code: "E_CALENDAR_RATE_LIMIT", status: 429 },
  validation: { code: "E_CALENDAR_VALIDATION", status: 422 },
  unknown: { code: "E_CALENDAR", status: 502 },
};

/** The calendar collaborator refused the event; the draft is kept for a retry */
export class CalendarSubmissionError extends AppError {
  readonly kind: CalendarFailureKind;

  constructor(kind: CalendarFailureKind, message: string, details?: unknown, options?: ErrorOptions) {
    const { code, status } = CALENDAR_FAILURES[kind];
    super(code, message, status, details, options);
    this.kind = kind;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
