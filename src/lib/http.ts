// src/lib/http.ts
// Every response is { ok: true, data } or { ok: false, error: { code, message, details? } }
import type { ErrorRequestHandler, Response } from "express";
import multer from "multer";
import { AppError } from "./errors";

export function sendOk<T>(res: Response, data: T, status = 200) {
  return res.status(status).json({ ok: true, data });
}

export function sendErr(res: Response, code: string, message: string, details?: unknown, status = 400) {
  const error = details === undefined ? { code, message } : { code, message, details };
  return res.status(status).json({ ok: false, error });
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === "object" && err !== null && "type" in err && err.type === "entity.parse.failed";
}

/** Last middleware: maps thrown errors to the envelope */
export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof AppError) {
    if (err.status >= 500) req.log.error({ err }, err.message);
    return sendErr(res, err.code, err.message, err.details, err.status);
  }
  if (err instanceof multer.MulterError) {
    const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    return sendErr(res, "E_UPLOAD", err.message, { field: err.field }, status);
  }
  if (isBodyParseError(err)) {
    return sendErr(res, "E_BAD_INPUT", "Request body is not valid JSON", undefined, 400);
  }
  req.log.error({ err }, "unhandled error");
  return sendErr(res, "E_INTERNAL", "Internal server error", undefined, 500);
};
