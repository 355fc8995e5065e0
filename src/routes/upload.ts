// src/routes/upload.ts
import path from "node:path";
import { Router } from "express";
import multer from "multer";
import { uploadController } from "../controller/uploadController";
import { UnsupportedFileError } from "../lib/errors";
import type { AppDeps } from "../types/deps";

const ALLOWED_EXTENSIONS = new Set([".png", ".jpg", ".jpeg", ".gif"]);

/**
 * POST /api/upload
 * multipart/form-data with one image under "file" (optional "timezone" field).
 * memoryStorage so the buffer goes straight to OCR.
 */
export function uploadRouter(deps: AppDeps) {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: deps.uploadMaxBytes, files: 1 },
    fileFilter: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase();
      if (ALLOWED_EXTENSIONS.has(ext) && file.mimetype.startsWith("image/")) return cb(null, true);
      cb(new UnsupportedFileError(file.originalname));
    },
  });

  const router = Router();
  router.post("/", upload.single("file"), uploadController(deps).postUpload);
  return router;
}
