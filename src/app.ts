// src/app.ts
import express from "express";
import cors from "cors";
import cookieParser from "cookie-parser";
import { pinoHttp } from "pino-http";
import { errorHandler, sendErr } from "./lib/http";
import { authRouter } from "./routes/auth";
import { calendarRouter } from "./routes/calendar";
import { eventsRouter } from "./routes/events";
import { extractRouter } from "./routes/extract";
import { icsRouter } from "./routes/ics";
import { uploadRouter } from "./routes/upload";
import type { AppDeps } from "./types/deps";

export function createApp(deps: AppDeps) {
  const app = express();
  app.disable("x-powered-by");

  app.use(cors(deps.corsOrigin ? { origin: deps.corsOrigin, credentials: true } : undefined));
  app.use(express.json({ limit: "5mb" }));
  app.use(cookieParser());
  app.use(pinoHttp({ logger: deps.logger }));

  app.get("/api/healthz", (_req, res) => res.json({ ok: true }));

  app.use("/api/extract", extractRouter(deps));
  app.use("/api/upload", uploadRouter(deps));
  app.use("/api/events", icsRouter(deps));
  app.use("/api/events", eventsRouter(deps));
  app.use("/api/auth", authRouter(deps));
  app.use("/api/calendar", calendarRouter(deps));

  app.use("/api", (req, res) => sendErr(res, "E_NOT_FOUND", `No route for ${req.method} ${req.originalUrl}`, undefined, 404));
  app.use(errorHandler);
  return app;
}
