// src/schemas/draft.schema.ts
// Drafts are read back from disk, so everything is validated on load.
import { z } from "zod";

const fieldReportSchema = z.object({
  status: z.enum(["resolved", "defaulted", "absent", "confirmed"]),
  confidence: z.number().min(0).max(1),
  ambiguous: z.boolean(),
  source: z.string().optional(),
});

export const eventRecordSchema = z.object({
  title: z.string().min(1),
  startDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  startTime: z.string().optional(),
  endDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  endTime: z.string().optional(),
  allDay: z.boolean(),
  location: z.string().optional(),
  description: z.string().optional(),
  hosts: z.array(z.string()),
  confidence: z.number().min(0).max(1),
  fields: z.object({
    title: fieldReportSchema,
    date: fieldReportSchema,
    time: fieldReportSchema,
    location: fieldReportSchema,
  }),
});

export const draftEventSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9-]+$/),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
  imageName: z.string().optional(),
  rawText: z.string(),
  timezone: z.string().min(1),
  event: eventRecordSchema,
  warnings: z.array(z.string()),
  googleEventId: z.string().optional(),
  googleEventLink: z.string().optional(),
});
