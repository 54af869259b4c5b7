import { z } from "zod";
import { isCalendarDate } from "../intel/dates";

const calendarDate = z
  .string()
  .trim()
  .refine(isCalendarDate, { message: "expected a YYYY-MM-DD date" });

const bufferDays = z.number().int().min(0).max(60);
const complexityFactor = z.number().positive().max(10);

export const AnalyzeRequest = z.object({
  text: z.string(),
  fileName: z.string().trim().min(1).max(260).optional(),
  bufferDays: bufferDays.optional(),
  complexityFactor: complexityFactor.default(1),
});

export type AnalyzeRequest = z.infer<typeof AnalyzeRequest>;

export const DeadlineRequest = z.object({
  clientDeadline: calendarDate,
  bufferDays: bufferDays.optional(),
  complexityFactor: complexityFactor.default(1),
});

export type DeadlineRequest = z.infer<typeof DeadlineRequest>;

export const StatusQuery = z.object({ deadline: calendarDate });

export const SuppliersMatchRequest = z.object({
  materials: z.array(z.string().trim().min(1)).max(20).default([]),
  excludeOrigins: z.array(z.string().trim()).max(50).default([]),
  search: z.string().max(200).default(""),
});

export type SuppliersMatchRequest = z.infer<typeof SuppliersMatchRequest>;
