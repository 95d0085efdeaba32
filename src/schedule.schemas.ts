/**
 * Zod schemas for the data that enters the balancer.
 *
 * Configuration schemas live in catalog.ts; these cover schedule data:
 * consolidated timesheet records and ready-made schedule days.
 */

import * as z from "zod";
import { normalizeDayInput } from "./datetime.utils.js";

// --------------------------------------------------------------------------
// Schedule days
// --------------------------------------------------------------------------

export const ProviderEntrySchema = z.object({
  provider: z.string(),
  hours: z.record(z.string(), z.number()),
});

export const ScheduleDaySchema = z.object({
  date: z.iso.date(),
  individuals: z.array(z.string().min(1)),
  providers: z.array(ProviderEntrySchema),
  effectiveMaxHours: z.number().positive().optional(),
  unbalanced: z.boolean().optional(),
});

// --------------------------------------------------------------------------
// Consolidated records
// --------------------------------------------------------------------------

/** Accepts `YYYY-MM-DD` and `M/D/YYYY`, outputs `YYYY-MM-DD`. */
export const DayInputSchema = z.string().transform((value, ctx) => {
  const day = normalizeDayInput(value);
  if (day === undefined) {
    ctx.addIssue({ code: "custom", message: `Unrecognized date "${value}"` });
    return z.NEVER;
  }
  return day;
});

/**
 * Individual column values look like `"DD, Day Program"`; the id is the
 * text before the first comma.
 */
export const IndividualIdSchema = z
  .string()
  .transform((value) => (value.split(",")[0] ?? "").trim())
  .pipe(z.string().min(1, "Individual id is empty"));

export const ConsolidatedRecordSchema = z
  .object({
    date: DayInputSchema,
    provider: z.string().trim().min(1),
    individual: IndividualIdSchema,
    hours: z.number().min(0).optional(),
    minutes: z.number().min(0).optional(),
  })
  .refine((record) => (record.hours === undefined) !== (record.minutes === undefined), {
    message: "A record needs exactly one of hours or minutes",
  });
