import * as z from "zod";
import { compareIds, roundHours } from "./balancer/utils.js";
import { ConsolidatedRecordSchema } from "./schedule.schemas.js";
import type { ScheduleDay } from "./types.js";

/**
 * One timesheet line: a provider's time with an individual on a day.
 *
 * - `date`: `YYYY-MM-DD` or `M/D/YYYY`
 * - `individual`: the id, optionally followed by a comma and a description
 *   (`"OT, Overnight"` is individual `OT`)
 * - `hours` or `minutes` (exactly one)
 *
 * @category Consolidation
 */
export type ConsolidatedRecord = z.input<typeof ConsolidatedRecordSchema>;

export interface RejectedRecord {
  /** Position of the record in the input. */
  index: number;
  message: string;
}

export interface ConsolidationResult {
  days: ScheduleDay[];
  rejected: RejectedRecord[];
}

export interface ConsolidateOptions {
  /** Individuals to include on every day even without records. */
  individuals?: readonly string[];
}

/**
 * Groups timesheet lines into per-day provider/hours tables.
 *
 * Hours are summed per day, provider and individual; minutes are converted
 * to hours. Every day lists the same individuals (all ids seen, sorted).
 * Providers keep the order they first appear in on each day, and days are
 * sorted. Records that fail validation are reported in `rejected` and left
 * out.
 *
 * @example
 * ```typescript
 * const { days } = consolidateRecords([
 *   { date: "7/1/2025", provider: "Jordan Lee, LPN", individual: "DD, Day Program", hours: 8 },
 *   { date: "7/1/2025", provider: "Jordan Lee, LPN", individual: "DD", minutes: 90 },
 * ]);
 * // days[0].providers[0].hours.DD === 9.5
 * ```
 *
 * @category Consolidation
 */
export function consolidateRecords(
  records: readonly ConsolidatedRecord[],
  options: ConsolidateOptions = {},
): ConsolidationResult {
  const rejected: RejectedRecord[] = [];
  const individuals = new Set(options.individuals ?? []);
  const byDay = new Map<string, Map<string, Map<string, number>>>();

  records.forEach((raw, index) => {
    const result = ConsolidatedRecordSchema.safeParse(raw);
    if (!result.success) {
      rejected.push({ index, message: z.prettifyError(result.error) });
      return;
    }

    const { date, provider, individual, hours, minutes } = result.data;
    const amount = hours ?? (minutes ?? 0) / 60;
    individuals.add(individual);

    let providers = byDay.get(date);
    if (!providers) {
      providers = new Map();
      byDay.set(date, providers);
    }
    let row = providers.get(provider);
    if (!row) {
      row = new Map();
      providers.set(provider, row);
    }
    row.set(individual, (row.get(individual) ?? 0) + amount);
  });

  const columns = [...individuals].toSorted(compareIds);
  const days = [...byDay.keys()].toSorted(compareIds).map((date): ScheduleDay => {
    const providers = byDay.get(date) ?? new Map<string, Map<string, number>>();
    return {
      date,
      individuals: [...columns],
      providers: [...providers].map(([provider, row]) => ({
        provider,
        hours: Object.fromEntries(
          columns.map((individual) => [individual, roundHours(row.get(individual) ?? 0)]),
        ),
      })),
    };
  });

  return { days, rejected };
}
