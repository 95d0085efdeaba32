import * as z from "zod";
import {
  resolveCatalog,
  resolveLimits,
  type BalancingLimits,
  type BalancingLimitsInput,
  type ProviderCatalog,
  type ResolvedCatalog,
} from "../catalog.js";
import { isDayString } from "../datetime.utils.js";
import { DataError } from "../errors.js";
import { ScheduleDaySchema } from "../schedule.schemas.js";
import type { DayStatus, ScheduleDay } from "../types.js";
import { ChangeLogImpl, summarizeChanges } from "./change-log.js";
import type { ChangeRecord, ChangeSummary } from "./change-log.types.js";
import { providerViolations, type ProviderConstraintStatus } from "./constraints.js";
import { DayContext } from "./day-context.js";
import { BalancingEngine, type BalancingEngineOptions } from "./engine.js";
import { sweepOversight } from "./passes/oversight.js";
import { ProcessingLogImpl, type LogEntry, type ProcessingLog } from "./processing-log.js";
import { ScheduleTable } from "./table.js";
import { belowHours, compareIds, exceedsHours, isZeroHours } from "./utils.js";

// ============================================================================
// Types
// ============================================================================

export interface BalanceOptions extends BalancingEngineOptions {
  limits?: BalancingLimitsInput;
  /** Secondary providers supplied for this run, appended to the configured ones. */
  additionalSecondaryProviders?: string[];
  /** Receives processing log entries as they are recorded. */
  onLog?: (entry: LogEntry) => void;
}

/**
 * @category Balancing
 */
export interface DayResult {
  date: string;
  status: DayStatus;
  /** Cap in effect at the end of the run; null for days that failed validation. */
  effectiveMaxHours: number | null;
  /** Change records written for this day during the run. */
  changes: number;
  error?: DataError;
}

/**
 * Why a day ended unbalanced.
 *
 * @category Balancing
 */
export interface BalanceFailure {
  date: string;
  /** Non-zero pending hours by individual (negative when over-allocated). */
  pending: Record<string, number>;
  providerViolations: ProviderConstraintStatus[];
}

/**
 * @category Balancing
 */
export interface BalanceStatistics {
  daysProcessed: number;
  daysBalanced: number;
  daysUnbalanced: number;
  daysWithErrors: number;
  /** Number of cell changes. */
  totalModifications: number;
  providersAdded: number;
  oversightEntriesAdded: number;
}

/**
 * @category Balancing
 */
export interface BalanceResult {
  /** Balanced days in date order; days that failed validation are returned as given. */
  days: ScheduleDay[];
  dayResults: DayResult[];
  changes: readonly ChangeRecord[];
  summary: ChangeSummary;
  statistics: BalanceStatistics;
  dataErrors: DataError[];
  failures: BalanceFailure[];
  log: readonly LogEntry[];
}

// ============================================================================
// Orchestration
// ============================================================================

/**
 * Balances a consolidated dataset.
 *
 * Days are processed in date order: core passes per day, then the oversight
 * sweep over the whole dataset, then the exception ladder for every day
 * still unsatisfied. A day with malformed data is reported in `dataErrors`
 * and passed through unchanged; the rest of the dataset is still balanced.
 *
 * Running the function on its own output produces no new change records.
 *
 * @throws {ConfigurationError} When the catalog or limits are invalid.
 *
 * @example
 * ```typescript
 * const result = balanceSchedule(days, {
 *   supplementalProviders: ["Morgan Hale, RN/House Manager", "Riley Park, RN/Program Manager"],
 *   oversightProviders: ["Morgan Hale, RN/House Manager"],
 * });
 * result.statistics.daysUnbalanced; // 0
 * result.summary.counts["new-provider-name"]; // rows the balancer added
 * ```
 *
 * @category Balancing
 */
export function balanceSchedule(
  days: readonly ScheduleDay[],
  catalog: ProviderCatalog,
  options: BalanceOptions = {},
): BalanceResult {
  const resolvedCatalog = resolveCatalog(catalog, {
    additionalSecondaryProviders: options.additionalSecondaryProviders,
  });
  const limits = resolveLimits(options.limits);

  const changes = new ChangeLogImpl();
  const log = new ProcessingLogImpl({ onEntry: options.onLog });
  const engine = new BalancingEngine(options);

  const ordered = days.toSorted((a, b) => compareIds(a.date, b.date));
  const dataErrors: DataError[] = [];
  const contexts = new Map<string, DayContext>();
  const failedDays: { day: ScheduleDay; error: DataError }[] = [];

  log.info(`Balancing ${ordered.length} days`);

  for (const day of ordered) {
    try {
      if (contexts.has(day.date)) {
        throw new DataError(`Day ${day.date} appears more than once`, { date: day.date });
      }
      const ctx = createDayContext(day, { catalog: resolvedCatalog, limits, changes, log });
      contexts.set(ctx.date, ctx);
      if (ctx.unbalanced) {
        log.info("Day already flagged unbalanced; left unchanged", { date: ctx.date });
      }
    } catch (error) {
      if (!(error instanceof DataError)) throw error;
      dataErrors.push(error);
      failedDays.push({ day, error });
      log.error(error.message, {
        date: error.date,
        provider: error.provider,
        individual: error.individual,
      });
    }
  }

  for (const ctx of contexts.values()) engine.runCorePasses(ctx);

  const validDates = ordered.map((day) => day.date).filter(isDayString);
  const first = validDates[0];
  const last = validDates.at(-1);
  const injections =
    first !== undefined && last !== undefined && contexts.size > 0
      ? sweepOversight({
          days: [...contexts.values()],
          range: { start: first, end: last },
          limits,
          log,
          rebalance: (ctx) => engine.runCorePasses(ctx),
        })
      : [];

  for (const ctx of contexts.values()) engine.runLadder(ctx);

  // Results
  const records = changes.getRecords();
  const failures: BalanceFailure[] = [];
  const dayResults: DayResult[] = [];
  const outputDays: ScheduleDay[] = [];

  for (const ctx of contexts.values()) {
    outputDays.push({
      ...ctx.table.toScheduleDay(),
      effectiveMaxHours: ctx.effectiveMaxHours,
      unbalanced: ctx.unbalanced,
    });
    dayResults.push({
      date: ctx.date,
      status: ctx.unbalanced ? "unbalanced" : "balanced",
      effectiveMaxHours: ctx.effectiveMaxHours,
      changes: changes.getRecordsForDay(ctx.date).length,
    });
    if (ctx.unbalanced) failures.push(describeFailure(ctx));
  }
  for (const { day, error } of failedDays) {
    outputDays.push(day);
    dayResults.push({ date: day.date, status: "error", effectiveMaxHours: null, changes: 0, error });
  }

  const byDate = (a: { date: string }, b: { date: string }) => compareIds(a.date, b.date);
  const statistics: BalanceStatistics = {
    daysProcessed: ordered.length,
    daysBalanced: dayResults.filter((r) => r.status === "balanced").length,
    daysUnbalanced: dayResults.filter((r) => r.status === "unbalanced").length,
    daysWithErrors: dataErrors.length,
    totalModifications: records.filter((r) => r.field === "hours").length,
    providersAdded: records.filter((r) => r.field === "provider").length,
    oversightEntriesAdded: injections.length,
  };

  log.info(
    `Finished: ${statistics.daysBalanced} balanced, ${statistics.daysUnbalanced} unbalanced, ` +
      `${statistics.daysWithErrors} with errors, ${statistics.totalModifications} modifications`,
  );

  return {
    days: outputDays.toSorted(byDate),
    dayResults: dayResults.toSorted(byDate),
    changes: records,
    summary: summarizeChanges(records, {
      dates: [...contexts.keys()],
      unbalancedDays: [...contexts.values()]
        .filter((ctx) => ctx.unbalanced)
        .map((ctx) => ctx.date),
    }),
    statistics,
    dataErrors,
    failures,
    log: log.getEntries(),
  };
}

// ============================================================================
// Helpers
// ============================================================================

interface RunContext {
  catalog: ResolvedCatalog;
  limits: BalancingLimits;
  changes: ChangeLogImpl;
  log: ProcessingLog;
}

/**
 * Validates a day and wraps it in a {@link DayContext}.
 *
 * @throws {DataError} When the day is malformed.
 */
export function createDayContext(day: ScheduleDay, run: RunContext): DayContext {
  const parsed = ScheduleDaySchema.safeParse(day);
  if (!parsed.success) {
    throw new DataError(`Invalid day ${day.date}:\n${z.prettifyError(parsed.error)}`, {
      date: day.date,
    });
  }

  const { effectiveMaxHours } = parsed.data;
  if (
    effectiveMaxHours !== undefined &&
    (belowHours(effectiveMaxHours, run.limits.maxHours) ||
      exceedsHours(effectiveMaxHours, run.limits.escalatedMaxHours))
  ) {
    throw new DataError(
      `Effective cap ${effectiveMaxHours}h on ${day.date} is outside ` +
        `${run.limits.maxHours}h to ${run.limits.escalatedMaxHours}h`,
      { date: day.date },
    );
  }

  const table = ScheduleTable.fromScheduleDay(parsed.data, run.limits.targetHours);
  return new DayContext({
    table,
    catalog: run.catalog,
    limits: run.limits,
    changes: run.changes,
    log: run.log,
    effectiveMaxHours,
    unbalanced: parsed.data.unbalanced,
  });
}

function describeFailure(ctx: DayContext): BalanceFailure {
  const report = ctx.evaluate();
  return {
    date: ctx.date,
    pending: Object.fromEntries(
      report.individuals
        .filter((i) => !isZeroHours(i.pending))
        .map((i) => [i.individual, i.pending]),
    ),
    providerViolations: providerViolations(report),
  };
}
