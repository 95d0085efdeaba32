/**
 * Daily coverage balancer for 24-hour care schedules.
 *
 * Timesheet lines are consolidated into one provider/hours table per day.
 * The balancer then repairs each day so that every individual receives
 * exactly the daily target of coverage while every active provider stays
 * within the hour limits, and records every change it makes.
 *
 * @remarks
 * ## Core Concepts
 *
 * **Individuals and providers**: Individuals are the people receiving care;
 * each needs `targetHours` (24) hours a day. Providers supply those hours.
 * An active provider (any hours that day) must stay between `minHours` and
 * the day's cap.
 *
 * **Provider catalog**: Configuration names the supplemental providers used
 * to fill gaps, the oversight providers whose periodic entries satisfy the
 * weekly oversight requirement, and the secondary providers kept as a last
 * resort for specific individuals.
 *
 * **Passes**: Balancing is an ordered list of passes, each returning whether
 * it changed the day. Cap repair and surplus trim reduce, gap fill adds; they
 * run to a fixpoint. A dataset-wide sweep then guarantees an oversight entry
 * in every rolling window. Days still unsatisfied go through the exception
 * ladder: modify existing entries, escalate the cap, use secondary providers,
 * and finally flag the day unbalanced.
 *
 * **Change log**: Every mutation is an append-only {@link ChangeRecord}
 * tagged with a category. Presentation (colours, fonts) is left to the
 * caller; {@link buildDailyMatrix} produces a neutral row model with the
 * categories attached.
 *
 * @example Balance a dataset
 * ```typescript
 * import { consolidateRecords, balanceSchedule, buildDailyMatrix } from "coverage-balancer";
 *
 * const { days } = consolidateRecords(records);
 * const result = balanceSchedule(days, {
 *   supplementalProviders: [
 *     "Morgan Hale, RN/House Manager",
 *     "Riley Park, RN/Program Manager",
 *   ],
 *   oversightProviders: ["Morgan Hale, RN/House Manager"],
 *   secondaryProviders: ["Taylor Quinn, LPN"],
 *   secondaryEligibleIndividuals: ["OT"],
 * });
 *
 * for (const failure of result.failures) {
 *   console.log(failure.date, failure.pending);
 * }
 * const rows = buildDailyMatrix(result.days, { changes: result.changes });
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Schedule data
// ============================================================================

export type { ProviderEntry, ScheduleDay, DayStatus } from "./types.js";

export {
  ProviderEntrySchema,
  ScheduleDaySchema,
  ConsolidatedRecordSchema,
} from "./schedule.schemas.js";

export { consolidateRecords } from "./consolidate.js";

export type {
  ConsolidatedRecord,
  ConsolidateOptions,
  ConsolidationResult,
  RejectedRecord,
} from "./consolidate.js";

export {
  isDayString,
  normalizeDayInput,
  formatDisplayDate,
  addDays,
  generateDayRange,
} from "./datetime.utils.js";

// ============================================================================
// Configuration
// ============================================================================

export {
  resolveCatalog,
  resolveLimits,
  DEFAULT_LIMITS,
  isSupplementalProvider,
  isOversightProvider,
  isSecondaryProvider,
  isSecondaryEligible,
} from "./catalog.js";

export type {
  ProviderCatalog,
  ResolvedCatalog,
  BalancingLimits,
  BalancingLimitsInput,
  ResolveCatalogOptions,
} from "./catalog.js";

// ============================================================================
// Errors
// ============================================================================

export { BalancingError, BalancingErrorCode, DataError, ConfigurationError } from "./errors.js";

export type { DataErrorContext } from "./errors.js";

// ============================================================================
// Balancing
// ============================================================================

export { balanceSchedule, createDayContext } from "./balancer/orchestrator.js";

export type {
  BalanceOptions,
  BalanceResult,
  BalanceFailure,
  BalanceStatistics,
  DayResult,
} from "./balancer/orchestrator.js";

export { BalancingEngine, flagUnbalanced } from "./balancer/engine.js";

export type { BalancingEngineOptions } from "./balancer/engine.js";

export { DayContext } from "./balancer/day-context.js";

export type { DayContextInit, DayPhase } from "./balancer/day-context.js";

export { ScheduleTable } from "./balancer/table.js";

export type { HoursChange } from "./balancer/table.js";

export {
  evaluateDay,
  underAllocatedIndividuals,
  providerViolations,
} from "./balancer/constraints.js";

export type {
  ConstraintReport,
  ProviderLimits,
  ProviderConstraintStatus,
  IndividualConstraintStatus,
} from "./balancer/constraints.js";

export * from "./balancer/passes/index.js";

// ============================================================================
// Change log
// ============================================================================

export { ChangeLogImpl, classifyHoursChange, summarizeChanges } from "./balancer/change-log.js";

export type {
  ChangeLog,
  HoursChangeInput,
  SummarizeChangesOptions,
} from "./balancer/change-log.js";

export { CHANGE_CATEGORIES } from "./balancer/change-log.types.js";

export type {
  ChangeCategory,
  ChangeReason,
  ChangeRecord,
  HoursChangeRecord,
  ProviderAddedRecord,
  CapEscalationRecord,
  UnbalancedDayRecord,
  CategoryCounts,
  DayChangeSummary,
  ChangeSummary,
} from "./balancer/change-log.types.js";

// ============================================================================
// Processing log
// ============================================================================

export { ProcessingLogImpl, formatLogEntry } from "./balancer/processing-log.js";

export type {
  ProcessingLog,
  ProcessingLogOptions,
  LogEntry,
  LogLevel,
  LogContext,
} from "./balancer/processing-log.js";

// ============================================================================
// Daily matrix
// ============================================================================

export { buildDailyMatrix, formatDuration, columnLetter, MATRIX_LABELS } from "./matrix.js";

export type { MatrixCell, MatrixRow, MatrixRowKind, DailyMatrixOptions } from "./matrix.js";
