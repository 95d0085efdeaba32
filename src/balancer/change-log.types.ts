import type { PassName } from "./passes/passes.types.js";

// =============================================================================
// Categories
// =============================================================================

/**
 * Presentation categories for change records.
 *
 * The core only emits the category; a presentation adapter maps each one to
 * its own styling (the original sheets used a red date fill, green and orange
 * cell fills, and a green provider-name font).
 */
export const CHANGE_CATEGORIES = [
  "unbalanced-day",
  "new-or-zero-to-positive",
  "reduced-or-modified-nonzero",
  "new-provider-name",
] as const;

/** @category Change Log */
export type ChangeCategory = (typeof CHANGE_CATEGORIES)[number];

/**
 * Why a change was made: the pass that made it, or the final flag.
 *
 * @category Change Log
 */
export type ChangeReason = PassName | "flag-unbalanced";

// =============================================================================
// Records
// =============================================================================

interface ChangeRecordBase {
  /** Deterministic id: `change:{date}:{sequence}`. */
  readonly id: string;
  /** Position in the run-wide log, starting at 1. */
  readonly sequence: number;
  readonly date: string;
  readonly reason: ChangeReason;
  readonly category: ChangeCategory;
}

/** One provider/individual cell changed value. */
export interface HoursChangeRecord extends ChangeRecordBase {
  readonly field: "hours";
  readonly provider: string;
  readonly individual: string;
  readonly oldValue: number;
  readonly newValue: number;
}

/** The balancer introduced a provider row that was not in the source data. */
export interface ProviderAddedRecord extends ChangeRecordBase {
  readonly field: "provider";
  readonly provider: string;
  readonly individual: null;
  readonly oldValue: null;
  readonly newValue: null;
}

/** The day's provider cap was raised by the exception ladder. */
export interface CapEscalationRecord extends ChangeRecordBase {
  readonly field: "effective-max-hours";
  readonly provider: null;
  readonly individual: null;
  readonly oldValue: number;
  readonly newValue: number;
}

/** The day was flagged as unbalanced; terminal for that day. */
export interface UnbalancedDayRecord extends ChangeRecordBase {
  readonly field: "unbalanced";
  readonly provider: null;
  readonly individual: null;
  readonly oldValue: false;
  readonly newValue: true;
}

/**
 * A single append-only entry of the change log.
 *
 * @category Change Log
 */
export type ChangeRecord =
  | HoursChangeRecord
  | ProviderAddedRecord
  | CapEscalationRecord
  | UnbalancedDayRecord;

// =============================================================================
// Summaries
// =============================================================================

export type CategoryCounts = Readonly<Record<ChangeCategory, number>>;

/** @category Change Log */
export interface DayChangeSummary {
  readonly date: string;
  readonly counts: CategoryCounts;
  readonly total: number;
  readonly unbalanced: boolean;
}

/**
 * Aggregated view of a run's change log for display.
 * Use `summarizeChanges()` to create one.
 *
 * @category Change Log
 */
export interface ChangeSummary {
  readonly days: readonly DayChangeSummary[];
  readonly counts: CategoryCounts;
  readonly total: number;
  readonly unbalancedDays: readonly string[];
}
