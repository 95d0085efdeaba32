import type {
  CapEscalationRecord,
  CategoryCounts,
  ChangeCategory,
  ChangeReason,
  ChangeRecord,
  ChangeSummary,
  DayChangeSummary,
  HoursChangeRecord,
  ProviderAddedRecord,
  UnbalancedDayRecord,
} from "./change-log.types.js";
import { compareIds, isZeroHours } from "./utils.js";

export interface HoursChangeInput {
  date: string;
  provider: string;
  individual: string;
  oldValue: number;
  newValue: number;
  reason: ChangeReason;
}

export interface ChangeLog {
  recordHoursChange(change: HoursChangeInput): HoursChangeRecord;
  recordProviderAdded(change: { date: string; provider: string; reason: ChangeReason }): ProviderAddedRecord;
  recordCapEscalation(change: { date: string; oldValue: number; newValue: number }): CapEscalationRecord;
  recordUnbalanced(date: string): UnbalancedDayRecord;

  getRecords(): readonly ChangeRecord[];
  getRecordsForDay(date: string): readonly ChangeRecord[];
}

/**
 * Classifies a cell change: from zero to a positive value is an addition,
 * anything else (reductions, non-zero increases) is a modification.
 */
export function classifyHoursChange(oldValue: number, newValue: number): ChangeCategory {
  return isZeroHours(oldValue) && !isZeroHours(newValue)
    ? "new-or-zero-to-positive"
    : "reduced-or-modified-nonzero";
}

/**
 * Append-only change log shared by every pass of a run.
 *
 * Records are frozen on creation and never removed; when a later pass
 * changes the same cell again, both records stay in chronological order.
 */
export class ChangeLogImpl implements ChangeLog {
  #records: ChangeRecord[] = [];

  recordHoursChange(change: HoursChangeInput): HoursChangeRecord {
    const record: HoursChangeRecord = {
      ...this.#header(change.date, classifyHoursChange(change.oldValue, change.newValue)),
      reason: change.reason,
      field: "hours",
      provider: change.provider,
      individual: change.individual,
      oldValue: change.oldValue,
      newValue: change.newValue,
    };
    return this.#append(record);
  }

  recordProviderAdded(change: {
    date: string;
    provider: string;
    reason: ChangeReason;
  }): ProviderAddedRecord {
    const record: ProviderAddedRecord = {
      ...this.#header(change.date, "new-provider-name"),
      reason: change.reason,
      field: "provider",
      provider: change.provider,
      individual: null,
      oldValue: null,
      newValue: null,
    };
    return this.#append(record);
  }

  recordCapEscalation(change: {
    date: string;
    oldValue: number;
    newValue: number;
  }): CapEscalationRecord {
    const record: CapEscalationRecord = {
      ...this.#header(change.date, "reduced-or-modified-nonzero"),
      reason: "cap-escalation",
      field: "effective-max-hours",
      provider: null,
      individual: null,
      oldValue: change.oldValue,
      newValue: change.newValue,
    };
    return this.#append(record);
  }

  recordUnbalanced(date: string): UnbalancedDayRecord {
    const record: UnbalancedDayRecord = {
      ...this.#header(date, "unbalanced-day"),
      reason: "flag-unbalanced",
      field: "unbalanced",
      provider: null,
      individual: null,
      oldValue: false,
      newValue: true,
    };
    return this.#append(record);
  }

  getRecords(): readonly ChangeRecord[] {
    return [...this.#records];
  }

  getRecordsForDay(date: string): readonly ChangeRecord[] {
    return this.#records.filter((record) => record.date === date);
  }

  #header(date: string, category: ChangeCategory) {
    const sequence = this.#records.length + 1;
    return { id: `change:${date}:${sequence}`, sequence, date, category };
  }

  #append<T extends ChangeRecord>(record: T): T {
    Object.freeze(record);
    this.#records.push(record);
    return record;
  }
}

// =============================================================================
// Change Summary - pure function for aggregation
// =============================================================================

export interface SummarizeChangesOptions {
  /** Days to include even when they have no changes. */
  dates?: readonly string[];
  /** Days already flagged unbalanced before this run (they produce no new record). */
  unbalancedDays?: readonly string[];
}

/**
 * Aggregates change records into per-day and run-wide counts by category.
 * This is a pure function that doesn't modify the input.
 *
 * @example
 * ```typescript
 * const summary = summarizeChanges(log.getRecords());
 * // summary.counts["new-provider-name"] === number of rows the balancer added
 * // summary.unbalancedDays === ["2025-07-04"]
 * ```
 */
export function summarizeChanges(
  records: readonly ChangeRecord[],
  options: SummarizeChangesOptions = {},
): ChangeSummary {
  const byDay = new Map<string, { counts: Record<ChangeCategory, number>; total: number }>();
  const unbalanced = new Set<string>(options.unbalancedDays ?? []);

  const getOrCreateDay = (date: string) => {
    let day = byDay.get(date);
    if (!day) {
      day = { counts: emptyCounts(), total: 0 };
      byDay.set(date, day);
    }
    return day;
  };

  for (const date of options.dates ?? []) getOrCreateDay(date);
  for (const date of unbalanced) getOrCreateDay(date);

  const counts = emptyCounts();
  for (const record of records) {
    const day = getOrCreateDay(record.date);
    day.counts[record.category]++;
    day.total++;
    counts[record.category]++;
    if (record.field === "unbalanced") unbalanced.add(record.date);
  }

  const days: DayChangeSummary[] = [...byDay.keys()].toSorted(compareIds).map((date) => {
    const day = getOrCreateDay(date);
    return {
      date,
      counts: day.counts,
      total: day.total,
      unbalanced: unbalanced.has(date),
    };
  });

  return {
    days,
    counts,
    total: records.length,
    unbalancedDays: [...unbalanced].toSorted(compareIds),
  };
}

function emptyCounts(): Record<ChangeCategory, number> {
  return {
    "unbalanced-day": 0,
    "new-or-zero-to-positive": 0,
    "reduced-or-modified-nonzero": 0,
    "new-provider-name": 0,
  } satisfies CategoryCounts;
}
