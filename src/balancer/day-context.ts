import {
  isOversightProvider,
  type BalancingLimits,
  type ResolvedCatalog,
} from "../catalog.js";
import type { ChangeLog } from "./change-log.js";
import type { ChangeReason } from "./change-log.types.js";
import { evaluateDay, type ConstraintReport, type ProviderLimits } from "./constraints.js";
import type { LogContext, ProcessingLog } from "./processing-log.js";
import type { ScheduleTable } from "./table.js";
import { belowHours, isZeroHours, roundHours } from "./utils.js";

/**
 * Where a day is in the balancing state machine:
 *
 * `pending → cap-repair → gap-fill → oversight-check → exception-ladder →
 * balanced | unbalanced`
 *
 * @category Balancing
 */
export type DayPhase =
  | "pending"
  | "cap-repair"
  | "gap-fill"
  | "oversight-check"
  | "exception-ladder"
  | "balanced"
  | "unbalanced";

export interface DayContextInit {
  table: ScheduleTable;
  catalog: ResolvedCatalog;
  limits: BalancingLimits;
  changes: ChangeLog;
  log: ProcessingLog;
  /** Cap carried over from an earlier run; defaults to `limits.maxHours`. */
  effectiveMaxHours?: number;
  /** A day flagged on input is terminal: passes leave it untouched. */
  unbalanced?: boolean;
}

/**
 * Mutable per-day state shared by the passes.
 *
 * All writes go through {@link DayContext.setHours}, which records exactly
 * one change per real mutation and skips no-op writes.
 */
export class DayContext {
  readonly table: ScheduleTable;
  readonly catalog: ResolvedCatalog;
  readonly limits: BalancingLimits;
  readonly changes: ChangeLog;
  readonly log: ProcessingLog;

  effectiveMaxHours: number;
  unbalanced: boolean;
  phase: DayPhase = "pending";

  #warned = new Set<string>();

  constructor(init: DayContextInit) {
    this.table = init.table;
    this.catalog = init.catalog;
    this.limits = init.limits;
    this.changes = init.changes;
    this.log = init.log;
    this.effectiveMaxHours = init.effectiveMaxHours ?? init.limits.maxHours;
    this.unbalanced = init.unbalanced ?? false;
    if (this.unbalanced) this.phase = "unbalanced";
  }

  get date(): string {
    return this.table.date;
  }

  get escalated(): boolean {
    return this.effectiveMaxHours > this.limits.maxHours;
  }

  providerLimits(): ProviderLimits {
    return { minHours: this.limits.minHours, maxHours: this.effectiveMaxHours };
  }

  evaluate(): ConstraintReport {
    return evaluateDay(this.table, this.providerLimits());
  }

  /** Hours a provider can still take before reaching the day's cap. */
  headroom(provider: string): number {
    return Math.max(0, roundHours(this.effectiveMaxHours - this.table.getProviderTotal(provider)));
  }

  /**
   * True when the cell is a qualifying oversight entry: an oversight
   * provider with at least `oversightHours` for the individual.
   */
  isOversightEntry(provider: string, individual: string): boolean {
    return (
      isOversightProvider(this.catalog, provider) &&
      !belowHours(this.table.getHours(provider, individual), this.limits.oversightHours)
    );
  }

  /** Lowest value a reduction may leave in the cell. */
  reductionFloor(provider: string, individual: string): number {
    return this.isOversightEntry(provider, individual) ? this.limits.oversightHours : 0;
  }

  /**
   * Writes a cell and records the change.
   *
   * A write that leaves the value unchanged, or that would create a row
   * only to hold zero, is skipped and returns false.
   */
  setHours(provider: string, individual: string, value: number, reason: ChangeReason): boolean {
    const exists = this.table.hasProvider(provider);
    const current = this.table.getHours(provider, individual);
    if (isZeroHours(roundHours(value) - current) && (exists || isZeroHours(value))) return false;

    const change = this.table.setHours(provider, individual, value);
    if (change.created) {
      this.changes.recordProviderAdded({ date: this.date, provider, reason });
      this.log.info(`Added provider row (${reason})`, { date: this.date, provider });
    }
    this.changes.recordHoursChange({
      date: this.date,
      provider,
      individual,
      oldValue: change.oldValue,
      newValue: change.newValue,
      reason,
    });
    return true;
  }

  /** Warns once per distinct key for the lifetime of the day. */
  warnOnce(key: string, message: string, context: LogContext = {}): void {
    if (this.#warned.has(key)) return;
    this.#warned.add(key);
    this.log.warn(message, { date: this.date, ...context });
  }
}
