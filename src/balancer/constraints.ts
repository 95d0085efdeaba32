import type { ScheduleTable } from "./table.js";
import { belowHours, exceedsHours, isPositiveHours, isZeroHours } from "./utils.js";

/**
 * Provider bounds a day is evaluated against.
 */
export interface ProviderLimits {
  minHours: number;
  /** Effective cap for the day (base max, or the escalated max). */
  maxHours: number;
}

export interface ProviderConstraintStatus {
  readonly provider: string;
  readonly total: number;
  /** Any hours at all. Inactive rows are exempt from the bounds. */
  readonly active: boolean;
  readonly overCap: boolean;
  readonly underMin: boolean;
}

export interface IndividualConstraintStatus {
  readonly individual: string;
  readonly allocated: number;
  /**
   * Target minus allocated: positive when under-allocated, negative when
   * over-allocated, zero when satisfied.
   */
  readonly pending: number;
}

/**
 * Hard-constraint status of one day.
 *
 * @category Balancing
 */
export interface ConstraintReport {
  readonly date: string;
  readonly maxHours: number;
  readonly providers: readonly ProviderConstraintStatus[];
  readonly individuals: readonly IndividualConstraintStatus[];
  /** True when no provider is out of bounds and every pending value is zero. */
  readonly satisfied: boolean;
}

/**
 * Evaluates the provider bounds and individual targets for a day.
 *
 * Pure: reads the table's current state and caches nothing, so calling it
 * again after a mutation reflects the new state.
 *
 * @example
 * ```typescript
 * const report = evaluateDay(table, { minHours: 2, maxHours: 16 });
 * const gaps = report.individuals.filter((i) => i.pending > 0);
 * ```
 *
 * @category Balancing
 */
export function evaluateDay(table: ScheduleTable, limits: ProviderLimits): ConstraintReport {
  const providers = table.providers().map((provider): ProviderConstraintStatus => {
    const total = table.getProviderTotal(provider);
    const active = isPositiveHours(total);
    return {
      provider,
      total,
      active,
      overCap: active && exceedsHours(total, limits.maxHours),
      underMin: active && belowHours(total, limits.minHours),
    };
  });

  const individuals = table.individuals.map(
    (individual): IndividualConstraintStatus => ({
      individual,
      allocated: table.getIndividualTotal(individual),
      pending: table.getIndividualPending(individual),
    }),
  );

  const satisfied =
    providers.every((p) => !p.overCap && !p.underMin) &&
    individuals.every((i) => isZeroHours(i.pending));

  return {
    date: table.date,
    maxHours: limits.maxHours,
    providers,
    individuals,
    satisfied,
  };
}

/** Individuals that still need hours, in the report's column order. */
export function underAllocatedIndividuals(report: ConstraintReport): IndividualConstraintStatus[] {
  return report.individuals.filter((i) => isPositiveHours(i.pending));
}

/** Active providers outside `[minHours, maxHours]`. */
export function providerViolations(report: ConstraintReport): ProviderConstraintStatus[] {
  return report.providers.filter((p) => p.overCap || p.underMin);
}
