import { resolveCatalog, resolveLimits, type BalancingLimitsInput, type ProviderCatalog } from "../../src/catalog.js";
import { ChangeLogImpl } from "../../src/balancer/change-log.js";
import { DayContext } from "../../src/balancer/day-context.js";
import { ProcessingLogImpl } from "../../src/balancer/processing-log.js";
import { ScheduleTable } from "../../src/balancer/table.js";
import type { ScheduleDay } from "../../src/types.js";

export const HOUSE_MANAGER = "Morgan Hale, RN/House Manager";
export const PROGRAM_MANAGER = "Riley Park, RN/Program Manager";
export const HOUSE_SUPERVISOR = "Casey Brook, RN/House Supervisor";
export const SECONDARY = "Taylor Quinn, LPN";

export const baseCatalog: ProviderCatalog = {
  supplementalProviders: [HOUSE_MANAGER, PROGRAM_MANAGER, HOUSE_SUPERVISOR],
  oversightProviders: [HOUSE_MANAGER, PROGRAM_MANAGER],
  secondaryProviders: [SECONDARY],
  secondaryEligibleIndividuals: ["OT"],
};

/** Builds a day from `{ provider: { individual: hours } }`, in insertion order. */
export const makeDay = (
  date: string,
  individuals: string[],
  providers: Record<string, Record<string, number>> = {},
  extra: Partial<Pick<ScheduleDay, "effectiveMaxHours" | "unbalanced">> = {},
): ScheduleDay => ({
  date,
  individuals,
  providers: Object.entries(providers).map(([provider, hours]) => ({ provider, hours })),
  ...extra,
});

export interface ContextOptions {
  catalog?: ProviderCatalog;
  limits?: BalancingLimitsInput;
  changes?: ChangeLogImpl;
  log?: ProcessingLogImpl;
  effectiveMaxHours?: number;
  unbalanced?: boolean;
}

export const makeContext = (day: ScheduleDay, options: ContextOptions = {}): DayContext => {
  const limits = resolveLimits(options.limits);
  return new DayContext({
    table: ScheduleTable.fromScheduleDay(day, limits.targetHours),
    catalog: resolveCatalog(options.catalog ?? baseCatalog),
    limits,
    changes: options.changes ?? new ChangeLogImpl(),
    log: options.log ?? new ProcessingLogImpl(),
    effectiveMaxHours: options.effectiveMaxHours,
    unbalanced: options.unbalanced,
  });
};

/** Current hours of a provider row, keyed by individual. */
export const rowOf = (ctx: DayContext, provider: string): Record<string, number> =>
  Object.fromEntries(
    ctx.table.individuals.map((individual) => [individual, ctx.table.getHours(provider, individual)]),
  );

/** Compact view of hour records: `provider/individual old->new reason`. */
export const describeChanges = (ctx: DayContext): string[] =>
  ctx.changes.getRecordsForDay(ctx.date).map((record) => {
    switch (record.field) {
      case "hours":
        return `${record.provider}/${record.individual} ${record.oldValue}->${record.newValue} ${record.reason}`;
      case "provider":
        return `+${record.provider} ${record.reason}`;
      case "effective-max-hours":
        return `cap ${record.oldValue}->${record.newValue}`;
      case "unbalanced":
        return "unbalanced";
    }
  });

/** Captures whatever a function throws. */
export const catchError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
};
