import type { BalancingLimits } from "../../catalog.js";
import { addDays, daysBetween, generateDayRange } from "../../datetime.utils.js";
import type { DayContext } from "../day-context.js";
import type { ProcessingLog } from "../processing-log.js";
import { compareIds, exceedsHours } from "../utils.js";

export interface OversightSweepInput {
  /** Days with a valid table, in date order. Days flagged unbalanced are read but never changed. */
  days: readonly DayContext[];
  /** First and last calendar day of the dataset, including days that failed validation. */
  range: { start: string; end: string };
  limits: BalancingLimits;
  log: ProcessingLog;
  /** Re-balances a day after an oversight entry was written to it. */
  rebalance: (ctx: DayContext) => void;
}

export interface OversightInjection {
  date: string;
  individual: string;
  provider: string;
  /** Last day of the window that had no qualifying entry. */
  windowEnd: string;
}

/**
 * Ensures every individual has an oversight entry in each rolling window.
 *
 * Windows are calendar based and only checked when fully inside the
 * dataset. They are walked in order per individual; a window without a
 * qualifying entry gets one on its latest day that may still be changed, so
 * that the following overlapping windows are covered by the same entry.
 */
export function sweepOversight(input: OversightSweepInput): OversightInjection[] {
  const { days, range, limits, log } = input;
  const windowDays = limits.oversightWindowDays;
  const injections: OversightInjection[] = [];

  if (daysBetween(range.start, range.end) + 1 < windowDays) {
    log.info(
      `Dataset spans fewer than ${windowDays} days; oversight windows not checked`,
    );
    return injections;
  }

  const byDate = new Map(days.map((ctx) => [ctx.date, ctx]));
  for (const ctx of days) {
    if (!ctx.unbalanced) ctx.phase = "oversight-check";
  }

  const individuals = [...new Set(days.flatMap((ctx) => ctx.table.individuals))].toSorted(
    compareIds,
  );

  for (const individual of individuals) {
    for (
      let windowEnd = addDays(range.start, windowDays - 1);
      windowEnd <= range.end;
      windowEnd = addDays(windowEnd, 1)
    ) {
      const windowStart = addDays(windowEnd, -(windowDays - 1));
      const members = generateDayRange(windowStart, windowEnd)
        .map((date) => byDate.get(date))
        .filter((ctx): ctx is DayContext => ctx?.table.individuals.includes(individual) ?? false);
      if (members.length === 0) continue;

      const covered = members.some((ctx) =>
        ctx.table.providers().some((provider) => ctx.isOversightEntry(provider, individual)),
      );
      if (covered) continue;

      const injection = injectLatest(members, individual, windowEnd);
      if (!injection) {
        log.warn(
          `No day between ${windowStart} and ${windowEnd} can take an oversight entry for ${individual}`,
          { individual },
        );
        continue;
      }

      injections.push(injection.record);
      input.rebalance(injection.ctx);
    }
  }

  return injections;
}

/** Tries the window's days latest first, skipping days flagged unbalanced. */
function injectLatest(
  members: readonly DayContext[],
  individual: string,
  windowEnd: string,
): { ctx: DayContext; record: OversightInjection } | undefined {
  for (let i = members.length - 1; i >= 0; i--) {
    const ctx = members[i];
    if (!ctx || ctx.unbalanced) continue;
    const provider = injectOversight(ctx, individual);
    if (provider !== undefined) {
      return { ctx, record: { date: ctx.date, individual, provider, windowEnd } };
    }
  }
  return undefined;
}

/**
 * Writes an oversight entry for the individual on the given day and returns
 * the provider used, or `undefined` when no oversight provider can take it.
 *
 * Candidates, in configured order within each group:
 *
 * 1. a provider already on the day whose total stays within the cap
 * 2. a provider not yet on the day
 * 3. a provider already on the day whose protected entries, plus the new
 *    one, stay within the cap; its other hours are cut by the core passes
 * 4. the same, measured against the escalated cap
 *
 * Protected entries are the provider's other oversight entries, counted at
 * the quota they may not be reduced below.
 */
export function injectOversight(ctx: DayContext, individual: string): string | undefined {
  const { table, catalog, limits } = ctx;
  const quota = limits.oversightHours;
  const present = catalog.oversightProviders.filter((p) => table.hasProvider(p));

  const currentLoad = (provider: string) =>
    table.getProviderTotal(provider) - table.getHours(provider, individual);
  const protectedLoad = (provider: string) =>
    table.individuals
      .filter((other) => other !== individual)
      .reduce((sum, other) => sum + ctx.reductionFloor(provider, other), 0);
  const fits = (load: number, cap: number) => !exceedsHours(load + quota, cap);

  const provider =
    present.find((p) => fits(currentLoad(p), ctx.effectiveMaxHours)) ??
    catalog.oversightProviders.find((p) => !table.hasProvider(p)) ??
    present.find((p) => fits(protectedLoad(p), ctx.effectiveMaxHours)) ??
    present.find((p) => fits(protectedLoad(p), limits.escalatedMaxHours));
  if (provider === undefined) return undefined;

  ctx.log.info(`Adding ${quota}h oversight entry for ${individual}`, {
    date: ctx.date,
    provider,
    individual,
  });
  ctx.setHours(provider, individual, quota, "oversight");
  return provider;
}
