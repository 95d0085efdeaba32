import type { DayContext } from "../day-context.js";
import { compareIds, isPositiveHours } from "../utils.js";

export interface ReductionCandidate {
  provider: string;
  individual: string;
  hours: number;
  /** Qualifying oversight entry: reduced last and never below the quota. */
  protected: boolean;
}

/**
 * Orders cells for reduction: unprotected before protected, then the
 * largest value first, then by individual id, then by provider row order.
 */
export function orderForReduction(
  ctx: DayContext,
  cells: readonly { provider: string; individual: string }[],
): ReductionCandidate[] {
  const rowIndex = new Map(ctx.table.providers().map((provider, i) => [provider, i]));
  return cells
    .map(({ provider, individual }) => ({
      provider,
      individual,
      hours: ctx.table.getHours(provider, individual),
      protected: ctx.isOversightEntry(provider, individual),
    }))
    .filter((cell) => isPositiveHours(cell.hours))
    .toSorted((a, b) => {
      if (a.protected !== b.protected) return a.protected ? 1 : -1;
      if (a.hours !== b.hours) return b.hours - a.hours;
      const byIndividual = compareIds(a.individual, b.individual);
      if (byIndividual !== 0) return byIndividual;
      return (rowIndex.get(a.provider) ?? 0) - (rowIndex.get(b.provider) ?? 0);
    });
}
