import type { DayContext } from "../day-context.js";
import { belowHours, isPositiveHours, isZeroHours, roundHours } from "../utils.js";
import type { BalancingPass } from "./passes.types.js";
import { orderForReduction } from "./reduction.js";

/**
 * Removes hours from over-allocated individuals (negative pending).
 *
 * Over-allocation comes from raw data or from an oversight entry injected on
 * top of a full day. Entries are reduced largest first, unprotected before
 * oversight entries. A cut never leaves its provider strictly between zero
 * and `minHours`.
 */
export function createSurplusTrimPass(): BalancingPass {
  return {
    name: "surplus-trim",
    phase: "cap-repair",
    run(ctx) {
      let progress = false;
      for (const individual of ctx.table.sortedIndividuals()) {
        if (trimIndividual(ctx, individual)) progress = true;
      }
      return progress;
    },
  };
}

function trimIndividual(ctx: DayContext, individual: string): boolean {
  const { table, limits } = ctx;
  let surplus = roundHours(-table.getIndividualPending(individual));
  if (!isPositiveHours(surplus)) return false;

  let progress = false;
  const cells = table.providers().map((provider) => ({ provider, individual }));

  for (const cell of orderForReduction(ctx, cells)) {
    const floor = cell.protected ? limits.oversightHours : 0;
    let cut = roundHours(Math.min(surplus, cell.hours - floor));

    const total = table.getProviderTotal(cell.provider);
    const remaining = roundHours(total - cut);
    if (isPositiveHours(remaining) && belowHours(remaining, limits.minHours)) {
      cut = roundHours(total - limits.minHours);
    }
    if (!isPositiveHours(cut)) continue;

    ctx.setHours(cell.provider, individual, cell.hours - cut, "surplus-trim");
    surplus = roundHours(surplus - cut);
    progress = true;
    if (isZeroHours(surplus)) break;
  }

  if (isPositiveHours(surplus)) {
    ctx.warnOnce(
      `surplus-trim:${individual}`,
      `${individual} keeps ${surplus}h above the ${table.targetHours}h target`,
      { individual },
    );
  }
  return progress;
}
