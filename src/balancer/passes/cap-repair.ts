import type { DayContext } from "../day-context.js";
import { exceedsHours, isPositiveHours, isZeroHours, roundHours } from "../utils.js";
import type { BalancingPass } from "./passes.types.js";
import { orderForReduction } from "./reduction.js";

/**
 * Brings every active provider back under the day's cap.
 *
 * Entries are reduced largest first (ties by individual id) until the
 * provider total reaches the cap. Qualifying oversight entries are reduced
 * last and never below the oversight quota. The removed hours become pending
 * for their individuals; gap filling picks them up.
 *
 * Excess that cannot be removed without breaking an oversight entry is left
 * in place and reported as a warning.
 */
export function createCapRepairPass(): BalancingPass {
  return {
    name: "cap-repair",
    phase: "cap-repair",
    run(ctx) {
      let progress = false;
      for (const provider of ctx.table.providers()) {
        if (repairProvider(ctx, provider)) progress = true;
      }
      return progress;
    },
  };
}

function repairProvider(ctx: DayContext, provider: string): boolean {
  const { table } = ctx;
  const total = table.getProviderTotal(provider);
  if (!isPositiveHours(total) || !exceedsHours(total, ctx.effectiveMaxHours)) return false;

  let excess = roundHours(total - ctx.effectiveMaxHours);
  let progress = false;

  const cells = table.individuals.map((individual) => ({ provider, individual }));
  for (const cell of orderForReduction(ctx, cells)) {
    const floor = cell.protected ? ctx.limits.oversightHours : 0;
    const cut = roundHours(Math.min(excess, cell.hours - floor));
    if (!isPositiveHours(cut)) continue;

    ctx.setHours(provider, cell.individual, cell.hours - cut, "cap-repair");
    excess = roundHours(excess - cut);
    progress = true;
    if (isZeroHours(excess)) break;
  }

  if (isPositiveHours(excess)) {
    ctx.warnOnce(
      `cap-repair:${provider}`,
      `${excess}h above the ${ctx.effectiveMaxHours}h cap remain in oversight entries`,
      { provider },
    );
  }
  return progress;
}
