import { isSecondaryEligible } from "../../catalog.js";
import type { DayContext } from "../day-context.js";
import { belowHours, isPositiveHours, roundHours } from "../utils.js";
import type { BalancingPass } from "./passes.types.js";

/**
 * Last repair step: raise or create rows for secondary providers, in
 * configured order, for eligible individuals only.
 */
export function createSecondaryInjectionPass(): BalancingPass {
  return {
    name: "secondary-injection",
    phase: "exception-ladder",
    run(ctx) {
      let progress = false;
      for (const individual of ctx.table.sortedIndividuals()) {
        if (!isSecondaryEligible(ctx.catalog, individual)) continue;
        if (injectFor(ctx, individual)) progress = true;
      }
      return progress;
    },
  };
}

function injectFor(ctx: DayContext, individual: string): boolean {
  const { table, limits } = ctx;
  let pending = table.getIndividualPending(individual);
  let progress = false;

  for (const provider of ctx.catalog.secondaryProviders) {
    if (!isPositiveHours(pending)) break;

    const total = table.getProviderTotal(provider);
    const amount = roundHours(Math.min(pending, ctx.headroom(provider)));
    if (!isPositiveHours(amount) || belowHours(total + amount, limits.minHours)) continue;

    ctx.log.info(`Covering ${amount}h for ${individual} with a secondary provider`, {
      date: ctx.date,
      provider,
      individual,
    });
    ctx.setHours(
      provider,
      individual,
      table.getHours(provider, individual) + amount,
      "secondary-injection",
    );
    pending = roundHours(pending - amount);
    progress = true;
  }
  return progress;
}
