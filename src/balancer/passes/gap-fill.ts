import type { DayContext } from "../day-context.js";
import { belowHours, isPositiveHours, isZeroHours, roundHours } from "../utils.js";
import type { BalancingPass } from "./passes.types.js";

/**
 * Fills pending hours from supplemental providers.
 *
 * Individuals are served in ascending id order; when two of them compete for
 * the same supplemental provider, the first one served takes the capacity.
 * For each individual:
 *
 * 1. existing supplemental rows with no hours for the individual are raised,
 *    in roster order, by `min(pending, cap - providerTotal)`
 * 2. supplemental providers not yet on the day get a new row, in roster
 *    order, with `min(pending, cap)`
 *
 * A row is only used when the provider's resulting total reaches `minHours`.
 */
export function createGapFillPass(): BalancingPass {
  return {
    name: "gap-fill",
    phase: "gap-fill",
    run(ctx) {
      let progress = false;
      for (const individual of ctx.table.sortedIndividuals()) {
        if (fillIndividual(ctx, individual)) progress = true;
      }
      return progress;
    },
  };
}

function fillIndividual(ctx: DayContext, individual: string): boolean {
  const { table, catalog, limits } = ctx;
  let pending = table.getIndividualPending(individual);
  if (!isPositiveHours(pending)) return false;

  let progress = false;

  // Zero-hour cells on supplemental rows already present.
  for (const provider of catalog.supplementalProviders) {
    if (!isPositiveHours(pending)) break;
    if (!table.hasProvider(provider)) continue;
    if (!isZeroHours(table.getHours(provider, individual))) continue;

    const total = table.getProviderTotal(provider);
    const amount = roundHours(Math.min(pending, ctx.headroom(provider)));
    if (!isPositiveHours(amount) || belowHours(total + amount, limits.minHours)) continue;

    ctx.setHours(provider, individual, amount, "gap-fill");
    pending = roundHours(pending - amount);
    progress = true;
  }

  // New supplemental rows.
  for (const provider of catalog.supplementalProviders) {
    if (!isPositiveHours(pending)) break;
    if (table.hasProvider(provider)) continue;

    const amount = roundHours(Math.min(pending, ctx.effectiveMaxHours));
    if (belowHours(amount, limits.minHours)) continue;

    ctx.log.info(`Adding ${amount}h from supplemental provider for ${individual}`, {
      date: ctx.date,
      provider,
      individual,
    });
    ctx.setHours(provider, individual, amount, "gap-fill");
    pending = roundHours(pending - amount);
    progress = true;
  }

  return progress;
}
