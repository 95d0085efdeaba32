import {
  isSecondaryEligible,
  isSecondaryProvider,
  isSupplementalProvider,
} from "../../catalog.js";
import type { DayContext } from "../day-context.js";
import { belowHours, isPositiveHours, roundHours } from "../utils.js";
import type { BalancingPass } from "./passes.types.js";

/**
 * First step of the exception ladder: change the entries of providers
 * already on the day.
 *
 * - Raises non-zero entries of under-allocated individuals within the cap,
 *   supplemental providers first (least utilized first, then roster order),
 *   then the remaining providers in row order. Hours still pending go to
 *   empty cells of providers already active on the day, roster order first.
 * - Lifts active providers below `minHours` by moving hours to them from
 *   another provider's entry for the same individual. Donor entries keep at
 *   least `minHours` (the oversight quota for oversight entries), so no entry
 *   is reduced to zero.
 */
export function createNonzeroModificationPass(): BalancingPass {
  return {
    name: "nonzero-modification",
    phase: "exception-ladder",
    run(ctx) {
      let progress = false;
      for (const individual of ctx.table.sortedIndividuals()) {
        if (raiseExisting(ctx, individual)) progress = true;
      }
      for (const provider of ctx.table.providers()) {
        if (liftUnderMinimum(ctx, provider)) progress = true;
      }
      return progress;
    },
  };
}

function raiseExisting(ctx: DayContext, individual: string): boolean {
  const { table } = ctx;
  let pending = table.getIndividualPending(individual);
  if (!isPositiveHours(pending)) return false;

  let progress = false;
  for (const provider of raiseOrder(ctx, individual)) {
    if (!isPositiveHours(pending)) break;
    const amount = roundHours(Math.min(pending, ctx.headroom(provider)));
    if (!isPositiveHours(amount)) continue;

    ctx.setHours(
      provider,
      individual,
      table.getHours(provider, individual) + amount,
      "nonzero-modification",
    );
    pending = roundHours(pending - amount);
    progress = true;
  }
  return progress;
}

function raiseOrder(ctx: DayContext, individual: string): string[] {
  const { table, catalog } = ctx;
  const holders = table
    .providers()
    .filter((provider) => isPositiveHours(table.getHours(provider, individual)))
    .filter((provider) => mayCover(ctx, provider, individual));

  const supplemental = catalog.supplementalProviders
    .filter((provider) => holders.includes(provider))
    .toSorted((a, b) => table.getProviderTotal(a) - table.getProviderTotal(b));
  const others = holders.filter((provider) => !isSupplementalProvider(catalog, provider));

  const idle = table
    .providers()
    .filter((provider) => isPositiveHours(table.getProviderTotal(provider)))
    .filter((provider) => !holders.includes(provider))
    .filter((provider) => mayCover(ctx, provider, individual));
  const idleSupplemental = catalog.supplementalProviders.filter((provider) =>
    idle.includes(provider),
  );
  const idleOthers = idle.filter((provider) => !isSupplementalProvider(catalog, provider));

  return [...supplemental, ...others, ...idleSupplemental, ...idleOthers];
}

function liftUnderMinimum(ctx: DayContext, provider: string): boolean {
  const { table, limits } = ctx;
  const total = table.getProviderTotal(provider);
  if (!isPositiveHours(total) || !belowHours(total, limits.minHours)) return false;

  let need = roundHours(limits.minHours - total);
  let progress = false;

  for (const individual of table.sortedIndividuals()) {
    if (!isPositiveHours(need)) break;
    if (!isPositiveHours(table.getHours(provider, individual))) continue;

    for (const donor of table.providers()) {
      if (!isPositiveHours(need)) break;
      if (donor === provider) continue;

      const donorHours = table.getHours(donor, individual);
      const entryFloor = Math.max(limits.minHours, ctx.reductionFloor(donor, individual));
      const give = roundHours(
        Math.min(
          need,
          donorHours - entryFloor,
          table.getProviderTotal(donor) - limits.minHours,
        ),
      );
      if (!isPositiveHours(give)) continue;

      ctx.setHours(donor, individual, donorHours - give, "nonzero-modification");
      ctx.setHours(
        provider,
        individual,
        table.getHours(provider, individual) + give,
        "nonzero-modification",
      );
      need = roundHours(need - give);
      progress = true;
    }
  }

  if (progress) {
    ctx.log.info(`Moved hours to reach the ${limits.minHours}h minimum`, {
      date: ctx.date,
      provider,
    });
  }
  return progress;
}

/** Secondary providers only ever hold hours for eligible individuals. */
function mayCover(ctx: DayContext, provider: string, individual: string): boolean {
  return (
    !isSecondaryProvider(ctx.catalog, provider) || isSecondaryEligible(ctx.catalog, individual)
  );
}
