import { createCapEscalationPass } from "./cap-escalation.js";
import { createCapRepairPass } from "./cap-repair.js";
import { createGapFillPass } from "./gap-fill.js";
import { createNonzeroModificationPass } from "./nonzero-modification.js";
import type { BalancingPass, BalancingPassFactories } from "./passes.types.js";
import { createSecondaryInjectionPass } from "./secondary-injection.js";
import { createSurplusTrimPass } from "./surplus-trim.js";

export const builtInPassFactories: BalancingPassFactories = {
  "cap-repair": createCapRepairPass,
  "surplus-trim": createSurplusTrimPass,
  "gap-fill": createGapFillPass,
  "nonzero-modification": createNonzeroModificationPass,
  "cap-escalation": createCapEscalationPass,
  "secondary-injection": createSecondaryInjectionPass,
};

/**
 * Passes iterated to a fixpoint on every day: reductions first, then gap
 * filling.
 */
export function createCorePasses(
  factories: BalancingPassFactories = builtInPassFactories,
): BalancingPass[] {
  return [factories["cap-repair"](), factories["surplus-trim"](), factories["gap-fill"]()];
}

/**
 * The exception ladder, in escalation order. Flagging the day unbalanced is
 * the engine's final step and is not a pass.
 */
export function createLadderPasses(
  factories: BalancingPassFactories = builtInPassFactories,
): BalancingPass[] {
  return [
    factories["nonzero-modification"](),
    factories["cap-escalation"](),
    factories["secondary-injection"](),
  ];
}
