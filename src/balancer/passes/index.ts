export { createCapEscalationPass } from "./cap-escalation.js";
export { createCapRepairPass } from "./cap-repair.js";
export { createGapFillPass } from "./gap-fill.js";
export { createNonzeroModificationPass } from "./nonzero-modification.js";
export { injectOversight, sweepOversight } from "./oversight.js";
export type { OversightInjection, OversightSweepInput } from "./oversight.js";
export { PASS_NAMES } from "./passes.types.js";
export type { BalancingPass, BalancingPassFactories, PassName } from "./passes.types.js";
export { builtInPassFactories, createCorePasses, createLadderPasses } from "./registry.js";
export { createSecondaryInjectionPass } from "./secondary-injection.js";
export { createSurplusTrimPass } from "./surplus-trim.js";
