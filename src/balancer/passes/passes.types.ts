import type { DayContext, DayPhase } from "../day-context.js";

/**
 * Names of the built-in balancing passes, in the order they can first run.
 *
 * @category Balancing
 */
export const PASS_NAMES = [
  "cap-repair",
  "surplus-trim",
  "gap-fill",
  "oversight",
  "nonzero-modification",
  "cap-escalation",
  "secondary-injection",
] as const;

export type PassName = (typeof PASS_NAMES)[number];

/**
 * A single repair step over one day.
 *
 * `run` mutates the day through {@link DayContext.setHours} and returns
 * whether it changed anything; the engine iterates passes until none of
 * them makes progress.
 *
 * @category Balancing
 */
export interface BalancingPass {
  readonly name: PassName;
  /** Phase the day is in while this pass runs. */
  readonly phase: DayPhase;
  run(ctx: DayContext): boolean;
}

/**
 * Factory map for the day-level passes. The oversight sweep spans the whole
 * dataset and is driven by the orchestrator instead.
 */
export type BalancingPassFactories = {
  [K in Exclude<PassName, "oversight">]: () => BalancingPass;
};
