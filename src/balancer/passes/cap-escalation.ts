import type { BalancingPass } from "./passes.types.js";

/**
 * Raises the day's provider cap to `escalatedMaxHours`. Applied at most once
 * per day; the engine re-runs the core passes afterwards.
 */
export function createCapEscalationPass(): BalancingPass {
  return {
    name: "cap-escalation",
    phase: "exception-ladder",
    run(ctx) {
      const from = ctx.effectiveMaxHours;
      const to = ctx.limits.escalatedMaxHours;
      if (from >= to) return false;

      ctx.effectiveMaxHours = to;
      ctx.changes.recordCapEscalation({ date: ctx.date, oldValue: from, newValue: to });
      ctx.log.info(`Escalated provider cap from ${from}h to ${to}h`, { date: ctx.date });
      return true;
    },
  };
}
