import type { DayContext, DayPhase } from "./day-context.js";
import type { BalancingPass, BalancingPassFactories } from "./passes/passes.types.js";
import { builtInPassFactories, createCorePasses, createLadderPasses } from "./passes/registry.js";
import { MAX_CORE_ITERATIONS } from "./utils.js";

export interface BalancingEngineOptions {
  /** Replaces built-in passes by name. */
  passes?: Partial<BalancingPassFactories>;
  /** Bound on fixpoint iterations. Defaults to {@link MAX_CORE_ITERATIONS}. */
  maxIterations?: number;
}

/**
 * Drives one day through the balancing state machine.
 *
 * The engine owns the pass order; the passes own the repairs. The
 * dataset-level oversight sweep runs between {@link runCorePasses} and
 * {@link runLadder} and is driven by the orchestrator.
 *
 * @category Balancing
 */
export class BalancingEngine {
  readonly #core: BalancingPass[];
  readonly #ladder: BalancingPass[];
  readonly #maxIterations: number;

  constructor(options: BalancingEngineOptions = {}) {
    const factories: BalancingPassFactories = { ...builtInPassFactories, ...options.passes };
    this.#core = createCorePasses(factories);
    this.#ladder = createLadderPasses(factories);
    this.#maxIterations = options.maxIterations ?? MAX_CORE_ITERATIONS;
  }

  /**
   * Runs cap repair, surplus trim and gap fill until none of them changes
   * the day. Returns whether anything changed.
   */
  runCorePasses(ctx: DayContext): boolean {
    return this.#fixpoint(ctx, this.#core);
  }

  /**
   * Applies the exception ladder to a day that the core passes could not
   * satisfy, then settles its final phase.
   *
   * Each ladder step that changes the day is followed by the core passes and
   * the earlier steps until the day stops changing. When every step is
   * exhausted and the day is still unsatisfied, it is flagged unbalanced.
   */
  runLadder(ctx: DayContext): DayPhase {
    if (ctx.unbalanced) return (ctx.phase = "unbalanced");

    for (let step = 0; step < this.#ladder.length; step++) {
      if (ctx.evaluate().satisfied) break;
      const pass = this.#ladder[step];
      if (!pass || !this.#runPass(ctx, pass)) continue;
      this.#fixpoint(ctx, [...this.#core, ...this.#ladder.slice(0, step + 1)]);
    }

    if (ctx.evaluate().satisfied) return (ctx.phase = "balanced");
    flagUnbalanced(ctx);
    return ctx.phase;
  }

  /** Core passes followed by the ladder. */
  balanceDay(ctx: DayContext): DayPhase {
    this.runCorePasses(ctx);
    return this.runLadder(ctx);
  }

  #fixpoint(ctx: DayContext, passes: readonly BalancingPass[]): boolean {
    if (ctx.unbalanced) return false;

    let changed = false;
    for (let iteration = 0; iteration < this.#maxIterations; iteration++) {
      let progress = false;
      for (const pass of passes) {
        if (this.#runPass(ctx, pass)) progress = true;
      }
      if (!progress) return changed;
      changed = true;
    }

    ctx.warnOnce(
      "fixpoint",
      `Passes still changing the day after ${this.#maxIterations} iterations`,
    );
    return changed;
  }

  #runPass(ctx: DayContext, pass: BalancingPass): boolean {
    ctx.phase = pass.phase;
    return pass.run(ctx);
  }
}

/**
 * Marks a day unbalanced. Terminal: no pass touches the day afterwards.
 */
export function flagUnbalanced(ctx: DayContext): void {
  if (ctx.unbalanced) return;
  ctx.unbalanced = true;
  ctx.phase = "unbalanced";
  ctx.changes.recordUnbalanced(ctx.date);

  const report = ctx.evaluate();
  const pending = report.individuals
    .filter((i) => i.pending !== 0)
    .map((i) => `${i.individual} ${i.pending}h`);
  const violations = report.providers
    .filter((p) => p.overCap || p.underMin)
    .map((p) => `${p.provider} ${p.total}h`);
  ctx.log.warn(
    [
      "Day could not be balanced",
      pending.length > 0 ? `pending: ${pending.join(", ")}` : "",
      violations.length > 0 ? `providers out of bounds: ${violations.join(", ")}` : "",
    ]
      .filter(Boolean)
      .join("; "),
    { date: ctx.date },
  );
}
