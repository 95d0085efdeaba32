import { describe, expect, it } from "vitest";
import { BalancingEngine, flagUnbalanced } from "../../src/balancer/engine.js";
import type { BalancingPass } from "../../src/balancer/passes/passes.types.js";
import {
  describeChanges,
  HOUSE_MANAGER,
  HOUSE_SUPERVISOR,
  makeContext,
  makeDay,
  rowOf,
} from "./helpers.js";

const DATE = "2025-07-01";

describe("BalancingEngine", () => {
  const engine = new BalancingEngine();

  it("fills an individual's gap from a new supplemental provider", () => {
    const ctx = makeContext(makeDay(DATE, ["OT"], { A: { OT: 10 }, B: { OT: 6 } }));

    expect(engine.balanceDay(ctx)).toBe("balanced");
    expect(rowOf(ctx, HOUSE_MANAGER)).toEqual({ OT: 8 });
    expect(ctx.table.getIndividualPending("OT")).toBe(0);
    expect(ctx.table.getProviderTotal("A") + ctx.table.getProviderTotal("B")).toBe(16);
    expect(ctx.changes.getRecords().map((r) => r.category)).toEqual([
      "new-provider-name",
      "new-or-zero-to-positive",
    ]);
  });

  it("caps an oversized entry and refills the freed hours", () => {
    const ctx = makeContext(makeDay(DATE, ["DD"], { P: { DD: 20 }, Q: { DD: 4 } }));

    expect(engine.balanceDay(ctx)).toBe("balanced");
    expect(describeChanges(ctx)).toEqual([
      "P/DD 20->16 cap-repair",
      `+${HOUSE_MANAGER} gap-fill`,
      `${HOUSE_MANAGER}/DD 0->4 gap-fill`,
    ]);
    expect(ctx.changes.getRecords().map((r) => r.category)).toEqual([
      "reduced-or-modified-nonzero",
      "new-provider-name",
      "new-or-zero-to-positive",
    ]);
  });

  it("flags a day whose demand exceeds every provider at the escalated cap", () => {
    const ctx = makeContext(makeDay(DATE, ["DD"], { P: { DD: 4 } }), {
      catalog: { supplementalProviders: [HOUSE_MANAGER], oversightProviders: [HOUSE_MANAGER] },
      limits: { maxHours: 8, escalatedMaxHours: 9, oversightHours: 8 },
    });

    expect(engine.balanceDay(ctx)).toBe("unbalanced");
    expect(ctx.unbalanced).toBe(true);
    expect(describeChanges(ctx)).toEqual([
      `+${HOUSE_MANAGER} gap-fill`,
      `${HOUSE_MANAGER}/DD 0->8 gap-fill`,
      "P/DD 4->8 nonzero-modification",
      "cap 8->9",
      `${HOUSE_MANAGER}/DD 8->9 nonzero-modification`,
      "P/DD 8->9 nonzero-modification",
      "unbalanced",
    ]);
    expect(ctx.table.getIndividualPending("DD")).toBe(6);

    // Terminal: running again changes nothing.
    expect(engine.balanceDay(ctx)).toBe("unbalanced");
    expect(ctx.changes.getRecords()).toHaveLength(7);
  });

  it("places a residual below the minimum on an active provider with room", () => {
    const ctx = makeContext(
      makeDay(DATE, ["DD", "DM", "OT"], { P1: { DD: 3 }, P4: { DD: 2.5, DM: 11 } }),
    );

    expect(engine.balanceDay(ctx)).toBe("balanced");
    expect(ctx.effectiveMaxHours).toBe(16);
    expect(describeChanges(ctx).at(-1)).toBe("P1/OT 0->7.5 nonzero-modification");
    expect(rowOf(ctx, "P1")).toEqual({ DD: 3, DM: 0, OT: 7.5 });
    expect(ctx.table.getProviderTotal(HOUSE_SUPERVISOR)).toBe(16);
  });

  it("leaves a satisfied day untouched", () => {
    const ctx = makeContext(makeDay(DATE, ["DD"], { A: { DD: 16 }, B: { DD: 8 } }));

    expect(engine.runCorePasses(ctx)).toBe(false);
    expect(engine.runLadder(ctx)).toBe("balanced");
    expect(ctx.changes.getRecords()).toEqual([]);
  });

  it("resolves an under-minimum provider on the ladder", () => {
    const ctx = makeContext(makeDay(DATE, ["DD"], { A: { DD: 1 }, B: { DD: 15 }, C: { DD: 8 } }));

    expect(engine.balanceDay(ctx)).toBe("balanced");
    expect(ctx.effectiveMaxHours).toBe(16);
    expect(ctx.changes.getRecords().map((r) => r.reason)).toEqual([
      "nonzero-modification",
      "nonzero-modification",
    ]);
  });

  it("stops iterating a pass that never settles", () => {
    let runs = 0;
    const restless: BalancingPass = {
      name: "gap-fill",
      phase: "gap-fill",
      run: () => {
        runs++;
        return true;
      },
    };
    const bounded = new BalancingEngine({ passes: { "gap-fill": () => restless }, maxIterations: 3 });
    const ctx = makeContext(makeDay(DATE, ["DD"], { A: { DD: 16 }, B: { DD: 8 } }));

    expect(bounded.runCorePasses(ctx)).toBe(true);
    expect(runs).toBe(3);
    expect(ctx.log.getEntries().map((e) => e.message)).toEqual([
      "Passes still changing the day after 3 iterations",
    ]);
  });
});

describe("flagUnbalanced", () => {
  it("records the flag once and describes what is missing", () => {
    const ctx = makeContext(makeDay(DATE, ["DD"], { A: { DD: 20 } }));

    flagUnbalanced(ctx);
    flagUnbalanced(ctx);

    expect(ctx.phase).toBe("unbalanced");
    expect(describeChanges(ctx)).toEqual(["unbalanced"]);
    expect(ctx.log.getEntries()[0]?.message).toBe(
      "Day could not be balanced; pending: DD 4h; providers out of bounds: A 20h",
    );
  });
});
