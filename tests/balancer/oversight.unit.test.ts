import { describe, expect, it } from "vitest";
import { resolveLimits } from "../../src/catalog.js";
import { ChangeLogImpl } from "../../src/balancer/change-log.js";
import type { DayContext } from "../../src/balancer/day-context.js";
import { BalancingEngine } from "../../src/balancer/engine.js";
import { injectOversight, sweepOversight } from "../../src/balancer/passes/oversight.js";
import { ProcessingLogImpl } from "../../src/balancer/processing-log.js";
import { generateDayRange } from "../../src/datetime.utils.js";
import type { ScheduleDay } from "../../src/types.js";
import {
  describeChanges,
  HOUSE_MANAGER,
  HOUSE_SUPERVISOR,
  makeContext,
  makeDay,
  PROGRAM_MANAGER,
  rowOf,
} from "./helpers.js";

const limits = resolveLimits();

/** One balanced day per date for DD, with no oversight entries. */
const week = (start: string, end: string): ScheduleDay[] =>
  generateDayRange(start, end).map((date) => makeDay(date, ["DD"], { A: { DD: 16 }, B: { DD: 8 } }));

const sweep = (days: ScheduleDay[], unbalanced: string[] = []) => {
  const changes = new ChangeLogImpl();
  const log = new ProcessingLogImpl();
  const engine = new BalancingEngine();
  const contexts: DayContext[] = days.map((day) =>
    makeContext(day, { changes, log, unbalanced: unbalanced.includes(day.date) }),
  );
  const first = days[0]?.date ?? "";
  const last = days.at(-1)?.date ?? "";
  const injections = sweepOversight({
    days: contexts,
    range: { start: first, end: last },
    limits,
    log,
    rebalance: (ctx) => engine.runCorePasses(ctx),
  });
  return { contexts, injections, log, changes };
};

describe("sweepOversight", () => {
  it("adds an entry on the last day of an uncovered window and rebalances it", () => {
    const { contexts, injections } = sweep(week("2025-07-01", "2025-07-07"));

    expect(injections).toEqual([
      { date: "2025-07-07", individual: "DD", provider: HOUSE_MANAGER, windowEnd: "2025-07-07" },
    ]);
    const last = contexts[6];
    expect(last && describeChanges(last)).toEqual([
      `+${HOUSE_MANAGER} oversight`,
      `${HOUSE_MANAGER}/DD 0->8 oversight`,
      "A/DD 16->8 surplus-trim",
    ]);
    expect(last?.evaluate().satisfied).toBe(true);
  });

  it("accepts an existing entry anywhere in the window", () => {
    const days = week("2025-07-01", "2025-07-08");
    days[1] = makeDay("2025-07-02", ["DD"], { A: { DD: 16 }, [HOUSE_MANAGER]: { DD: 8 } });

    const { injections, changes } = sweep(days);

    expect(injections).toEqual([]);
    expect(changes.getRecords()).toEqual([]);
  });

  it("reuses an injected entry for the following overlapping windows", () => {
    const days = week("2025-07-01", "2025-07-09");
    days[0] = makeDay("2025-07-01", ["DD"], { A: { DD: 16 }, [PROGRAM_MANAGER]: { DD: 8 } });

    const { injections } = sweep(days);

    expect(injections.map((i) => [i.date, i.windowEnd])).toEqual([["2025-07-08", "2025-07-08"]]);
  });

  it("skips days flagged unbalanced", () => {
    const { injections, contexts } = sweep(week("2025-07-01", "2025-07-07"), ["2025-07-07"]);

    expect(injections.map((i) => i.date)).toEqual(["2025-07-06"]);
    expect(contexts[6]?.changes.getRecordsForDay("2025-07-07")).toEqual([]);
  });

  it("warns when no day in the window can be changed", () => {
    const days = week("2025-07-01", "2025-07-07");
    const { injections, log } = sweep(
      days,
      days.map((day) => day.date),
    );

    expect(injections).toEqual([]);
    expect(log.getEntries().map((e) => [e.level, e.message])).toEqual([
      ["warn", "No day between 2025-07-01 and 2025-07-07 can take an oversight entry for DD"],
    ]);
  });

  it("does not check datasets shorter than the window", () => {
    const { injections, log } = sweep(week("2025-07-01", "2025-07-05"));

    expect(injections).toEqual([]);
    expect(log.getEntries()[0]?.message).toBe(
      "Dataset spans fewer than 7 days; oversight windows not checked",
    );
  });

  it("counts calendar days even when some dates are missing", () => {
    const days = week("2025-07-01", "2025-07-08").filter((day) => day.date !== "2025-07-07");

    const { injections } = sweep(days);

    expect(injections.map((i) => [i.date, i.windowEnd])).toEqual([["2025-07-06", "2025-07-07"]]);
  });
  it("spreads several entries on one day across providers that can hold them", () => {
    const day = (date: string) =>
      makeDay(date, ["DD", "DM", "OT"], {
        [PROGRAM_MANAGER]: { DD: 5, DM: 5, OT: 5 },
        A: { DD: 16 },
        B: { DM: 16 },
        C: { OT: 16 },
        D: { DD: 3, DM: 3, OT: 3 },
      });

    const { contexts, injections } = sweep(generateDayRange("2025-07-01", "2025-07-07").map(day));

    expect(injections.map((i) => [i.date, i.individual, i.provider])).toEqual([
      ["2025-07-07", "DD", HOUSE_MANAGER],
      ["2025-07-07", "DM", HOUSE_MANAGER],
      ["2025-07-07", "OT", PROGRAM_MANAGER],
    ]);
    const last = contexts[6];
    if (!last) throw new Error("missing day");
    expect(rowOf(last, HOUSE_MANAGER)).toEqual({ DD: 8, DM: 8, OT: 0 });
    expect(rowOf(last, PROGRAM_MANAGER)).toEqual({ DD: 3, DM: 5, OT: 8 });
    expect(rowOf(last, HOUSE_SUPERVISOR)).toEqual({ DD: 2, DM: 0, OT: 0 });
    expect(last.table.getProviderTotal("C")).toBe(13);
    expect(last.evaluate().satisfied).toBe(true);
  });
});

describe("injectOversight", () => {
  it("uses an oversight provider already on the day when it stays within the cap", () => {
    const ctx = makeContext(
      makeDay("2025-07-01", ["DD", "DM"], { [HOUSE_MANAGER]: { DM: 6 }, A: { DD: 16 } }),
    );

    expect(injectOversight(ctx, "DD")).toBe(HOUSE_MANAGER);
    expect(rowOf(ctx, HOUSE_MANAGER)).toEqual({ DD: 8, DM: 6 });
  });

  it("adds the first absent oversight provider when the present one is full", () => {
    const ctx = makeContext(
      makeDay("2025-07-01", ["DD", "DM"], { [HOUSE_MANAGER]: { DM: 12 }, A: { DD: 16 } }),
    );

    expect(injectOversight(ctx, "DD")).toBe(PROGRAM_MANAGER);
    expect(ctx.table.getHours(PROGRAM_MANAGER, "DD")).toBe(8);
  });

  it("takes a full provider whose other hours can be cut", () => {
    const ctx = makeContext(
      makeDay("2025-07-01", ["DD", "DM"], {
        [HOUSE_MANAGER]: { DM: 12 },
        [PROGRAM_MANAGER]: { DM: 10 },
        A: { DD: 16 },
      }),
    );

    expect(injectOversight(ctx, "DD")).toBe(HOUSE_MANAGER);
  });

  it("passes over a provider whose protected entries leave no room", () => {
    const ctx = makeContext(
      makeDay("2025-07-01", ["DD", "DM", "OT"], {
        [HOUSE_MANAGER]: { DM: 8, OT: 8 },
        [PROGRAM_MANAGER]: { DD: 2, DM: 6, OT: 6 },
      }),
    );

    expect(injectOversight(ctx, "DD")).toBe(PROGRAM_MANAGER);
    expect(rowOf(ctx, PROGRAM_MANAGER)).toEqual({ DD: 8, DM: 6, OT: 6 });
  });

  it("returns undefined and changes nothing when no provider can take the entry", () => {
    const ctx = makeContext(
      makeDay("2025-07-01", ["DD", "DM", "OT"], {
        [HOUSE_MANAGER]: { DM: 8, OT: 8 },
        [PROGRAM_MANAGER]: { DM: 8, OT: 8 },
      }),
    );

    expect(injectOversight(ctx, "DD")).toBeUndefined();
    expect(ctx.changes.getRecords()).toEqual([]);
  });
});
