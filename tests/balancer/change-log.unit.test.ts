import { describe, expect, it } from "vitest";
import {
  ChangeLogImpl,
  classifyHoursChange,
  summarizeChanges,
} from "../../src/balancer/change-log.js";

describe("classifyHoursChange", () => {
  it("should classify zero to positive as an addition", () => {
    expect(classifyHoursChange(0, 4)).toBe("new-or-zero-to-positive");
  });

  it("should classify reductions and non-zero increases as modifications", () => {
    expect(classifyHoursChange(4, 0)).toBe("reduced-or-modified-nonzero");
    expect(classifyHoursChange(4, 6)).toBe("reduced-or-modified-nonzero");
  });
});

describe("ChangeLogImpl", () => {
  it("should number records across the run with deterministic ids", () => {
    const log = new ChangeLogImpl();
    const added = log.recordProviderAdded({
      date: "2025-07-01",
      provider: "Morgan Hale, RN/House Manager",
      reason: "gap-fill",
    });
    const hours = log.recordHoursChange({
      date: "2025-07-01",
      provider: "Morgan Hale, RN/House Manager",
      individual: "OT",
      oldValue: 0,
      newValue: 8,
      reason: "gap-fill",
    });
    const flag = log.recordUnbalanced("2025-07-02");

    expect(added).toMatchObject({
      id: "change:2025-07-01:1",
      sequence: 1,
      field: "provider",
      category: "new-provider-name",
      individual: null,
    });
    expect(hours).toMatchObject({
      id: "change:2025-07-01:2",
      category: "new-or-zero-to-positive",
      oldValue: 0,
      newValue: 8,
    });
    expect(flag).toMatchObject({
      id: "change:2025-07-02:3",
      field: "unbalanced",
      category: "unbalanced-day",
      reason: "flag-unbalanced",
      oldValue: false,
      newValue: true,
    });
  });

  it("should classify cap escalation as a modification", () => {
    const log = new ChangeLogImpl();
    expect(log.recordCapEscalation({ date: "2025-07-01", oldValue: 16, newValue: 18 })).toMatchObject({
      field: "effective-max-hours",
      reason: "cap-escalation",
      category: "reduced-or-modified-nonzero",
    });
  });

  it("should freeze records and return copies of the log", () => {
    const log = new ChangeLogImpl();
    const record = log.recordUnbalanced("2025-07-01");

    expect(Object.isFrozen(record)).toBe(true);
    const records = log.getRecords();
    expect(records).toHaveLength(1);
    expect(records).not.toBe(log.getRecords());
  });

  it("should filter records by day", () => {
    const log = new ChangeLogImpl();
    log.recordUnbalanced("2025-07-01");
    log.recordUnbalanced("2025-07-02");
    expect(log.getRecordsForDay("2025-07-02").map((r) => r.id)).toEqual(["change:2025-07-02:2"]);
  });
});

describe("summarizeChanges", () => {
  it("should count per category per day and overall", () => {
    const log = new ChangeLogImpl();
    log.recordHoursChange({
      date: "2025-07-02",
      provider: "A",
      individual: "DD",
      oldValue: 20,
      newValue: 16,
      reason: "cap-repair",
    });
    log.recordProviderAdded({ date: "2025-07-02", provider: "B", reason: "gap-fill" });
    log.recordHoursChange({
      date: "2025-07-02",
      provider: "B",
      individual: "DD",
      oldValue: 0,
      newValue: 4,
      reason: "gap-fill",
    });
    log.recordUnbalanced("2025-07-01");

    const summary = summarizeChanges(log.getRecords(), { dates: ["2025-07-03"] });

    expect(summary.total).toBe(4);
    expect(summary.counts).toEqual({
      "unbalanced-day": 1,
      "new-or-zero-to-positive": 1,
      "reduced-or-modified-nonzero": 1,
      "new-provider-name": 1,
    });
    expect(summary.unbalancedDays).toEqual(["2025-07-01"]);
    expect(summary.days.map((d) => [d.date, d.total, d.unbalanced])).toEqual([
      ["2025-07-01", 1, true],
      ["2025-07-02", 3, false],
      ["2025-07-03", 0, false],
    ]);
  });

  it("should include days flagged before the run", () => {
    const summary = summarizeChanges([], { unbalancedDays: ["2025-07-05"] });
    expect(summary.unbalancedDays).toEqual(["2025-07-05"]);
    expect(summary.days).toEqual([
      {
        date: "2025-07-05",
        counts: {
          "unbalanced-day": 0,
          "new-or-zero-to-positive": 0,
          "reduced-or-modified-nonzero": 0,
          "new-provider-name": 0,
        },
        total: 0,
        unbalanced: true,
      },
    ]);
  });
});
