import { describe, expect, it } from "vitest";
import {
  formatLogEntry,
  ProcessingLogImpl,
  type LogEntry,
} from "../../src/balancer/processing-log.js";

describe("ProcessingLogImpl", () => {
  it("should record entries with their context in order", () => {
    const log = new ProcessingLogImpl();
    log.info("Balancing 2 days");
    log.warn("Cap exceeded", { date: "2025-07-01", provider: "A" });

    expect(log.getEntries()).toEqual([
      { sequence: 1, level: "info", message: "Balancing 2 days" },
      { sequence: 2, level: "warn", message: "Cap exceeded", date: "2025-07-01", provider: "A" },
    ]);
    expect(log.getEntriesForDay("2025-07-01")).toHaveLength(1);
    expect(log.hasErrors()).toBe(false);
  });

  it("should forward entries to the sink and honour the minimum level", () => {
    const seen: LogEntry[] = [];
    const log = new ProcessingLogImpl({ minLevel: "warn", onEntry: (entry) => seen.push(entry) });
    log.info("dropped");
    log.error("Invalid day", { date: "2025-07-02" });

    expect(seen.map((entry) => entry.message)).toEqual(["Invalid day"]);
    expect(log.hasErrors()).toBe(true);
  });
});

describe("formatLogEntry", () => {
  it("should prefix the level and scope", () => {
    expect(
      formatLogEntry({
        sequence: 1,
        level: "warn",
        message: "2h above the 16h cap remain in oversight entries",
        date: "2025-07-01",
        provider: "Morgan Hale, RN/House Manager",
      }),
    ).toBe(
      "[warn] 2025-07-01 Morgan Hale, RN/House Manager: 2h above the 16h cap remain in oversight entries",
    );
  });

  it("should omit an empty scope", () => {
    expect(formatLogEntry({ sequence: 1, level: "info", message: "Done" })).toBe("[info] Done");
  });
});
