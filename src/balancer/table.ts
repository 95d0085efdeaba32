import { isDayString } from "../datetime.utils.js";
import { DataError } from "../errors.js";
import type { ScheduleDay } from "../types.js";
import { compareIds, isPositiveHours, roundHours } from "./utils.js";

/**
 * Result of a single {@link ScheduleTable.setHours} call.
 */
export interface HoursChange {
  provider: string;
  individual: string;
  oldValue: number;
  newValue: number;
  /** True when the provider row did not exist before this write. */
  created: boolean;
}

/**
 * In-memory provider/individual/hours matrix for one day.
 *
 * Totals and pending hours are derived on every read, so they always reflect
 * the latest write. Each table is independent of every other day.
 */
export class ScheduleTable {
  readonly date: string;
  readonly individuals: readonly string[];
  readonly targetHours: number;

  #rows = new Map<string, Map<string, number>>();
  #individualSet: ReadonlySet<string>;

  constructor(date: string, individuals: readonly string[], targetHours: number) {
    this.date = date;
    this.individuals = [...individuals];
    this.targetHours = targetHours;
    this.#individualSet = new Set(individuals);
  }

  /**
   * Builds a table from a {@link ScheduleDay}, rejecting malformed data.
   *
   * @throws {DataError} For an invalid date, a day without individuals,
   *   duplicated individuals or provider rows, hours for an undeclared
   *   individual, and negative or missing hour values.
   */
  static fromScheduleDay(day: ScheduleDay, targetHours: number): ScheduleTable {
    const { date } = day;
    if (!isDayString(date)) {
      throw new DataError(`Invalid date "${date}"; expected YYYY-MM-DD`, { date });
    }
    if (day.individuals.length === 0) {
      throw new DataError(`No individuals found for ${date}`, { date });
    }

    const seenIndividuals = new Set<string>();
    for (const individual of day.individuals) {
      if (seenIndividuals.has(individual)) {
        throw new DataError(`Individual "${individual}" is listed twice on ${date}`, {
          date,
          individual,
        });
      }
      seenIndividuals.add(individual);
    }

    const table = new ScheduleTable(date, day.individuals, targetHours);

    for (const entry of day.providers) {
      const provider = entry.provider.trim();
      if (!provider) {
        throw new DataError(`Provider row without a name on ${date}`, { date });
      }
      if (table.hasProvider(provider)) {
        throw new DataError(`Duplicate provider row "${provider}" on ${date}`, { date, provider });
      }

      const row = new Map<string, number>(day.individuals.map((individual) => [individual, 0]));
      for (const [individual, value] of Object.entries(entry.hours)) {
        if (!seenIndividuals.has(individual)) {
          throw new DataError(
            `Provider "${provider}" has hours for unknown individual "${individual}" on ${date}`,
            { date, provider, individual },
          );
        }
        assertValidHours(value, { date, provider, individual });
        row.set(individual, roundHours(value));
      }
      table.#rows.set(provider, row);
    }

    return table;
  }

  hasProvider(provider: string): boolean {
    return this.#rows.has(provider);
  }

  /** Provider names in row order. */
  providers(): string[] {
    return [...this.#rows.keys()];
  }

  getHours(provider: string, individual: string): number {
    return this.#rows.get(provider)?.get(individual) ?? 0;
  }

  getProviderTotal(provider: string): number {
    const row = this.#rows.get(provider);
    if (!row) return 0;
    let total = 0;
    for (const hours of row.values()) total += hours;
    return roundHours(total);
  }

  isActive(provider: string): boolean {
    return isPositiveHours(this.getProviderTotal(provider));
  }

  getIndividualTotal(individual: string): number {
    let total = 0;
    for (const row of this.#rows.values()) total += row.get(individual) ?? 0;
    return roundHours(total);
  }

  /**
   * Hours still missing for an individual: positive when under-allocated,
   * negative when over-allocated, zero when satisfied.
   */
  getIndividualPending(individual: string): number {
    return roundHours(this.targetHours - this.getIndividualTotal(individual));
  }

  /** Individuals in ascending id order, the order gap filling serves them in. */
  sortedIndividuals(): string[] {
    return this.individuals.toSorted(compareIds);
  }

  /**
   * Writes one cell, creating the provider row when absent.
   *
   * @throws {DataError} For an unknown individual or a negative or
   *   non-finite value.
   */
  setHours(provider: string, individual: string, value: number): HoursChange {
    if (!this.#individualSet.has(individual)) {
      throw new DataError(`Unknown individual "${individual}" on ${this.date}`, {
        date: this.date,
        provider,
        individual,
      });
    }
    assertValidHours(value, { date: this.date, provider, individual });

    let row = this.#rows.get(provider);
    const created = row === undefined;
    if (!row) {
      row = new Map(this.individuals.map((id) => [id, 0]));
      this.#rows.set(provider, row);
    }

    const oldValue = row.get(individual) ?? 0;
    const newValue = roundHours(value);
    row.set(individual, newValue);

    return { provider, individual, oldValue, newValue, created };
  }

  /** Snapshot of the table as a plain {@link ScheduleDay}. */
  toScheduleDay(): ScheduleDay {
    return {
      date: this.date,
      individuals: [...this.individuals],
      providers: [...this.#rows].map(([provider, row]) => ({
        provider,
        hours: Object.fromEntries(row),
      })),
    };
  }
}

function assertValidHours(
  value: number,
  context: { date: string; provider: string; individual: string },
): void {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new DataError(
      `Missing hours for ${context.individual} / "${context.provider}" on ${context.date}`,
      context,
    );
  }
  if (value < 0) {
    throw new DataError(
      `Negative hours (${value}) for ${context.individual} / "${context.provider}" on ${context.date}`,
      context,
    );
  }
}
