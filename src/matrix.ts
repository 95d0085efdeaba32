/**
 * Daily matrix export: a presentation-neutral row model of the balanced
 * schedule.
 *
 * Each day becomes a block of rows: the date, a header, one row per provider,
 * the per-individual totals, the pending hours, and a blank separator.
 * Computed cells carry their spreadsheet formula next to the value, and
 * changed cells carry the {@link ChangeCategory} of their latest change. How
 * a category is styled is up to the renderer.
 *
 * @example
 * ```typescript
 * const rows = buildDailyMatrix(result.days, { changes: result.changes });
 * rows[2].cells.at(-1); // { value: 16, formula: "=SUM(B3:D3)" }
 * ```
 *
 * @module
 */

import type { ChangeCategory, ChangeRecord } from "./balancer/change-log.types.js";
import { roundHours } from "./balancer/utils.js";
import { formatDisplayDate } from "./datetime.utils.js";
import type { ScheduleDay } from "./types.js";

// ============================================================================
// Types
// ============================================================================

/**
 * @category Matrix
 */
export interface MatrixCell {
  value: string | number | null;
  /** Spreadsheet formula that computes the value, for computed cells. */
  formula?: string;
  category?: ChangeCategory;
}

export type MatrixRowKind = "date" | "header" | "provider" | "totals" | "pending" | "blank";

/**
 * @category Matrix
 */
export interface MatrixRow {
  kind: MatrixRowKind;
  /** 1-based sheet row number the formulas refer to. */
  row: number;
  date: string;
  /** Cells from column A onwards. */
  cells: MatrixCell[];
}

export interface DailyMatrixOptions {
  /** Change log of the run; used to tag changed cells. */
  changes?: readonly ChangeRecord[];
  /** Daily target used in the pending formulas. Defaults to 24. */
  targetHours?: number;
  /** Sheet row of the first date row. Defaults to 1. */
  startRow?: number;
}

export const MATRIX_LABELS = {
  provider: "Service Provider",
  providerTotal: "Provider Total",
  individualTotal: "Total hours for individual",
  pending: "Total hrs pending in a 24hr period",
} as const;

// ============================================================================
// Builder
// ============================================================================

/**
 * Builds the daily matrix rows for a list of days, in the order given.
 *
 * @category Matrix
 */
export function buildDailyMatrix(
  days: readonly ScheduleDay[],
  options: DailyMatrixOptions = {},
): MatrixRow[] {
  const targetHours = options.targetHours ?? 24;
  const tags = indexCategories(options.changes ?? []);
  const rows: MatrixRow[] = [];
  let row = options.startRow ?? 1;

  for (const day of days) {
    const { date, individuals } = day;
    const firstColumn = columnLetter(2);
    const lastColumn = columnLetter(individuals.length + 1);

    rows.push({
      kind: "date",
      row: row++,
      date,
      cells: [
        withCategory(
          { value: formatDisplayDate(date) },
          day.unbalanced || tags.unbalanced.has(date) ? "unbalanced-day" : undefined,
        ),
      ],
    });

    rows.push({
      kind: "header",
      row: row++,
      date,
      cells: [
        { value: MATRIX_LABELS.provider },
        ...individuals.map((individual): MatrixCell => ({ value: individual })),
        { value: MATRIX_LABELS.providerTotal },
      ],
    });

    const providerStart = row;
    for (const { provider, hours } of day.providers) {
      const values = individuals.map((individual) => hours[individual] ?? 0);
      rows.push({
        kind: "provider",
        row,
        date,
        cells: [
          withCategory({ value: provider }, tags.providers.get(`${date}\u0000${provider}`)),
          ...individuals.map((individual, i) =>
            withCategory(
              { value: formatDuration(values[i] ?? 0) },
              tags.cells.get(`${date}\u0000${provider}\u0000${individual}`),
            ),
          ),
          {
            value: formatDuration(sum(values)),
            formula: `=SUM(${firstColumn}${row}:${lastColumn}${row})`,
          },
        ],
      });
      row++;
    }
    const providerEnd = row - 1;

    const totals = individuals.map((individual) =>
      sum(day.providers.map((entry) => entry.hours[individual] ?? 0)),
    );
    const totalsRow = row++;
    rows.push({
      kind: "totals",
      row: totalsRow,
      date,
      cells: [
        { value: MATRIX_LABELS.individualTotal },
        ...totals.map((total, i): MatrixCell => {
          // No provider rows: a range would end above its start and include this cell.
          if (providerEnd < providerStart) return { value: formatDuration(total) };
          const column = columnLetter(i + 2);
          return {
            value: formatDuration(total),
            formula: `=SUM(${column}${providerStart}:${column}${providerEnd})`,
          };
        }),
      ],
    });

    rows.push({
      kind: "pending",
      row: row++,
      date,
      cells: [
        { value: MATRIX_LABELS.pending },
        ...totals.map(
          (total, i): MatrixCell => ({
            value: formatDuration(targetHours - total),
            formula: `=${targetHours} - ${columnLetter(i + 2)}${totalsRow}`,
          }),
        ),
      ],
    });

    rows.push({ kind: "blank", row: row++, date, cells: [] });
  }

  return rows;
}

// ============================================================================
// Formatting helpers
// ============================================================================

/**
 * Whole hours as a number, anything else as `H:MM` (rounded to the minute).
 *
 * @example
 * ```typescript
 * formatDuration(8);    // 8
 * formatDuration(1.5);  // "1:30"
 * formatDuration(-0.25); // "-0:15"
 * ```
 */
export function formatDuration(hours: number): number | string {
  const totalMinutes = Math.round(Math.abs(hours) * 60);
  const sign = hours < 0 && totalMinutes > 0 ? -1 : 1;
  const whole = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  if (minutes === 0) return sign * whole;
  return `${sign < 0 ? "-" : ""}${whole}:${minutes.toString().padStart(2, "0")}`;
}

/**
 * Spreadsheet column letter for a 1-based column index (1 → A, 27 → AA).
 */
export function columnLetter(index: number): string {
  let letters = "";
  let n = index;
  while (n > 0) {
    const remainder = (n - 1) % 26;
    letters = String.fromCharCode(65 + remainder) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

// ============================================================================
// Internal
// ============================================================================

interface CategoryIndex {
  cells: Map<string, ChangeCategory>;
  providers: Map<string, ChangeCategory>;
  unbalanced: Set<string>;
}

function indexCategories(changes: readonly ChangeRecord[]): CategoryIndex {
  const index: CategoryIndex = { cells: new Map(), providers: new Map(), unbalanced: new Set() };
  for (const record of changes) {
    switch (record.field) {
      case "hours":
        index.cells.set(
          `${record.date}\u0000${record.provider}\u0000${record.individual}`,
          record.category,
        );
        break;
      case "provider":
        index.providers.set(`${record.date}\u0000${record.provider}`, record.category);
        break;
      case "unbalanced":
        index.unbalanced.add(record.date);
        break;
      case "effective-max-hours":
        break;
    }
  }
  return index;
}

function withCategory(cell: MatrixCell, category: ChangeCategory | undefined): MatrixCell {
  return category ? { ...cell, category } : cell;
}

function sum(values: readonly number[]): number {
  return roundHours(values.reduce((acc, value) => acc + value, 0));
}
