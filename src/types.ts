/**
 * Core schedule types shared by the table model, the balancer and the
 * export layer.
 *
 * @packageDocumentation
 */

// ============================================================================
// Schedule table
// ============================================================================

/**
 * One provider row of a day: hours supplied to each individual.
 *
 * @remarks
 * Keys of `hours` are individual ids; individuals missing from the map are
 * treated as 0. A provider whose hours are all zero is an inactive
 * placeholder row and is exempt from the min/max limits.
 *
 * @example
 * ```typescript
 * const entry: ProviderEntry = {
 *   provider: "Jordan Lee, LPN",
 *   hours: { DD: 8, DM: 4, OT: 0 },
 * };
 * ```
 *
 * @category Schedule
 */
export interface ProviderEntry {
  provider: string;
  hours: Record<string, number>;
}

/**
 * A single day of the consolidated dataset.
 *
 * @remarks
 * `effectiveMaxHours` and `unbalanced` are written by the balancer. When a
 * day is fed back in with `unbalanced: true` it is terminal and left as is;
 * an escalated `effectiveMaxHours` is kept so re-runs do not undo it.
 *
 * @category Schedule
 */
export interface ScheduleDay {
  /** Calendar date (YYYY-MM-DD). */
  date: string;
  /** Individuals tracked on this day, in column order. */
  individuals: string[];
  /** Provider rows in display order. */
  providers: ProviderEntry[];
  /** Provider cap in effect for this day. Defaults to the configured max. */
  effectiveMaxHours?: number;
  /** Set when the day could not be reconciled. */
  unbalanced?: boolean;
}

/**
 * Outcome of balancing one day.
 *
 * - `balanced`: every invariant holds
 * - `unbalanced`: the exception ladder was exhausted
 * - `error`: the day's data was malformed and it was skipped
 *
 * @category Schedule
 */
export type DayStatus = "balanced" | "unbalanced" | "error";
