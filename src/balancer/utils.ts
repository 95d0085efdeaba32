/**
 * Tolerance for hour comparisons. Durations derived from minutes (`m / 60`)
 * are not exact in binary floating point.
 */
export const HOURS_EPSILON = 1e-6;

const HOURS_PRECISION = 1e6;

/**
 * Upper bound on core-pass iterations per day. Each pass only moves a day
 * toward its fixpoint, so this only guards against a misbehaving custom pass.
 */
export const MAX_CORE_ITERATIONS = 25;

/**
 * Rounds hours to six decimals so repeated arithmetic does not drift.
 */
export function roundHours(hours: number): number {
  const rounded = Math.round(hours * HOURS_PRECISION) / HOURS_PRECISION;
  return Object.is(rounded, -0) ? 0 : rounded;
}

export function isZeroHours(hours: number): boolean {
  return Math.abs(hours) <= HOURS_EPSILON;
}

export function isPositiveHours(hours: number): boolean {
  return hours > HOURS_EPSILON;
}

export function exceedsHours(value: number, limit: number): boolean {
  return value - limit > HOURS_EPSILON;
}

export function belowHours(value: number, limit: number): boolean {
  return limit - value > HOURS_EPSILON;
}

/**
 * Deterministic ordering for individual and provider identifiers
 * (code-unit order, independent of locale).
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
