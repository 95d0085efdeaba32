/**
 * Error types raised by the balancer.
 *
 * Unbalanceable days are never errors: they end as an `unbalanced` annotation
 * and a {@link BalanceFailure} record. Errors are reserved for input the
 * balancer cannot reason about at all.
 *
 * @category Errors
 */

// ============================================================================
// Error Codes
// ============================================================================

export const BalancingErrorCode = {
  /** Malformed or missing source data for a single day. */
  DATA_ERROR: "DATA_ERROR",
  /** Invalid provider catalog or limits; fatal for the whole run. */
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
} as const;

export type BalancingErrorCode = (typeof BalancingErrorCode)[keyof typeof BalancingErrorCode];

// ============================================================================
// Base Class
// ============================================================================

export class BalancingError extends Error {
  readonly code: BalancingErrorCode;

  constructor(code: BalancingErrorCode, message: string) {
    super(message);
    this.name = "BalancingError";
    this.code = code;
  }
}

// ============================================================================
// Data errors
// ============================================================================

/**
 * Where in the schedule a data error was found.
 */
export interface DataErrorContext {
  /** Day (YYYY-MM-DD) the malformed data belongs to. */
  date: string;
  provider?: string;
  individual?: string;
}

/**
 * Malformed or missing source data: a day without individuals, negative or
 * missing hours, a duplicated provider row.
 *
 * Raised while a day's table is built. The orchestrator catches it, skips
 * that day, and keeps processing the rest of the dataset.
 *
 * @category Errors
 */
export class DataError extends BalancingError {
  public readonly date: string;
  public readonly provider: string | undefined;
  public readonly individual: string | undefined;

  constructor(message: string, context: DataErrorContext) {
    super(BalancingErrorCode.DATA_ERROR, message);
    this.name = "DataError";
    this.date = context.date;
    this.provider = context.provider;
    this.individual = context.individual;
  }
}

// ============================================================================
// Configuration errors
// ============================================================================

/**
 * The provider catalog or balancing limits are invalid, e.g. no oversight
 * providers are configured, so the weekly oversight check cannot run.
 *
 * @category Errors
 */
export class ConfigurationError extends BalancingError {
  /** Dotted path of the offending configuration field, when known. */
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(BalancingErrorCode.CONFIGURATION_ERROR, message);
    this.name = "ConfigurationError";
    this.field = field;
  }
}
