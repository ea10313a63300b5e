/**
 * Error hierarchy for share history validation and capital gains calculation
 *
 * Every error carries a stable code and optional structured context so the
 * lenient calculation mode can log it instead of aborting.
 */

export interface DomainErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  transactionId?: string | undefined;
}

/**
 * Base domain error
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly severity: 'error' | 'warning';

  readonly timestamp: string;
  readonly transactionId?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: DomainErrorContext) {
    super(message);
    this.timestamp = new Date().toISOString();
    this.transactionId = context?.transactionId;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
      severity: this.severity,
      timestamp: this.timestamp,
      transactionId: this.transactionId,
    };
  }
}

/**
 * Malformed input records
 */
export class ValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';
  readonly severity = 'error' as const;
}

/**
 * A generic invariant the calculation relies on does not hold, e.g. an order
 * denominated in a currency other than the base reporting currency
 */
export class InvariantViolationError extends DomainError {
  readonly code = 'INVARIANT_VIOLATION';
  readonly severity = 'error' as const;
}

/**
 * The history under-represents acquisitions for a security: a disposal has
 * nothing to match against, or a pool's quantity would become negative
 */
export class IncompleteRecordsError extends DomainError {
  readonly code = 'INCOMPLETE_RECORDS';
  readonly severity = 'error' as const;

  constructor(
    public readonly isin: string,
    public readonly securityName: string,
    detail = 'share quantity cannot be negative',
    context?: DomainErrorContext
  ) {
    super(`Records appear to be incomplete for ${securityName} (${isin}): ${detail}`, context);
  }
}

/**
 * A ticker is used by more than one security
 */
export class AmbiguousTickerError extends DomainError {
  readonly code = 'AMBIGUOUS_TICKER';
  readonly severity = 'error' as const;

  constructor(
    public readonly ticker: string,
    public readonly isins: string[]
  ) {
    super(`Ticker ${ticker} is ambiguous (used on different securities: ${isins.join(', ')})`);
  }
}
