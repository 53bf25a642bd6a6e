/**
 * Error types shared by swap detection and price resolution.
 *
 * Record-level problems are skipped and logged, batch-level problems abort
 * the batch. Neither "no trade in this transaction" nor "price unavailable"
 * is an error: the first is an empty result, the second a quote provenance.
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
 * A single transfer or transaction record is unusable. The record is skipped.
 */
export class MalformedInputError extends DomainError {
  readonly code = 'MALFORMED_INPUT';
  readonly severity = 'warning' as const;

  constructor(
    message: string,
    public readonly record: 'transaction' | 'transfer',
    context?: DomainErrorContext
  ) {
    super(message, context);
  }
}

/**
 * A collaborator (transaction source, dump reader) failed for a whole
 * chain/address batch. Trades already produced for the batch stay valid.
 */
export class UpstreamFetchError extends DomainError {
  readonly code = 'UPSTREAM_FETCH_FAILED';
  readonly severity = 'error' as const;

  constructor(
    message: string,
    public readonly chain: string,
    public readonly address: string,
    context?: DomainErrorContext & { cause?: Error | undefined }
  ) {
    super(message, context);
    if (context?.cause) {
      this.cause = context.cause;
    }
  }
}
