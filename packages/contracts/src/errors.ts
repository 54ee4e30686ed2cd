/**
 * @fileoverview Error taxonomy for the research pipeline.
 *
 * Defines a hierarchy of structured error classes with machine-readable codes
 * and contextual data for logging and caller-side handling.
 *
 * All errors extend ResearchError and include:
 * - Unique error code (string constant)
 * - Structured data payload
 * - ISO timestamp
 *
 * @module @research-desk/contracts/errors
 */

/**
 * Base error class for all research pipeline errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new ResearchError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class ResearchError extends Error {
  /**
   * Machine-readable error code (e.g., 'INSUFFICIENT_DATA').
   */
  readonly code: string;

  /**
   * Structured error data. Format varies by error type.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when the error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'ResearchError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a price series is empty or shorter than an analysis requires.
 *
 * @example
 * ```typescript
 * throw new InsufficientDataError('No price history for ACME', {
 *   required: 1,
 *   received: 0,
 *   ticker: 'ACME',
 * });
 * ```
 */
export class InsufficientDataError extends ResearchError {
  constructor(
    message: string,
    data: { required: number; received: number; ticker?: string; [key: string]: unknown }
  ) {
    super('INSUFFICIENT_DATA', message, data);
    this.name = 'InsufficientDataError';
  }
}

/**
 * Thrown when a price series violates its preconditions (unsorted or
 * duplicate dates, non-finite prices, high below low).
 */
export class InvalidSeriesError extends ResearchError {
  constructor(message: string, data: { index: number; [key: string]: unknown }) {
    super('INVALID_SERIES', message, data);
    this.name = 'InvalidSeriesError';
  }
}

/**
 * Thrown when engine options, application settings or a data table are out
 * of range or malformed.
 */
export class InvalidConfigError extends ResearchError {
  constructor(message: string, data: { field?: string; value?: unknown; [key: string]: unknown }) {
    super('INVALID_CONFIG', message, data);
    this.name = 'InvalidConfigError';
  }
}

/**
 * Thrown when a data provider fails to deliver a usable response.
 *
 * @example
 * ```typescript
 * throw new ProviderError('Yahoo chart request failed', {
 *   provider: 'yahoo',
 *   statusCode: 503,
 * });
 * ```
 */
export class ProviderError extends ResearchError {
  constructor(
    message: string,
    data: { provider: string; statusCode?: number; [key: string]: unknown },
    code: string = 'PROVIDER_ERROR'
  ) {
    super(code, message, data);
    this.name = 'ProviderError';
  }
}

/**
 * Thrown when a data provider's rate limit is exceeded.
 *
 * Indicates temporary throttling; callers should back off before retrying.
 */
export class ProviderRateLimitError extends ProviderError {
  constructor(
    message: string,
    data: { provider: string; retryAfter?: number; [key: string]: unknown }
  ) {
    super(message, { ...data, statusCode: 429 }, 'PROVIDER_RATE_LIMIT');
    this.name = 'ProviderRateLimitError';
  }
}

/**
 * Thrown when a ticker cannot be resolved by a provider.
 *
 * May indicate a typo, a delisted company, or provider-specific naming.
 */
export class SymbolResolutionError extends ResearchError {
  constructor(message: string, data: { ticker: string; provider: string; [key: string]: unknown }) {
    super('SYMBOL_NOT_FOUND', message, data);
    this.name = 'SymbolResolutionError';
  }
}

/**
 * Type guard to check if an error is a ResearchError.
 *
 * @example
 * ```typescript
 * try {
 *   analyzeTechnicals('ACME', bars);
 * } catch (err) {
 *   if (isResearchError(err)) {
 *     logger.warn('Analysis failed', { error_code: err.code });
 *   }
 * }
 * ```
 */
export function isResearchError(error: unknown): error is ResearchError {
  return error instanceof ResearchError;
}

export function isInsufficientDataError(error: unknown): error is InsufficientDataError {
  return error instanceof InsufficientDataError;
}

export function isInvalidSeriesError(error: unknown): error is InvalidSeriesError {
  return error instanceof InvalidSeriesError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export function isProviderRateLimitError(error: unknown): error is ProviderRateLimitError {
  return error instanceof ProviderRateLimitError;
}

export function isSymbolResolutionError(error: unknown): error is SymbolResolutionError {
  return error instanceof SymbolResolutionError;
}
