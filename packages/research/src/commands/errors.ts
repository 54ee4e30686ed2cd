/**
 * Error handling for research commands
 *
 * Provides friendly error messages and structured error codes for
 * command failures.
 */

import {
  InvalidConfigError,
  isInsufficientDataError,
  isInvalidSeriesError,
  isProviderError,
  isResearchError,
  isSymbolResolutionError,
} from '@research-desk/contracts';

/**
 * Research command error codes
 */
export enum ResearchErrorCode {
  /** Invalid command arguments (bad or unknown ticker) */
  INVALID_ARGS = 'INVALID_ARGS',
  /** Configuration error */
  CONFIG_ERROR = 'CONFIG_ERROR',
  /** Market data provider error */
  PROVIDER_ERROR = 'PROVIDER_ERROR',
  /** Indicator computation error */
  ANALYSIS_ERROR = 'ANALYSIS_ERROR',
  /** Output formatting or writing error */
  FORMAT_ERROR = 'FORMAT_ERROR',
  /** Missing required data */
  MISSING_DATA = 'MISSING_DATA',
  /** Internal command error */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Friendly error messages for each error code
 */
export const ERROR_MESSAGES: Record<ResearchErrorCode, string> = {
  [ResearchErrorCode.INVALID_ARGS]: 'Invalid command arguments provided',
  [ResearchErrorCode.CONFIG_ERROR]: 'Invalid configuration',
  [ResearchErrorCode.PROVIDER_ERROR]: 'Failed to fetch market data from provider',
  [ResearchErrorCode.ANALYSIS_ERROR]: 'Technical analysis failed',
  [ResearchErrorCode.FORMAT_ERROR]: 'Failed to format or write output',
  [ResearchErrorCode.MISSING_DATA]: 'Required data not available',
  [ResearchErrorCode.INTERNAL_ERROR]: 'Internal command error',
};

/**
 * Research command error class
 *
 * Extends Error with structured error codes and context.
 */
export class ResearchCommandError extends Error {
  readonly code: ResearchErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: ResearchErrorCode,
    message?: string,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message || ERROR_MESSAGES[code], cause ? { cause } : undefined);

    this.name = 'ResearchCommandError';
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, ResearchCommandError);
  }

  /**
   * Format error for display. The cause's message is always shown; stacks
   * only when verbose.
   */
  format(verbose: boolean = false): string {
    const lines: string[] = [];

    lines.push(`Error: ${this.message}`);
    lines.push(`Code: ${this.code}`);

    if (this.cause instanceof Error) {
      lines.push(`Reason: ${this.cause.message}`);
    }

    if (this.context && Object.keys(this.context).length > 0) {
      lines.push('Context:');
      for (const [key, value] of Object.entries(this.context)) {
        lines.push(`  ${key}: ${JSON.stringify(value)}`);
      }
    }

    if (verbose && this.cause instanceof Error && this.cause.stack) {
      lines.push('Caused by:');
      lines.push(`  ${this.cause.stack}`);
    }

    if (verbose && this.stack) {
      lines.push('Stack trace:');
      lines.push(this.stack);
    }

    return lines.join('\n');
  }

  /**
   * Convert error to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      cause:
        this.cause instanceof Error
          ? {
              name: this.cause.name,
              message: this.cause.message,
            }
          : undefined,
    };
  }
}

/**
 * Pick the command error code for a failure raised below the command layer.
 */
export function classifyError(error: unknown): ResearchErrorCode {
  if (error instanceof ResearchCommandError) return error.code;
  if (isSymbolResolutionError(error)) return ResearchErrorCode.INVALID_ARGS;
  if (isProviderError(error)) return ResearchErrorCode.PROVIDER_ERROR;
  if (isInsufficientDataError(error)) return ResearchErrorCode.MISSING_DATA;
  if (isInvalidSeriesError(error)) return ResearchErrorCode.ANALYSIS_ERROR;
  if (error instanceof InvalidConfigError) return ResearchErrorCode.CONFIG_ERROR;
  return ResearchErrorCode.INTERNAL_ERROR;
}

/**
 * Create a friendly error message from any error
 */
export function formatCommandError(error: unknown, verbose: boolean = false): string {
  if (error instanceof ResearchCommandError) {
    return error.format(verbose);
  }

  if (error instanceof Error) {
    const lines: string[] = [];
    lines.push(`Error: ${error.message}`);

    if (verbose && error.stack) {
      lines.push('Stack trace:');
      lines.push(error.stack);
    }

    return lines.join('\n');
  }

  return `Error: ${String(error)}`;
}

/**
 * Wrap an error with research command error context. Pipeline errors keep
 * their structured data as context.
 */
export function wrapError(
  error: unknown,
  code: ResearchErrorCode = classifyError(error),
  context?: Record<string, unknown>
): ResearchCommandError {
  if (error instanceof ResearchCommandError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const errorContext = context ?? (isResearchError(error) ? error.data : undefined);
  return new ResearchCommandError(code, ERROR_MESSAGES[code], errorContext, cause);
}
