/**
 * Error sanitization utilities for safe logging
 */

import { isResearchError } from '@research-desk/contracts';

/**
 * Reduces an error to the fields safe to log. Stack traces are included in
 * development or when explicitly requested; pipeline errors keep their code.
 */
export function sanitizeError(
  error: unknown,
  includeStack = false,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const isDevelopment = env['NODE_ENV'] === 'development';

  if (error instanceof Error) {
    const sanitized: Record<string, unknown> = {
      message: error.message,
      name: error.name,
    };

    if (isResearchError(error)) {
      sanitized['code'] = error.code;
    }

    if ((isDevelopment || includeStack) && error.stack) {
      sanitized['stack'] = error.stack;
    }

    return sanitized;
  }

  return {
    message: String(error),
    name: 'Unknown',
  };
}
