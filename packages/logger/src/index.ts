/**
 * @fileoverview Public API of @research-desk/logger.
 * Structured logging, request correlation and timing for the research pipeline.
 */

export { createLogger, createChildLogger } from './createLogger.js';

export { attachGlobalHandlers } from './errorHandler.js';

export { redactPII, redactSensitiveFields, isSensitiveKey, standardFields, prettyPrint } from './formats.js';

export {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
} from './request-context.js';

export { startTimer, measureSync, measureAsync } from './perf-timer.js';

export type { Logger, LoggerConfig, LogLevel, LogEntry, ChildLoggerContext } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
