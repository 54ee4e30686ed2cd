/**
 * @fileoverview Type definitions for the research logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity that will be written.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env['NODE_ENV'] === 'production',
 *   filePath: './logs/research.log',
 * };
 * ```
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output.
   */
  level: LogLevel;

  /**
   * Machine-readable JSON (true) or human-readable pretty-print (false).
   * @default true when NODE_ENV is 'production'
   */
  json?: boolean;

  /**
   * Optional file path. When set, logs are also appended to this file.
   */
  filePath?: string;

  /**
   * Whether to write to the console.
   * @default true
   */
  console?: boolean;
}

/**
 * Structured log entry with the standard fields used across packages.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;

  /** Ticker under analysis (e.g., "MSFT") */
  ticker?: string;

  /** Request correlation ID, injected from the active request context */
  request_id?: string;

  /** Component or module name (typically from a child logger) */
  component?: string;

  /** Data provider id (e.g., "yahoo") */
  provider?: string;

  /** Operation name (e.g., "technical_analysis") */
  operation?: string;

  duration_ms?: number;

  /** Outcome ("success", "error", "partial") */
  result?: string;

  error_code?: string;

  count?: number;

  [key: string]: unknown;
}

/**
 * Fields a child logger stamps onto every entry.
 */
export interface ChildLoggerContext {
  component?: string;
  ticker?: string;
  provider?: string;
  operation?: string;
  [key: string]: unknown;
}

/**
 * Winston's Logger, re-exported so consumers need not depend on winston.
 */
export type Logger = WinstonLogger;
