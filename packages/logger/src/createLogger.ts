/**
 * @fileoverview Logger factory for the research pipeline.
 * Creates Winston logger instances with structured fields, secret redaction
 * and console/file transports.
 */

import winston, { format } from 'winston';
import type { ChildLoggerContext, LoggerConfig, Logger } from './types.js';
import { redactPII, standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * JSON output is the default when NODE_ENV is 'production'; otherwise
 * entries are pretty-printed. Sensitive fields are redacted before any
 * other format runs.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: true });
 * logger.info('Report written', { ticker: 'MSFT', count: 2 });
 * ```
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', filePath: './logs/research.log' });
 * const providerLogger = logger.child({ component: 'provider', provider: 'yahoo' });
 * providerLogger.debug('Chart request', { ticker: 'MSFT', range: '2y' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  // Redaction runs before anything else sees the entry
  const baseFormat = format.combine(redactPII(), standardFields);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: json ? format.json() : prettyPrint,
        // stdout is reserved for report output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: format.json(),
        handleExceptions: false,
        handleRejections: false,
      })
    );
  }

  // Winston warns about a logger with no transports; a silent console keeps it quiet
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level,
    format: baseFormat,
    transports,
    // Process exit is handled by attachGlobalHandlers
    exitOnError: false,
  });
}

/**
 * Creates a child logger that stamps the given context onto every entry.
 *
 * @example
 * ```typescript
 * const log = createChildLogger(logger, { component: 'technical', ticker: 'MSFT' });
 * log.info('Indicators computed'); // includes component and ticker
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
