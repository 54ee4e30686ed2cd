/**
 * Base command class for research commands
 *
 * Implements the template method pattern with shared argument validation,
 * timing, structured logging and error wrapping.
 */

import type { Logger } from '@research-desk/logger';
import { startTimer } from '@research-desk/logger';
import type { Command, CommandOptions, CommandResult } from './types.js';
import { wrapError } from './errors.js';
import { normalizeTicker } from './ticker.js';
import { sanitizeError } from '../utils/error-sanitizer.js';

export interface BaseResearchCommandConfig {
  logger: Logger;
}

/**
 * What a subclass produces on success
 */
export interface CommandOutcome<T> {
  output: string;
  data: T;
  metadata?: Record<string, unknown>;
}

/**
 * Abstract base class for all research commands
 *
 * Subclasses implement executeCommand for a validated, upper-cased ticker.
 * execute never throws: failures come back as `success: false` with a
 * ResearchCommandError.
 */
export abstract class BaseResearchCommand<T> implements Command<T> {
  abstract readonly name: string;
  abstract readonly description: string;
  readonly aliases: string[] = [];

  protected readonly logger: Logger;

  constructor(config: BaseResearchCommandConfig) {
    this.logger = config.logger;
  }

  async execute(args: string[], options: CommandOptions = {}): Promise<CommandResult<T>> {
    const timer = startTimer();
    let ticker: string | undefined;

    try {
      ticker = normalizeTicker(args[0]);

      this.logger.info(`Executing ${this.name} command`, {
        ticker,
        operation: this.name,
        format: options.format ?? 'text',
        asOf: options.asOf?.toISOString(),
      });

      const outcome = await this.executeCommand(ticker, options);
      const duration = timer.stop();

      this.logger.info(`${this.name} command completed`, {
        ticker,
        operation: this.name,
        duration_ms: duration,
        result: 'success',
      });

      return {
        success: true,
        output: outcome.output,
        data: outcome.data,
        duration,
        metadata: {
          command: this.name,
          ticker,
          ...outcome.metadata,
        },
      };
    } catch (error) {
      return this.handleError(error, timer.stop(), ticker, options.verbose);
    }
  }

  /**
   * Execute the command logic for a validated ticker
   */
  protected abstract executeCommand(ticker: string, options: CommandOptions): Promise<CommandOutcome<T>>;

  /**
   * Handle command errors with friendly messages
   */
  protected handleError(
    error: unknown,
    duration: number,
    ticker: string | undefined,
    verbose?: boolean
  ): CommandResult<T> {
    const wrapped = wrapError(error);

    this.logger.error(`${this.name} command failed`, {
      ticker,
      operation: this.name,
      duration_ms: duration,
      result: 'error',
      error_code: wrapped.code,
      error: sanitizeError(error, verbose),
    });

    return {
      success: false,
      output: null,
      error: wrapped,
      duration,
      metadata: {
        command: this.name,
        ticker,
        errorMessage: wrapped.format(verbose),
      },
    };
  }
}
