/**
 * Command types and interfaces
 */

export type OutputFormat = 'text' | 'markdown' | 'json';

/**
 * Base command interface
 */
export interface Command<T = unknown> {
  name: string;
  description: string;
  aliases?: string[];
  execute(args: string[], options: CommandOptions): Promise<CommandResult<T>>;
}

/**
 * Command execution options
 */
export interface CommandOptions {
  format?: OutputFormat;
  verbose?: boolean;
  /** End of the price-history window; defaults to now */
  asOf?: Date;
}

/**
 * Command execution result
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  /** Rendered report, null on failure */
  output: string | null;
  /** Structured result behind the rendered output */
  data?: T;
  error?: Error;
  duration?: number;
  metadata?: Record<string, unknown>;
}
