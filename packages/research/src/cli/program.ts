/**
 * Command-line program: option parsing and command dispatch.
 */

import { Command as Program, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import {
  attachGlobalHandlers,
  createLogger,
  withRequestContext,
  type Logger,
  type LogLevel,
} from '@research-desk/logger';
import {
  COMMAND_NAMES,
  createCommands,
  createYahooProvider,
  type CommandName,
  type ResearchServices,
} from '../app.js';
import { formatCommandError } from '../commands/errors.js';
import type { OutputFormat } from '../commands/types.js';
import { loadConfig, type Config } from '../config/index.js';
import { logLevelSchema, reportFormatSchema } from '../config/schema.js';
import { loadSectorBenchmarks } from '../valuation/sector-benchmarks.js';

export type GlobalOptions = {
  format?: OutputFormat;
  out?: string;
  logLevel?: LogLevel;
  verbose?: boolean;
  asOf?: Date;
};

const COMMAND_DESCRIPTIONS: Record<CommandName, { description: string; aliases: string[] }> = {
  technical: {
    description: 'Technical indicators, support/resistance and trend interpretation',
    aliases: ['tech', 'ta'],
  },
  fundamental: { description: 'Valuation ratios, last four quarters and sector comparison', aliases: ['fund', 'fa'] },
  report: { description: 'Write technical and fundamental reports to the output directory', aliases: ['rep'] },
};

export function parseFormat(value: string): OutputFormat {
  const result = reportFormatSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError('Expected one of: text, markdown, json.');
  }
  return result.data;
}

export function parseLogLevel(value: string): LogLevel {
  const result = logLevelSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError('Expected one of: error, warn, info, debug.');
  }
  return result.data;
}

/**
 * Accepts YYYY-MM-DD; the window ends at the close of that UTC day.
 */
export function parseAsOf(value: string): Date {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new InvalidArgumentError('Expected a date as YYYY-MM-DD.');
  }
  const date = new Date(`${value}T23:59:59.999Z`);
  if (Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value) {
    throw new InvalidArgumentError(`Not a calendar date: ${value}.`);
  }
  return date;
}

export type CommandRunner = (name: CommandName, ticker: string, options: GlobalOptions) => Promise<void>;

/**
 * Build the commander program. Each subcommand hands its ticker and the
 * global options to `run`.
 */
export function buildProgram(run: CommandRunner, version = '0.1.0'): Program {
  const program = new Program();

  program
    .name('research-desk')
    .description('Equity research: technical indicators, fundamentals and reports for a ticker')
    .version(version)
    .option('-f, --format <format>', 'Output format (text, markdown, json)', parseFormat)
    .option('-o, --out <dir>', 'Output directory for report files')
    .option('-l, --log-level <level>', 'Log level (error, warn, info, debug)', parseLogLevel)
    .option('-v, --verbose', 'Debug logging and stack traces on errors', false)
    .option('--as-of <date>', 'End of the price history window (YYYY-MM-DD)', parseAsOf);

  for (const name of COMMAND_NAMES) {
    const { description, aliases } = COMMAND_DESCRIPTIONS[name];
    program
      .command(`${name} <ticker>`)
      .aliases(aliases)
      .description(description)
      .action(async (ticker: string) => {
        await run(name, ticker, program.opts<GlobalOptions>());
      });
  }

  return program;
}

export interface RunContext {
  env?: NodeJS.ProcessEnv;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  /** Replaces the logger built from configuration */
  logger?: Logger;
  /** Replaces the Yahoo provider and the bundled benchmark table */
  services?: ResearchServices;
}

function resolveLogLevel(config: Config, options: GlobalOptions): LogLevel {
  if (options.logLevel) return options.logLevel;
  if (options.verbose) return 'debug';
  return config.logging.level;
}

/**
 * Run one command end to end and return the process exit code.
 */
export async function runResearchCommand(
  name: CommandName,
  ticker: string,
  options: GlobalOptions,
  context: RunContext = {}
): Promise<number> {
  const stdout = context.stdout ?? process.stdout;
  const stderr = context.stderr ?? process.stderr;
  const verbose = options.verbose ?? false;

  let config: Config;
  try {
    config = loadConfig(context.env ?? process.env);
  } catch (error) {
    stderr.write(`${chalk.red(formatCommandError(error, verbose))}\n`);
    return 1;
  }

  const logger =
    context.logger ??
    createLogger({
      level: resolveLogLevel(config, options),
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
    });
  const detach = attachGlobalHandlers(logger);

  try {
    const services = context.services ?? defaultServices(config, logger);
    const commands = createCommands(config, logger, services, options.out);

    const result = await withRequestContext(
      () =>
        commands[name].execute([ticker], {
          format: options.format ?? config.report.format,
          verbose,
          asOf: options.asOf,
        }),
      undefined,
      { command: name }
    );

    if (result.success && result.output !== null) {
      stdout.write(`${result.output}\n`);
      return 0;
    }

    stderr.write(`${chalk.red(formatCommandError(result.error, verbose))}\n`);
    return 1;
  } finally {
    detach();
  }
}

function defaultServices(config: Config, logger: Logger): ResearchServices {
  const provider = createYahooProvider(config, logger);
  return {
    priceProvider: provider,
    fundamentalsProvider: provider,
    benchmarks: loadSectorBenchmarks(),
  };
}

/**
 * Parse argv, run the selected command and return the exit code.
 */
export async function main(argv: string[] = process.argv, context: RunContext = {}): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(async (name, ticker, options) => {
    exitCode = await runResearchCommand(name, ticker, options, context);
  });
  await program.parseAsync(argv);
  return exitCode;
}
