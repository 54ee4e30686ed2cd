/**
 * Main exports for @research-desk/research package
 */

// Configuration exports
export { loadConfig, getConfigSummary, parseEnvValue, configSchema, envMapping } from './config/index.js';
export type { Config, EnvBinding, EnvValueKind } from './config/index.js';

// Command exports
export { BaseResearchCommand } from './commands/base-research.command.js';
export type { BaseResearchCommandConfig, CommandOutcome } from './commands/base-research.command.js';
export { TechnicalCommand, DEFAULT_LOOKBACK_DAYS } from './commands/technical.command.js';
export type { TechnicalCommandConfig } from './commands/technical.command.js';
export { FundamentalCommand } from './commands/fundamental.command.js';
export type { FundamentalCommandConfig, FundamentalReport } from './commands/fundamental.command.js';
export { ReportCommand, FILE_EXTENSIONS } from './commands/report.command.js';
export type { ReportCommandConfig, ReportArtifacts, ReportFailure } from './commands/report.command.js';
export {
  ResearchCommandError,
  ResearchErrorCode,
  ERROR_MESSAGES,
  classifyError,
  formatCommandError,
  wrapError,
} from './commands/errors.js';
export { normalizeTicker, TICKER_PATTERN } from './commands/ticker.js';
export type { Command, CommandOptions, CommandResult, OutputFormat } from './commands/types.js';

// Wiring
export { COMMAND_NAMES, createCommands, createYahooProvider } from './app.js';
export type { CommandName, ResearchCommands, ResearchServices } from './app.js';
export { buildProgram, main, runResearchCommand, parseAsOf, parseFormat, parseLogLevel } from './cli/program.js';
export type { GlobalOptions, RunContext, CommandRunner } from './cli/program.js';

// Formatters
export { TechnicalFormatter } from './formatters/technical-formatter.js';
export { FundamentalFormatter } from './formatters/fundamental-formatter.js';
export {
  NOT_AVAILABLE,
  formatFixed,
  formatMoney,
  formatPercent,
  formatSignedPercent,
} from './formatters/number-format.js';

// Sector valuation
export {
  DEFAULT_BENCHMARKS_PATH,
  compareRatio,
  compareToSector,
  findSectorBenchmark,
  loadSectorBenchmarks,
  sectorBenchmarksSchema,
} from './valuation/sector-benchmarks.js';
export type {
  RatioComparison,
  SectorBenchmarks,
  SectorComparison,
  SectorValuation,
} from './valuation/sector-benchmarks.js';

export { sanitizeError } from './utils/error-sanitizer.js';
