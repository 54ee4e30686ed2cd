/**
 * Wires configuration, providers and commands together.
 */

import type { FundamentalsProvider, PriceHistoryProvider } from '@research-desk/contracts';
import { createChildLogger, type Logger } from '@research-desk/logger';
import { YahooProvider } from '@research-desk/provider-yahoo';
import type { Config } from './config/index.js';
import { FundamentalCommand } from './commands/fundamental.command.js';
import { ReportCommand } from './commands/report.command.js';
import { TechnicalCommand } from './commands/technical.command.js';
import type { Command } from './commands/types.js';
import type { SectorBenchmarks } from './valuation/sector-benchmarks.js';

export const COMMAND_NAMES = ['technical', 'fundamental', 'report'] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export type ResearchCommands = Record<CommandName, Command>;

export interface ResearchServices {
  priceProvider: PriceHistoryProvider;
  fundamentalsProvider: FundamentalsProvider;
  benchmarks?: SectorBenchmarks;
}

/**
 * Yahoo provider for the configured mode. Fixture mode reads recorded
 * responses from `provider.fixturePath` instead of calling the API.
 */
export function createYahooProvider(config: Config, logger: Logger): YahooProvider {
  const { provider } = config;

  return new YahooProvider({
    baseUrl: provider.baseUrl,
    timeout: provider.timeout,
    fixturePath: provider.type === 'fixture' ? provider.fixturePath : undefined,
    crumb: provider.crumb,
    cookie: provider.cookie,
    adjusted: provider.adjusted,
    logger: createChildLogger(logger, { component: 'provider', provider: 'yahoo' }),
  });
}

/**
 * Build every command against the given services.
 *
 * @param outputDir - Overrides `report.outputDir`
 */
export function createCommands(
  config: Config,
  logger: Logger,
  services: ResearchServices,
  outputDir?: string
): ResearchCommands {
  const technical = new TechnicalCommand({
    logger: createChildLogger(logger, { component: 'technical' }),
    priceProvider: services.priceProvider,
    lookbackDays: config.provider.lookbackDays,
    analysis: {
      pivotWindow: config.analysis.pivotWindow,
      clusterThreshold: config.analysis.clusterThreshold,
      maxLevels: config.analysis.maxLevels,
      includeTable: config.analysis.includeTable,
    },
  });

  const fundamental = new FundamentalCommand({
    logger: createChildLogger(logger, { component: 'fundamental' }),
    fundamentalsProvider: services.fundamentalsProvider,
    benchmarks: services.benchmarks,
  });

  const report = new ReportCommand({
    logger: createChildLogger(logger, { component: 'report' }),
    technical,
    fundamental,
    outputDir: outputDir ?? config.report.outputDir,
  });

  return { technical, fundamental, report };
}
