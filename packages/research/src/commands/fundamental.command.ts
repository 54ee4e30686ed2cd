/**
 * Fundamental analysis command implementation
 */

import type { FundamentalSnapshot, FundamentalsProvider } from '@research-desk/contracts';
import { FundamentalFormatter } from '../formatters/fundamental-formatter.js';
import {
  compareToSector,
  type SectorBenchmarks,
  type SectorComparison,
} from '../valuation/sector-benchmarks.js';
import {
  BaseResearchCommand,
  type BaseResearchCommandConfig,
  type CommandOutcome,
} from './base-research.command.js';
import type { CommandOptions } from './types.js';

export interface FundamentalCommandConfig extends BaseResearchCommandConfig {
  fundamentalsProvider: FundamentalsProvider;
  /** Without benchmarks the sector comparison section is left out */
  benchmarks?: SectorBenchmarks;
}

export interface FundamentalReport {
  snapshot: FundamentalSnapshot;
  /** Undefined when no benchmarks were configured */
  sectorComparison?: SectorComparison | null;
}

/**
 * `fundamental <ticker>` - valuation ratios, recent quarters and sector comparison
 */
export class FundamentalCommand extends BaseResearchCommand<FundamentalReport> {
  readonly name = 'fundamental';
  readonly description = 'Report valuation ratios, recent quarters and sector comparison';
  override readonly aliases = ['fund', 'fa'];

  private readonly fundamentalsProvider: FundamentalsProvider;
  private readonly benchmarks: SectorBenchmarks | undefined;
  private readonly formatter = new FundamentalFormatter();

  constructor(config: FundamentalCommandConfig) {
    super(config);
    this.fundamentalsProvider = config.fundamentalsProvider;
    this.benchmarks = config.benchmarks;
  }

  protected async executeCommand(
    ticker: string,
    options: CommandOptions
  ): Promise<CommandOutcome<FundamentalReport>> {
    const snapshot = await this.fundamentalsProvider.getFundamentals(ticker);
    const sectorComparison = this.benchmarks ? compareToSector(snapshot, this.benchmarks) : undefined;

    if (sectorComparison === null) {
      this.logger.debug('No sector benchmark', { ticker, sector: snapshot.sector });
    }

    const report: FundamentalReport =
      sectorComparison === undefined ? { snapshot } : { snapshot, sectorComparison };

    return {
      output: this.formatter.format(snapshot, options.format, sectorComparison),
      data: report,
      metadata: {
        provider: this.fundamentalsProvider.id,
        sector: snapshot.sector,
        quarters: snapshot.quarters.length,
      },
    };
  }
}
