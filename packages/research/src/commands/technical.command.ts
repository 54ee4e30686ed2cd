/**
 * Technical analysis command implementation
 */

import type { PriceHistoryProvider, TechnicalSnapshot } from '@research-desk/contracts';
import type { AnalyzeOptions } from '@research-desk/indicators';
import { analyzeTechnicals } from '@research-desk/indicators';
import { measureAsync, measureSync } from '@research-desk/logger';
import { TechnicalFormatter } from '../formatters/technical-formatter.js';
import {
  BaseResearchCommand,
  type BaseResearchCommandConfig,
  type CommandOutcome,
} from './base-research.command.js';
import type { CommandOptions } from './types.js';

/**
 * Calendar days of history requested; enough for a 200-session SMA.
 */
export const DEFAULT_LOOKBACK_DAYS = 500;

export interface TechnicalCommandConfig extends BaseResearchCommandConfig {
  priceProvider: PriceHistoryProvider;
  lookbackDays?: number;
  analysis?: AnalyzeOptions;
}

/**
 * `technical <ticker>` - fetches daily history and runs the indicator engine
 */
export class TechnicalCommand extends BaseResearchCommand<TechnicalSnapshot> {
  readonly name = 'technical';
  readonly description = 'Compute technical indicators, support/resistance and trend interpretation';
  override readonly aliases = ['tech', 'ta'];

  private readonly priceProvider: PriceHistoryProvider;
  private readonly lookbackDays: number;
  private readonly analysis: AnalyzeOptions;
  private readonly formatter = new TechnicalFormatter();

  constructor(config: TechnicalCommandConfig) {
    super(config);
    this.priceProvider = config.priceProvider;
    this.lookbackDays = config.lookbackDays ?? DEFAULT_LOOKBACK_DAYS;
    this.analysis = config.analysis ?? {};
  }

  protected async executeCommand(
    ticker: string,
    options: CommandOptions
  ): Promise<CommandOutcome<TechnicalSnapshot>> {
    const fetched = await measureAsync(() =>
      this.priceProvider.getDailyBars({
        ticker,
        lookbackDays: this.lookbackDays,
        asOf: options.asOf,
      })
    );
    const bars = fetched.result;

    this.logger.debug('Fetched daily bars', {
      ticker,
      provider: this.priceProvider.id,
      count: bars.length,
      duration_ms: fetched.duration_ms,
    });

    const analyzed = measureSync(() => analyzeTechnicals(ticker, bars, this.analysis));
    const snapshot = analyzed.result;

    this.logger.debug('Indicators computed', {
      ticker,
      operation: 'technical_analysis',
      count: snapshot.barsAnalyzed,
      duration_ms: analyzed.duration_ms,
    });

    if (snapshot.warnings.length > 0) {
      this.logger.warn('Indicators incomplete for short history', {
        ticker,
        count: bars.length,
        warnings: snapshot.warnings,
      });
    }

    return {
      output: this.formatter.format(snapshot, options.format),
      data: snapshot,
      metadata: {
        provider: this.priceProvider.id,
        asOf: snapshot.asOf,
        barsAnalyzed: snapshot.barsAnalyzed,
      },
    };
  }
}
