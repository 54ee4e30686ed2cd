/**
 * @fileoverview Yahoo Finance data provider.
 *
 * Implements PriceHistoryProvider and FundamentalsProvider from
 * @research-desk/contracts on top of YahooClient. Works against the live API
 * or, with `fixturePath`, against recorded responses.
 *
 * @module @research-desk/provider-yahoo
 */

import type {
  FundamentalSnapshot,
  FundamentalsProvider,
  GetDailyBarsParams,
  PriceBar,
  PriceHistoryProvider,
} from '@research-desk/contracts';
import { InsufficientDataError } from '@research-desk/contracts';
import type { Logger } from '@research-desk/logger';
import { startTimer } from '@research-desk/logger';
import { YahooClient } from './client.js';
import { mapYahooError, PROVIDER_ID } from './errors.js';
import { parseChartResponse, parseQuoteSummary, toSessionDate } from './parser.js';
import type { YahooProviderOptions } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Yahoo Finance provider.
 *
 * @example
 * ```typescript
 * const provider = new YahooProvider({ logger });
 * const bars = await provider.getDailyBars({ ticker: 'MSFT', lookbackDays: 500 });
 * const fundamentals = await provider.getFundamentals('MSFT');
 * ```
 */
export class YahooProvider implements PriceHistoryProvider, FundamentalsProvider {
  readonly id = PROVIDER_ID;

  private readonly client: YahooClient;
  private readonly adjusted: boolean;
  private readonly logger: Logger | undefined;

  constructor(options: YahooProviderOptions = {}) {
    this.client = new YahooClient(options);
    this.adjusted = options.adjusted ?? true;
    this.logger = options.logger;
  }

  /**
   * Daily bars for the `lookbackDays` calendar days ending at `asOf`.
   *
   * @throws {SymbolResolutionError} If Yahoo does not know the ticker
   * @throws {InsufficientDataError} If no bars fall inside the window
   * @throws {ProviderError} On transport or response-shape failures
   */
  async getDailyBars(params: GetDailyBarsParams): Promise<PriceBar[]> {
    const { ticker, lookbackDays } = params;
    const end = params.asOf ?? new Date();
    const start = new Date(end.getTime() - lookbackDays * DAY_MS);
    const timer = startTimer();

    let raw: unknown;
    try {
      raw = await this.client.getChart(ticker, start, end);
    } catch (error) {
      throw mapYahooError(error, ticker, 'chart request');
    }

    const firstDate = toSessionDate(start.getTime() / 1000);
    const lastDate = toSessionDate(end.getTime() / 1000);
    const bars = parseChartResponse(raw, { ticker, adjusted: this.adjusted }).filter(
      (bar) => bar.date >= firstDate && bar.date <= lastDate
    );

    if (bars.length === 0) {
      throw new InsufficientDataError(`No price history available for ${ticker}`, {
        required: 1,
        received: 0,
        ticker,
      });
    }

    this.logger?.debug('Daily bars fetched', {
      provider: this.id,
      ticker,
      count: bars.length,
      first: bars[0]?.date,
      last: bars[bars.length - 1]?.date,
      fixture: this.client.isFixtureMode(),
      duration_ms: timer.stop(),
    });

    return bars;
  }

  /**
   * Company profile, valuation ratios and the last four quarters.
   *
   * @throws {SymbolResolutionError} If Yahoo does not know the ticker
   * @throws {ProviderError} On transport or response-shape failures
   */
  async getFundamentals(ticker: string): Promise<FundamentalSnapshot> {
    const timer = startTimer();

    let raw: unknown;
    try {
      raw = await this.client.getQuoteSummary(ticker);
    } catch (error) {
      throw mapYahooError(error, ticker, 'quoteSummary request');
    }

    const snapshot = parseQuoteSummary(ticker, raw);

    this.logger?.debug('Fundamentals fetched', {
      provider: this.id,
      ticker,
      quarters: snapshot.quarters.length,
      fixture: this.client.isFixtureMode(),
      duration_ms: timer.stop(),
    });

    return snapshot;
  }
}
