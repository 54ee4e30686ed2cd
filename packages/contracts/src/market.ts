/**
 * @fileoverview Market data types and provider contracts.
 *
 * Defines provider-agnostic interfaces for daily price history and the
 * capabilities a data source must expose to the research pipeline. All types
 * are pure data structures with no I/O or business logic.
 *
 * @module @research-desk/contracts/market
 */

import type { FundamentalSnapshot } from './fundamentals.js';

/**
 * A single daily OHLC bar.
 *
 * Represents one trading session. Bars are immutable once ingested.
 *
 * @invariant high >= low
 * @invariant date is a calendar date in YYYY-MM-DD form
 *
 * @example
 * ```typescript
 * const bar: PriceBar = {
 *   date: '2025-01-15',
 *   open: 100.5,
 *   high: 101.25,
 *   low: 100.0,
 *   close: 101.0,
 * };
 * ```
 */
export interface PriceBar {
  /** Session date (YYYY-MM-DD, exchange local) */
  date: string;

  /** Opening price for the session */
  open: number;

  /** Highest price during the session */
  high: number;

  /** Lowest price during the session */
  low: number;

  /** Closing price for the session */
  close: number;
}

/**
 * Ordered sequence of daily bars, oldest first.
 *
 * @invariant dates strictly ascending (no duplicates)
 */
export type PriceSeries = readonly PriceBar[];

/**
 * Parameters for requesting daily price history from a provider.
 *
 * @example
 * ```typescript
 * const params: GetDailyBarsParams = {
 *   ticker: 'MSFT',
 *   lookbackDays: 500,
 * };
 * ```
 */
export interface GetDailyBarsParams {
  /** Ticker symbol, upper case (e.g., 'AAPL') */
  ticker: string;

  /** Calendar days of history to request, ending at asOf */
  lookbackDays: number;

  /** End of the requested window. Defaults to now. */
  asOf?: Date;
}

/**
 * Source of daily OHLC history.
 *
 * Implementations own all network and retry concerns; the indicator engine
 * only ever sees the returned bars.
 */
export interface PriceHistoryProvider {
  /** Stable provider identifier used in logs (e.g., 'yahoo') */
  readonly id: string;

  /**
   * Fetches daily bars for a ticker, oldest first.
   *
   * @throws {SymbolResolutionError} If the ticker is unknown to the provider
   * @throws {InsufficientDataError} If the provider returns no bars
   * @throws {ProviderError} On transport or parse failures
   */
  getDailyBars(params: GetDailyBarsParams): Promise<PriceBar[]>;
}

/**
 * Source of company fundamentals and valuation ratios.
 */
export interface FundamentalsProvider {
  readonly id: string;

  /**
   * Fetches the latest fundamentals for a ticker. Fields the source does not
   * report are returned as null.
   */
  getFundamentals(ticker: string): Promise<FundamentalSnapshot>;
}
