/**
 * @fileoverview Builds the per-bar indicator table.
 * @module @research-desk/indicators/table
 */

import type { IndicatorTable, PriceSeries } from '@research-desk/contracts';
import { InsufficientDataError } from '@research-desk/contracts';
import type { IndicatorEngineConfig } from './config.js';
import { mergeEngineConfig } from './config.js';
import { bollinger, ema, macd, rsi, sma } from './rolling.js';

/**
 * Computes one IndicatorRow per bar from closing prices.
 *
 * @throws {InsufficientDataError} If the series is empty
 *
 * @example
 * ```typescript
 * const table = computeIndicatorTable(bars);
 * const last = table[table.length - 1];
 * ```
 */
export function computeIndicatorTable(
  series: PriceSeries,
  overrides: Partial<IndicatorEngineConfig> = {}
): IndicatorTable {
  const config = mergeEngineConfig(overrides);
  if (series.length === 0) {
    throw new InsufficientDataError('No price history available', { required: 1, received: 0 });
  }
  const closes = series.map((bar) => bar.close);

  const sma20 = sma(closes, 20);
  const sma50 = sma(closes, 50);
  const sma200 = sma(closes, 200);
  const ema12 = ema(closes, config.macdFast);
  const ema26 = ema(closes, config.macdSlow);
  const macdSeries = macd(closes, config.macdFast, config.macdSlow, config.macdSignal);
  const rsi14 = rsi(closes, config.rsiPeriod);
  const bands = bollinger(closes, config.bollingerPeriod, config.bollingerStdDev);

  return series.map((bar, i) => ({
    date: bar.date,
    sma20: sma20[i] ?? null,
    sma50: sma50[i] ?? null,
    sma200: sma200[i] ?? null,
    ema12: ema12[i] ?? null,
    ema26: ema26[i] ?? null,
    macd: macdSeries.macd[i] ?? null,
    macdSignal: macdSeries.signal[i] ?? null,
    macdHist: macdSeries.histogram[i] ?? null,
    rsi14: rsi14[i] ?? null,
    bbUpper: bands.upper[i] ?? null,
    bbMiddle: bands.middle[i] ?? null,
    bbLower: bands.lower[i] ?? null,
  }));
}
