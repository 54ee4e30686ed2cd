/**
 * @fileoverview Technical analysis entry point.
 *
 * Validates a daily price series, computes the indicator table, support and
 * resistance, and the trend interpretation, and packs them into a
 * serializable TechnicalSnapshot.
 *
 * @module @research-desk/indicators/analyze
 */

import type { PriceSeries, TechnicalSnapshot } from '@research-desk/contracts';
import { InsufficientDataError } from '@research-desk/contracts';
import type { IndicatorEngineConfig } from './config.js';
import { mergeEngineConfig } from './config.js';
import { interpretTrend } from './interpretation.js';
import { findSupportResistance } from './levels.js';
import { computeIndicatorTable } from './table.js';
import { validateSeries } from './validation.js';

/**
 * Number of prior closes reported alongside the current price.
 */
export const RECENT_CLOSE_COUNT = 4;

export interface AnalyzeOptions extends Partial<IndicatorEngineConfig> {
  /**
   * Attach the full indicator table to the snapshot.
   * @default false
   */
  includeTable?: boolean;
}

/**
 * Runs the full indicator pipeline for one ticker.
 *
 * Pure and synchronous: the same series and options always give the same
 * snapshot, and the series is never mutated.
 *
 * @throws {InsufficientDataError} If the series is empty or below minBars
 * @throws {InvalidSeriesError} If the series violates its preconditions
 * @throws {InvalidConfigError} If the options are out of range
 *
 * @example
 * ```typescript
 * const snapshot = analyzeTechnicals('MSFT', bars);
 * console.log(snapshot.interpretation.longTerm); // 'BULLISH'
 * console.log(snapshot.levels.support.levels);   // [402.1, 389.75, 371.2]
 * ```
 */
export function analyzeTechnicals(
  ticker: string,
  series: PriceSeries,
  options: AnalyzeOptions = {}
): TechnicalSnapshot {
  const { includeTable = false, ...overrides } = options;
  const config = mergeEngineConfig(overrides);

  validateSeries(series, config.minBars, ticker);

  const table = computeIndicatorTable(series, config);
  const latest = table[table.length - 1];
  const lastBar = series[series.length - 1];
  if (!latest || !lastBar) {
    throw new InsufficientDataError(`No price history available for ${ticker}`, {
      required: 1,
      received: series.length,
      ticker,
    });
  }

  const currentPrice = lastBar.close;
  const recentCloses = series
    .slice(-(RECENT_CLOSE_COUNT + 1), -1)
    .map((bar) => bar.close)
    .reverse();

  const snapshot: TechnicalSnapshot = {
    ticker,
    asOf: lastBar.date,
    barsAnalyzed: series.length,
    currentPrice,
    recentCloses,
    latest,
    levels: findSupportResistance(series, config),
    interpretation: interpretTrend(latest, currentPrice),
    warnings: collectWarnings(series.length, config),
  };

  if (includeTable) {
    snapshot.table = table;
  }

  return snapshot;
}

/**
 * Notes on indicators that are not yet available for a series this short.
 */
export function collectWarnings(barCount: number, config: IndicatorEngineConfig): string[] {
  const warnings: string[] = [];
  const windows: Array<[string, number]> = [
    ['SMA(200)', 200],
    ['SMA(50)', 50],
    ['SMA(20)', 20],
    [`Bollinger(${config.bollingerPeriod})`, config.bollingerPeriod],
    [`RSI(${config.rsiPeriod})`, config.rsiPeriod],
  ];

  for (const [name, window] of windows) {
    if (barCount < window) {
      warnings.push(`${name} unavailable: needs ${window} bars, got ${barCount}`);
    }
  }

  if (barCount < config.pivotWindow) {
    warnings.push(
      `Support/resistance unavailable: needs ${config.pivotWindow} bars for pivot detection, got ${barCount}`
    );
  }

  return warnings;
}
