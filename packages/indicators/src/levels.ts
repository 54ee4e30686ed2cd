/**
 * @fileoverview Support and resistance from clustered pivots.
 *
 * Pivots are found with a centered window, nearby pivot prices are merged by
 * a greedy left-to-right pass over the sorted values, and the merged levels
 * are split around the current close.
 *
 * @module @research-desk/indicators/levels
 */

import type {
  LevelCluster,
  LevelSide,
  PivotLevel,
  PriceSeries,
  SupportResistance,
} from '@research-desk/contracts';
import { InsufficientDataError } from '@research-desk/contracts';
import type { IndicatorEngineConfig } from './config.js';
import { assertPeriod, mergeEngineConfig } from './config.js';

export interface PivotSet {
  highs: PivotLevel[];
  lows: PivotLevel[];
}

/**
 * Bars to the left and right of the candidate bar. For an even window the
 * extra bar goes to the left (10 -> 5 left, 4 right).
 */
export function pivotWindowBounds(window: number): { left: number; right: number } {
  const left = Math.floor(window / 2);
  return { left, right: window - left - 1 };
}

/**
 * Detects pivot highs and lows with a centered window.
 *
 * A bar is a pivot high when its high equals the maximum high of its window,
 * a pivot low when its low equals the minimum low. Ties count. Bars whose
 * window runs past either end of the series are never pivots, so detection
 * looks ahead by `right` bars.
 *
 * @example
 * ```typescript
 * const { highs, lows } = detectPivots(bars, 10);
 * ```
 */
export function detectPivots(series: PriceSeries, window = 10): PivotSet {
  assertPeriod('pivotWindow', window, 3);

  const { left, right } = pivotWindowBounds(window);
  const highs: PivotLevel[] = [];
  const lows: PivotLevel[] = [];

  for (let i = left; i < series.length - right; i++) {
    const bar = series[i];
    if (!bar) continue;

    let isHigh = true;
    let isLow = true;

    for (let j = i - left; j <= i + right && (isHigh || isLow); j++) {
      const other = series[j];
      if (!other) continue;

      if (other.high > bar.high) isHigh = false;
      if (other.low < bar.low) isLow = false;
    }

    if (isHigh) {
      highs.push({ index: i, date: bar.date, price: bar.high, kind: 'high' });
    }
    if (isLow) {
      lows.push({ index: i, date: bar.date, price: bar.low, kind: 'low' });
    }
  }

  return { highs, lows };
}

/**
 * Greedy clustering of prices.
 *
 * Prices are sorted ascending; each price joins the current cluster when its
 * relative distance to the cluster's last member is below threshold,
 * otherwise it starts a new cluster. The result is order-dependent but
 * deterministic, and clustering the same input twice gives the same clusters.
 *
 * @example
 * ```typescript
 * clusterLevels([100, 102, 110], 0.03);
 * // => [{ members: [100, 102], mean: 101 }, { members: [110], mean: 110 }]
 * ```
 */
export function clusterLevels(prices: readonly number[], threshold = 0.03): LevelCluster[] {
  const sorted = [...prices].sort((a, b) => a - b);
  const clusters: number[][] = [];

  for (const price of sorted) {
    const current = clusters[clusters.length - 1];
    const last = current?.[current.length - 1];

    if (current && last !== undefined && Math.abs((price - last) / last) < threshold) {
      current.push(price);
    } else {
      clusters.push([price]);
    }
  }

  return clusters.map((members) => ({ members, mean: clusterMean(members) }));
}

/**
 * Members are ascending, so equal first and last means every member is equal
 * and the mean is returned exactly.
 */
function clusterMean(members: readonly number[]): number {
  const first = members[0] ?? 0;
  if (first === members[members.length - 1]) return first;
  return members.reduce((sum, price) => sum + price, 0) / members.length;
}

function toSide(levels: number[]): LevelSide {
  return { levels, noneFound: levels.length === 0 };
}

/**
 * Nearest resistance levels above and support levels below the last close.
 *
 * Resistance comes from clustered pivot highs strictly above the close,
 * ascending; support from clustered pivot lows strictly below, descending.
 * Each side keeps at most maxLevels entries and is flagged noneFound when
 * empty.
 *
 * @throws {InsufficientDataError} If the series is empty
 * @throws {InvalidConfigError} If the overrides are out of range
 */
export function findSupportResistance(
  series: PriceSeries,
  overrides: Partial<IndicatorEngineConfig> = {}
): SupportResistance {
  const config = mergeEngineConfig(overrides);
  const last = series[series.length - 1];
  if (!last) {
    throw new InsufficientDataError('No price history available', { required: 1, received: 0 });
  }
  const currentPrice = last.close;

  const { highs, lows } = detectPivots(series, config.pivotWindow);

  const resistance = clusterLevels(
    highs.map((pivot) => pivot.price),
    config.clusterThreshold
  )
    .map((cluster) => cluster.mean)
    .filter((level) => level > currentPrice)
    .sort((a, b) => a - b)
    .slice(0, config.maxLevels);

  const support = clusterLevels(
    lows.map((pivot) => pivot.price),
    config.clusterThreshold
  )
    .map((cluster) => cluster.mean)
    .filter((level) => level < currentPrice)
    .sort((a, b) => b - a)
    .slice(0, config.maxLevels);

  return {
    currentPrice,
    resistance: toSide(resistance),
    support: toSide(support),
    pivotHighCount: highs.length,
    pivotLowCount: lows.length,
  };
}
