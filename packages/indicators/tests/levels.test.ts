/**
 * @fileoverview Tests for pivot detection, clustering and support/resistance.
 */

import { describe, it, expect } from 'vitest';
import { InsufficientDataError, type PriceBar } from '@research-desk/contracts';
import {
  clusterLevels,
  detectPivots,
  findSupportResistance,
  pivotWindowBounds,
} from '../src/levels.js';
import { barsFromCloses, flatSeries, rampClose, rampSeries, waveCloses } from './series.js';

function barsFromHighs(highs: number[]): PriceBar[] {
  return barsFromCloses(highs.map((h) => h - 1), 1);
}

describe('pivotWindowBounds', () => {
  it('should put the extra bar of an even window on the left', () => {
    expect(pivotWindowBounds(10)).toEqual({ left: 5, right: 4 });
  });

  it('should be symmetric for an odd window', () => {
    expect(pivotWindowBounds(5)).toEqual({ left: 2, right: 2 });
  });
});

describe('detectPivots', () => {
  it('should detect a peak at the center of a 10-bar window', () => {
    const bars = barsFromHighs([1, 2, 3, 4, 5, 6, 5, 4, 3, 2]);

    const { highs } = detectPivots(bars, 10);

    expect(highs).toEqual([{ index: 5, date: bars[5]?.date, price: 6, kind: 'high' }]);
  });

  it('should not detect a peak shifted one bar off-center', () => {
    const bars = barsFromHighs([1, 2, 3, 4, 5, 6, 7, 6, 5, 4]);

    expect(detectPivots(bars, 10).highs).toEqual([]);
  });

  it('should count ties as pivots', () => {
    const { highs, lows } = detectPivots(flatSeries(5), 3);

    expect(highs.map((p) => p.index)).toEqual([1, 2, 3]);
    expect(lows.map((p) => p.index)).toEqual([1, 2, 3]);
  });

  it('should find nothing when the series is shorter than the window', () => {
    expect(detectPivots(flatSeries(9), 10)).toEqual({ highs: [], lows: [] });
  });

  it('should detect troughs as pivot lows', () => {
    const bars = barsFromCloses([10, 9, 8, 7, 8, 9, 10], 0.5);

    const { lows } = detectPivots(bars, 5);

    expect(lows).toEqual([{ index: 3, date: bars[3]?.date, price: 6.5, kind: 'low' }]);
  });
});

describe('clusterLevels', () => {
  it('should merge prices within the threshold and collapse to the mean', () => {
    expect(clusterLevels([110, 100, 102], 0.03)).toEqual([
      { members: [100, 102], mean: 101 },
      { members: [110], mean: 110 },
    ]);
  });

  it('should compare against the previous member, not the first', () => {
    expect(clusterLevels([100, 102.5, 105], 0.03)).toEqual([{ members: [100, 102.5, 105], mean: 102.5 }]);
  });

  it('should split at exactly the threshold', () => {
    expect(clusterLevels([100, 103], 0.03)).toEqual([
      { members: [100], mean: 100 },
      { members: [103], mean: 103 },
    ]);
  });

  it('should merge just inside the threshold', () => {
    const clusters = clusterLevels([100, 102.99], 0.03);

    expect(clusters).toHaveLength(1);
    expect(clusters[0]?.members).toEqual([100, 102.99]);
  });

  it('should keep the exact price for a cluster of equal members', () => {
    expect(clusterLevels([250.01, 250.01, 250.01], 0.03)).toEqual([
      { members: [250.01, 250.01, 250.01], mean: 250.01 },
    ]);
  });

  it('should return no clusters for no prices', () => {
    expect(clusterLevels([], 0.03)).toEqual([]);
  });

  it('should be idempotent', () => {
    const prices = [100, 101, 150, 152, 200, 260, 263];
    const first = clusterLevels(prices, 0.03).map((c) => c.mean);
    const second = clusterLevels(first, 0.03).map((c) => c.mean);

    expect(second).toEqual(first);
  });

  it('should not mutate its input', () => {
    const prices = [3, 1, 2];
    clusterLevels(prices);
    expect(prices).toEqual([3, 1, 2]);
  });
});

describe('findSupportResistance', () => {
  it('should report no resistance and nearest-first support for a rising ramp', () => {
    const levels = findSupportResistance(rampSeries());

    expect(levels.currentPrice).toBe(350);
    expect(levels.pivotHighCount).toBe(0);
    expect(levels.pivotLowCount).toBe(10);
    expect(levels.resistance).toEqual({ levels: [], noneFound: true });
    expect(levels.support.noneFound).toBe(false);
    expect(levels.support.levels).toEqual([rampClose(245) - 10, rampClose(220) - 10, rampClose(195) - 10]);
  });

  it('should report no levels on either side for a constant series', () => {
    const levels = findSupportResistance(flatSeries(200));

    expect(levels.resistance).toEqual({ levels: [], noneFound: true });
    expect(levels.support).toEqual({ levels: [], noneFound: true });
  });

  it('should report no data for an empty series', () => {
    expect(() => findSupportResistance([])).toThrow(InsufficientDataError);
    expect(() => findSupportResistance([])).toThrow('No price history available');
  });

  it('should honour maxLevels', () => {
    const levels = findSupportResistance(rampSeries(), { maxLevels: 1 });
    expect(levels.support.levels).toEqual([rampClose(245) - 10]);
  });

  it('should keep levels on the correct side, sorted nearest first', () => {
    const bars = barsFromCloses(waveCloses(300), 1.5);
    const levels = findSupportResistance(bars);
    const price = levels.currentPrice;

    expect(levels.resistance.levels.length).toBeLessThanOrEqual(3);
    expect(levels.support.levels.length).toBeLessThanOrEqual(3);
    for (const level of levels.resistance.levels) expect(level).toBeGreaterThan(price);
    for (const level of levels.support.levels) expect(level).toBeLessThan(price);
    expect(levels.resistance.levels).toEqual([...levels.resistance.levels].sort((a, b) => a - b));
    expect(levels.support.levels).toEqual([...levels.support.levels].sort((a, b) => b - a));
  });

  it('should be deterministic', () => {
    const bars = barsFromCloses(waveCloses(300), 1.5);
    expect(findSupportResistance(bars)).toEqual(findSupportResistance(bars));
  });
});
