/**
 * Synthetic price series shared by the indicator tests.
 */

import type { PriceBar } from '@research-desk/contracts';

const DAY_MS = 24 * 60 * 60 * 1000;

export function dateAt(index: number): string {
  return new Date(Date.UTC(2024, 0, 1) + index * DAY_MS).toISOString().slice(0, 10);
}

/**
 * Bars with high/low a fixed distance from close.
 */
export function barsFromCloses(closes: readonly number[], spread = 1): PriceBar[] {
  return closes.map((close, i) => ({
    date: dateAt(i),
    open: close,
    high: close + spread,
    low: close - spread,
    close,
  }));
}

export function flatSeries(count: number, price = 100): PriceBar[] {
  return barsFromCloses(new Array<number>(count).fill(price), 0);
}

export const RAMP_LENGTH = 250;

/** Bars whose low dips 10 below close, 25 bars apart */
export const WICK_BARS = [20, 45, 70, 95, 120, 145, 170, 195, 220, 245];

export function rampClose(index: number): number {
  return 100 + (index * 250) / 249;
}

/**
 * Linear ramp from 100 to 350 over 250 bars. The wick bars give the series
 * pivot lows; highs never form a pivot because every window's last bar is
 * its highest.
 */
export function rampSeries(): PriceBar[] {
  const bars: PriceBar[] = [];
  for (let i = 0; i < RAMP_LENGTH; i++) {
    const close = rampClose(i);
    bars.push({
      date: dateAt(i),
      open: close,
      high: close + 1,
      low: WICK_BARS.includes(i) ? close - 10 : close - 1,
      close,
    });
  }
  return bars;
}

export function waveCloses(count: number): number[] {
  return Array.from({ length: count }, (_, i) => 100 + 10 * Math.sin(i / 5) + i * 0.05);
}
