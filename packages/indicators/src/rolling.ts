/**
 * Rolling and exponential statistics over a numeric series.
 *
 * Every function returns an array aligned 1:1 with its input. Rolling outputs
 * are null until the window is full; nothing at index i reads past i.
 */

import { assertPeriod } from './config.js';

interface WindowStats {
  sum: number;
  min: number;
  max: number;
}

function windowStats(values: readonly number[], start: number, end: number): WindowStats {
  let sum = 0;
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (let j = start; j < end; j++) {
    const value = values[j] ?? 0;
    sum += value;
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { sum, min, max };
}

/**
 * Mean of values[start..end). A window of equal values returns that value
 * exactly; summing and dividing would drift by a few ULPs.
 */
function windowMean(values: readonly number[], start: number, end: number): number {
  const { sum, min, max } = windowStats(values, start, end);
  return min === max ? min : sum / (end - start);
}

/**
 * Simple moving average: mean of values[i-window+1..i].
 */
export function sma(values: readonly number[], window: number): Array<number | null> {
  assertPeriod('window', window);

  return values.map((_, i) => (i < window - 1 ? null : windowMean(values, i - window + 1, i + 1)));
}

/**
 * Rolling sample (n - 1) standard deviation. Exactly 0 over equal values.
 */
export function rollingStd(values: readonly number[], window: number): Array<number | null> {
  assertPeriod('window', window, 2);

  return values.map((_, i) => {
    if (i < window - 1) {
      return null;
    }
    const start = i - window + 1;
    const { sum, min, max } = windowStats(values, start, i + 1);
    if (min === max) {
      return 0;
    }
    const mean = sum / window;
    let squares = 0;
    for (let j = start; j <= i; j++) {
      const deviation = (values[j] ?? mean) - mean;
      squares += deviation * deviation;
    }
    return Math.sqrt(squares / (window - 1));
  });
}

/**
 * Exponential moving average with alpha = 2 / (span + 1), seeded with the
 * first value so it is defined from index 0.
 */
export function ema(values: readonly number[], span: number): number[] {
  assertPeriod('span', span);

  const alpha = 2 / (span + 1);
  const result: number[] = [];
  let previous: number | null = null;

  for (const value of values) {
    previous = previous === null ? value : alpha * value + (1 - alpha) * previous;
    result.push(previous);
  }

  return result;
}

/**
 * Relative strength index using simple rolling means of gains and losses.
 *
 * The first bar has no prior close and contributes a zero delta. A window
 * with no losses reads as exactly 50.
 */
export function rsi(closes: readonly number[], period = 14): Array<number | null> {
  assertPeriod('period', period);

  const gains: number[] = [];
  const losses: number[] = [];
  let previous: number | null = null;

  for (const close of closes) {
    const delta = previous === null ? 0 : close - previous;
    gains.push(delta > 0 ? delta : 0);
    losses.push(delta < 0 ? -delta : 0);
    previous = close;
  }

  const avgGain = sma(gains, period);
  const avgLoss = sma(losses, period);

  return avgGain.map((gain, i) => {
    const loss = avgLoss[i];
    if (gain === null || loss === null || loss === undefined) {
      return null;
    }
    if (loss === 0) {
      return 50;
    }
    return 100 - 100 / (1 + gain / loss);
  });
}

export interface MacdSeries {
  macd: number[];
  signal: number[];
  histogram: number[];
}

/**
 * MACD line (fast EMA - slow EMA), its signal EMA and the histogram.
 */
export function macd(closes: readonly number[], fast = 12, slow = 26, signalSpan = 9): MacdSeries {
  const fastEma = ema(closes, fast);
  const slowEma = ema(closes, slow);

  const line = fastEma.map((value, i) => value - (slowEma[i] ?? value));
  const signal = ema(line, signalSpan);
  const histogram = line.map((value, i) => value - (signal[i] ?? value));

  return { macd: line, signal, histogram };
}

export interface BollingerSeries {
  upper: Array<number | null>;
  middle: Array<number | null>;
  lower: Array<number | null>;
}

/**
 * Bollinger bands: SMA middle band, upper/lower at +/- stdDev sample
 * standard deviations.
 */
export function bollinger(closes: readonly number[], period = 20, stdDev = 2): BollingerSeries {
  const middle = sma(closes, period);
  const deviation = rollingStd(closes, period);

  const band = (sign: 1 | -1): Array<number | null> =>
    middle.map((mid, i) => {
      const std = deviation[i];
      return mid === null || std === null || std === undefined ? null : mid + sign * stdDev * std;
    });

  return { upper: band(1), middle, lower: band(-1) };
}
