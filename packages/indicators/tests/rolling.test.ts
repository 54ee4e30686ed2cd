/**
 * @fileoverview Tests for rolling and exponential statistics.
 */

import { describe, it, expect } from 'vitest';
import { InvalidConfigError } from '@research-desk/contracts';
import { bollinger, ema, macd, rollingStd, rsi, sma } from '../src/rolling.js';
import { waveCloses } from './series.js';

describe('sma', () => {
  it('should be null until the window is full', () => {
    expect(sma([1, 2, 3, 4, 5], 3)).toEqual([null, null, 2, 3, 4]);
  });

  it('should match a direct mean at every full window', () => {
    const values = waveCloses(80);
    const result = sma(values, 20);

    expect(result).toHaveLength(80);
    for (let i = 19; i < values.length; i++) {
      const window = values.slice(i - 19, i + 1);
      const mean = window.reduce((sum, v) => sum + v, 0) / 20;
      expect(result[i]).toBeCloseTo(mean, 10);
    }
  });

  it('should return a constant exactly', () => {
    const result = sma(new Array<number>(60).fill(101.7), 50);

    expect(result[48]).toBeNull();
    expect(result.slice(49)).toEqual(new Array<number>(11).fill(101.7));
  });

  it('should reject a non-positive window', () => {
    expect(() => sma([1, 2], 0)).toThrow(InvalidConfigError);
  });
});

describe('rollingStd', () => {
  it('should use the sample (n - 1) denominator', () => {
    const result = rollingStd([2, 4, 4, 4, 5, 5, 7, 9], 8);

    expect(result.slice(0, 7)).toEqual([null, null, null, null, null, null, null]);
    expect(result[7]).toBeCloseTo(Math.sqrt(32 / 7), 12);
  });

  it('should be zero for a constant window', () => {
    expect(rollingStd([3, 3, 3], 3)[2]).toBe(0);
  });

  it('should be exactly zero over equal values that are not exactly representable', () => {
    const result = rollingStd(new Array<number>(30).fill(250.01), 20);

    expect(result.slice(19)).toEqual(new Array<number>(11).fill(0));
  });

  it('should require at least two samples', () => {
    expect(() => rollingStd([1, 2, 3], 1)).toThrow(InvalidConfigError);
  });
});

describe('ema', () => {
  it('should seed with the first value and follow the recurrence exactly', () => {
    const values = waveCloses(60);
    const span = 12;
    const alpha = 2 / (span + 1);
    const result = ema(values, span);

    expect(result[0]).toBe(values[0]);
    for (let i = 1; i < values.length; i++) {
      const value = values[i] ?? Number.NaN;
      const previous = result[i - 1] ?? Number.NaN;
      expect(result[i]).toBe(alpha * value + (1 - alpha) * previous);
    }
  });

  it('should return an empty array for empty input', () => {
    expect(ema([], 12)).toEqual([]);
  });

  it('should equal the input when span is 1', () => {
    expect(ema([5, 7, 3], 1)).toEqual([5, 7, 3]);
  });
});

describe('rsi', () => {
  it('should average gains and losses with a simple rolling mean', () => {
    const result = rsi([10, 11, 10.5, 11.5, 11], 2);

    expect(result[0]).toBeNull();
    // Window of deltas [0, 1]: no losses
    expect(result[1]).toBe(50);
    // Gains average 0.5, losses 0.25
    expect(result[2]).toBeCloseTo(100 - 100 / 3, 12);
    expect(result[3]).toBeCloseTo(100 - 100 / 3, 12);
    expect(result[4]).toBeCloseTo(100 - 100 / 3, 12);
  });

  it('should default to exactly 50 when there are no losses', () => {
    const result = rsi([1, 2, 3, 4, 5, 6], 3);
    expect(result).toEqual([null, null, 50, 50, 50, 50]);
  });

  it('should be 0 when every move is down', () => {
    expect(rsi([5, 4, 3, 2, 1], 2).slice(1)).toEqual([0, 0, 0, 0]);
  });

  it('should be defined from index period - 1 and stay within [0, 100]', () => {
    const result = rsi(waveCloses(120), 14);

    expect(result.slice(0, 13).every((v) => v === null)).toBe(true);
    for (const value of result.slice(13)) {
      expect(value).not.toBeNull();
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThanOrEqual(100);
    }
  });
});

describe('macd', () => {
  it('should derive line, signal and histogram from the EMAs', () => {
    const closes = waveCloses(60);
    const { macd: line, signal, histogram } = macd(closes);
    const fast = ema(closes, 12);
    const slow = ema(closes, 26);

    expect(line[0]).toBe(0);
    expect(signal).toEqual(ema(line, 9));
    for (let i = 0; i < closes.length; i++) {
      expect(line[i]).toBe((fast[i] ?? 0) - (slow[i] ?? 0));
      expect(histogram[i]).toBe((line[i] ?? 0) - (signal[i] ?? 0));
    }
  });
});

describe('bollinger', () => {
  it('should collapse to the price for a constant series', () => {
    const bands = bollinger(new Array<number>(25).fill(100), 20, 2);

    expect(bands.middle[18]).toBeNull();
    expect(bands.upper[18]).toBeNull();
    expect(bands.upper[19]).toBe(100);
    expect(bands.middle[19]).toBe(100);
    expect(bands.lower[19]).toBe(100);
  });

  it('should place bands k sample deviations from the middle', () => {
    const closes = waveCloses(40);
    const bands = bollinger(closes, 20, 2);
    const std = rollingStd(closes, 20);

    const middle = bands.middle[30] ?? Number.NaN;
    const deviation = std[30] ?? Number.NaN;
    expect(bands.upper[30]).toBe(middle + 2 * deviation);
    expect(bands.lower[30]).toBe(middle - 2 * deviation);
  });
});
