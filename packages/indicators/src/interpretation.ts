/**
 * @fileoverview Rule-based trend interpretation of the latest bar.
 *
 * Five independent judgments; no composite score is derived. A comparison
 * against an unavailable (null) indicator resolves to NEUTRAL.
 *
 * @module @research-desk/indicators/interpretation
 */

import type {
  BollingerZone,
  IndicatorRow,
  MacdSignal,
  RsiZone,
  TrendInterpretation,
  TrendLabel,
} from '@research-desk/contracts';

export const RSI_OVERBOUGHT = 70;
export const RSI_OVERSOLD = 30;
export const BAND_NEAR_UPPER = 0.8;
export const BAND_NEAR_LOWER = 0.2;

/**
 * BULLISH when close > SMA(200) and SMA(50) > SMA(200); BEARISH when both
 * are below.
 */
export function classifyLongTerm(row: IndicatorRow, close: number): TrendLabel {
  const { sma50, sma200 } = row;
  if (sma50 === null || sma200 === null) return 'NEUTRAL';

  if (close > sma200 && sma50 > sma200) return 'BULLISH';
  if (close < sma200 && sma50 < sma200) return 'BEARISH';
  return 'NEUTRAL';
}

/**
 * BULLISH when close > SMA(20) > SMA(50); BEARISH when close < SMA(20) < SMA(50).
 */
export function classifyShortTerm(row: IndicatorRow, close: number): TrendLabel {
  const { sma20, sma50 } = row;
  if (sma20 === null || sma50 === null) return 'NEUTRAL';

  if (close > sma20 && sma20 > sma50) return 'BULLISH';
  if (close < sma20 && sma20 < sma50) return 'BEARISH';
  return 'NEUTRAL';
}

export function classifyRsi(value: number | null): RsiZone {
  if (value === null) return 'NEUTRAL';
  if (value > RSI_OVERBOUGHT) return 'OVERBOUGHT';
  if (value < RSI_OVERSOLD) return 'OVERSOLD';
  return 'NEUTRAL';
}

/**
 * Binary: anything other than MACD strictly above its signal is BEARISH.
 */
export function classifyMacd(row: IndicatorRow): MacdSignal {
  const { macd, macdSignal } = row;
  return macd !== null && macdSignal !== null && macd > macdSignal ? 'BULLISH' : 'BEARISH';
}

/**
 * Position of close inside the bands, 0 at the lower band and 1 at the upper.
 * Null when the bands are unavailable or have zero width.
 */
export function bandPosition(row: IndicatorRow, close: number): number | null {
  const { bbUpper, bbLower } = row;
  if (bbUpper === null || bbLower === null) return null;

  const width = bbUpper - bbLower;
  if (width <= 0) return null;

  return (close - bbLower) / width;
}

export function classifyBollinger(row: IndicatorRow, close: number): BollingerZone {
  const { bbUpper, bbLower } = row;
  if (bbUpper === null || bbLower === null) return 'NEUTRAL';

  if (close > bbUpper) return 'OVERBOUGHT';
  if (close < bbLower) return 'OVERSOLD';

  const position = bandPosition(row, close);
  if (position === null) return 'NEUTRAL';
  if (position > BAND_NEAR_UPPER) return 'NEAR_OVERBOUGHT';
  if (position < BAND_NEAR_LOWER) return 'NEAR_OVERSOLD';
  return 'NEUTRAL';
}

/**
 * Interprets the latest indicator row against the latest close.
 *
 * @example
 * ```typescript
 * const interpretation = interpretTrend(table[table.length - 1], lastClose);
 * if (interpretation.longTerm === 'BULLISH') { ... }
 * ```
 */
export function interpretTrend(row: IndicatorRow, close: number): TrendInterpretation {
  return {
    longTerm: classifyLongTerm(row, close),
    shortTerm: classifyShortTerm(row, close),
    rsi: { zone: classifyRsi(row.rsi14), value: row.rsi14 },
    macd: classifyMacd(row),
    bollinger: { zone: classifyBollinger(row, close), position: bandPosition(row, close) },
  };
}
