/**
 * @fileoverview Technical indicator types.
 *
 * Output shapes of the indicator engine: the per-bar indicator table, pivot
 * and level types used for support/resistance, the categorical trend
 * interpretation, and the serializable snapshot handed to report stages.
 *
 * @module @research-desk/contracts/indicators
 */

/**
 * Derived indicators for a single bar.
 *
 * A null field means "not yet available": the rolling window behind it does
 * not have enough history at this bar. Consumers must never read null as 0.
 *
 * @invariant values at row i depend only on bars 0..i
 */
export interface IndicatorRow {
  /** Date of the bar this row is aligned with */
  date: string;

  sma20: number | null;
  sma50: number | null;
  sma200: number | null;

  /** EMAs are seeded with the first close and are always defined */
  ema12: number | null;
  ema26: number | null;

  macd: number | null;
  macdSignal: number | null;
  macdHist: number | null;

  rsi14: number | null;

  bbUpper: number | null;
  bbMiddle: number | null;
  bbLower: number | null;
}

/**
 * One IndicatorRow per input bar, same order.
 */
export type IndicatorTable = IndicatorRow[];

/**
 * Local price extreme found by pivot detection.
 */
export interface PivotLevel {
  /** Index of the bar within the series */
  index: number;

  date: string;

  /** The bar's high (for kind 'high') or low (for kind 'low') */
  price: number;

  kind: 'high' | 'low';
}

/**
 * Group of nearby pivot prices merged into one representative level.
 */
export interface LevelCluster {
  /** Member prices, ascending */
  members: number[];

  /** Arithmetic mean of members */
  mean: number;
}

/**
 * Levels on one side of the current price.
 */
export interface LevelSide {
  /** Nearest first; at most the configured maximum */
  levels: number[];

  /** Explicit "no significant level found" marker */
  noneFound: boolean;
}

/**
 * Support and resistance derived from clustered pivots.
 *
 * @invariant every resistance level > currentPrice
 * @invariant every support level < currentPrice
 */
export interface SupportResistance {
  /** Close of the last bar */
  currentPrice: number;

  resistance: LevelSide;

  support: LevelSide;

  /** Number of pivot highs detected before clustering */
  pivotHighCount: number;

  /** Number of pivot lows detected before clustering */
  pivotLowCount: number;
}

export type TrendLabel = 'BULLISH' | 'BEARISH' | 'NEUTRAL';

export type RsiZone = 'OVERBOUGHT' | 'OVERSOLD' | 'NEUTRAL';

/** MACD is binary: there is no neutral reading */
export type MacdSignal = 'BULLISH' | 'BEARISH';

export type BollingerZone =
  | 'OVERBOUGHT'
  | 'OVERSOLD'
  | 'NEAR_OVERBOUGHT'
  | 'NEAR_OVERSOLD'
  | 'NEUTRAL';

/**
 * Five independent categorical judgments about the latest bar.
 *
 * No composite score is derived; downstream stages weigh them.
 */
export interface TrendInterpretation {
  longTerm: TrendLabel;

  shortTerm: TrendLabel;

  rsi: {
    zone: RsiZone;
    value: number | null;
  };

  macd: MacdSignal;

  bollinger: {
    zone: BollingerZone;
    /** (close - lower) / (upper - lower); null when bands are unavailable or flat */
    position: number | null;
  };
}

/**
 * Serializable result of one technical analysis run.
 */
export interface TechnicalSnapshot {
  ticker: string;

  /** Date of the last bar analyzed */
  asOf: string;

  barsAnalyzed: number;

  /** Close of the last bar */
  currentPrice: number;

  /** Up to four previous closes, T-1 first */
  recentCloses: number[];

  /** Indicator row of the last bar */
  latest: IndicatorRow;

  /** Full indicator table, when requested */
  table?: IndicatorTable;

  levels: SupportResistance;

  interpretation: TrendInterpretation;

  /** Non-fatal observations (e.g., long windows not yet available) */
  warnings: string[];
}
