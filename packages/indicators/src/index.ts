/**
 * @research-desk/indicators
 *
 * Deterministic technical indicator engine: rolling statistics,
 * support/resistance clustering and trend interpretation over daily bars.
 * No I/O; identical input always gives identical output.
 *
 * @packageDocumentation
 */

export type { IndicatorEngineConfig } from './config.js';
export { DEFAULT_ENGINE_CONFIG, mergeEngineConfig } from './config.js';

export type { MacdSeries, BollingerSeries } from './rolling.js';
export { sma, ema, rollingStd, rsi, macd, bollinger } from './rolling.js';

export { computeIndicatorTable } from './table.js';

export type { PivotSet } from './levels.js';
export { detectPivots, pivotWindowBounds, clusterLevels, findSupportResistance } from './levels.js';

export {
  interpretTrend,
  classifyLongTerm,
  classifyShortTerm,
  classifyRsi,
  classifyMacd,
  classifyBollinger,
  bandPosition,
  RSI_OVERBOUGHT,
  RSI_OVERSOLD,
} from './interpretation.js';

export { validateSeries } from './validation.js';

export type { AnalyzeOptions } from './analyze.js';
export { analyzeTechnicals, collectWarnings, RECENT_CLOSE_COUNT } from './analyze.js';
