/**
 * @fileoverview Main entry point for @research-desk/contracts package.
 *
 * Exports all shared types, provider interfaces, and error classes for the
 * equity research pipeline.
 *
 * @module @research-desk/contracts
 */

// Market data types and provider contracts
export type {
  PriceBar,
  PriceSeries,
  GetDailyBarsParams,
  PriceHistoryProvider,
  FundamentalsProvider,
} from './market.js';

// Fundamentals
export type { FundamentalSnapshot, ValuationRatios, QuarterlyResult } from './fundamentals.js';

// Technical indicator outputs
export type {
  IndicatorRow,
  IndicatorTable,
  PivotLevel,
  LevelCluster,
  LevelSide,
  SupportResistance,
  TrendLabel,
  RsiZone,
  MacdSignal,
  BollingerZone,
  TrendInterpretation,
  TechnicalSnapshot,
} from './indicators.js';

// Error classes and guards
export {
  ResearchError,
  InsufficientDataError,
  InvalidSeriesError,
  InvalidConfigError,
  ProviderError,
  ProviderRateLimitError,
  SymbolResolutionError,
  isResearchError,
  isInsufficientDataError,
  isInvalidSeriesError,
  isProviderError,
  isProviderRateLimitError,
  isSymbolResolutionError,
} from './errors.js';
