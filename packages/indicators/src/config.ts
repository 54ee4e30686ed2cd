/**
 * @fileoverview Indicator engine configuration.
 *
 * @module @research-desk/indicators/config
 */

import { InvalidConfigError } from '@research-desk/contracts';

/**
 * Tunable parameters of the indicator engine.
 *
 * The IndicatorRow field names (rsi14, ema12, ema26, ...) follow the
 * defaults; when a period is overridden the field carries the configured
 * period instead.
 *
 * @example
 * ```typescript
 * const config = mergeEngineConfig({ pivotWindow: 6, clusterThreshold: 0.02 });
 * ```
 */
export interface IndicatorEngineConfig {
  /**
   * Rolling window for RSI averages (simple mean, not Wilder smoothing).
   * @default 14
   */
  rsiPeriod: number;

  /**
   * Window for the Bollinger middle band and standard deviation.
   * @default 20
   */
  bollingerPeriod: number;

  /**
   * Band width in sample standard deviations.
   * @default 2
   */
  bollingerStdDev: number;

  /** @default 12 */
  macdFast: number;

  /** @default 26 */
  macdSlow: number;

  /** @default 9 */
  macdSignal: number;

  /**
   * Size of the centered window used for pivot detection.
   * @default 10
   */
  pivotWindow: number;

  /**
   * Relative distance below which neighbouring pivots merge into one level.
   * @default 0.03
   */
  clusterThreshold: number;

  /**
   * Maximum levels reported on each side of the current price.
   * @default 3
   */
  maxLevels: number;

  /**
   * Minimum number of bars accepted by analyzeTechnicals.
   * @default 1
   */
  minBars: number;
}

export const DEFAULT_ENGINE_CONFIG: Readonly<IndicatorEngineConfig> = {
  rsiPeriod: 14,
  bollingerPeriod: 20,
  bollingerStdDev: 2,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  pivotWindow: 10,
  clusterThreshold: 0.03,
  maxLevels: 3,
  minBars: 1,
};

/**
 * Throws InvalidConfigError unless value is an integer >= min.
 */
export function assertPeriod(field: string, value: number, min = 1): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidConfigError(`${field} must be an integer >= ${min}, got ${value}`, {
      field,
      value,
    });
  }
}

/**
 * Merges overrides over DEFAULT_ENGINE_CONFIG and validates the result.
 * Undefined overrides keep the default.
 *
 * @throws {InvalidConfigError} If any value is out of range
 */
export function mergeEngineConfig(overrides: Partial<IndicatorEngineConfig> = {}): IndicatorEngineConfig {
  const config: IndicatorEngineConfig = {
    rsiPeriod: overrides.rsiPeriod ?? DEFAULT_ENGINE_CONFIG.rsiPeriod,
    bollingerPeriod: overrides.bollingerPeriod ?? DEFAULT_ENGINE_CONFIG.bollingerPeriod,
    bollingerStdDev: overrides.bollingerStdDev ?? DEFAULT_ENGINE_CONFIG.bollingerStdDev,
    macdFast: overrides.macdFast ?? DEFAULT_ENGINE_CONFIG.macdFast,
    macdSlow: overrides.macdSlow ?? DEFAULT_ENGINE_CONFIG.macdSlow,
    macdSignal: overrides.macdSignal ?? DEFAULT_ENGINE_CONFIG.macdSignal,
    pivotWindow: overrides.pivotWindow ?? DEFAULT_ENGINE_CONFIG.pivotWindow,
    clusterThreshold: overrides.clusterThreshold ?? DEFAULT_ENGINE_CONFIG.clusterThreshold,
    maxLevels: overrides.maxLevels ?? DEFAULT_ENGINE_CONFIG.maxLevels,
    minBars: overrides.minBars ?? DEFAULT_ENGINE_CONFIG.minBars,
  };

  assertPeriod('rsiPeriod', config.rsiPeriod);
  // Sample standard deviation needs two points
  assertPeriod('bollingerPeriod', config.bollingerPeriod, 2);
  assertPeriod('macdFast', config.macdFast);
  assertPeriod('macdSlow', config.macdSlow);
  assertPeriod('macdSignal', config.macdSignal);
  assertPeriod('pivotWindow', config.pivotWindow, 3);
  assertPeriod('maxLevels', config.maxLevels);
  assertPeriod('minBars', config.minBars);

  if (!(config.bollingerStdDev > 0) || !Number.isFinite(config.bollingerStdDev)) {
    throw new InvalidConfigError(`bollingerStdDev must be a positive number, got ${config.bollingerStdDev}`, {
      field: 'bollingerStdDev',
      value: config.bollingerStdDev,
    });
  }

  if (!(config.clusterThreshold > 0 && config.clusterThreshold < 1)) {
    throw new InvalidConfigError(`clusterThreshold must be in (0, 1), got ${config.clusterThreshold}`, {
      field: 'clusterThreshold',
      value: config.clusterThreshold,
    });
  }

  if (config.macdFast >= config.macdSlow) {
    throw new InvalidConfigError(
      `macdFast (${config.macdFast}) must be shorter than macdSlow (${config.macdSlow})`,
      { field: 'macdFast', value: config.macdFast }
    );
  }

  return config;
}
