/**
 * @fileoverview Price series precondition checks.
 * @module @research-desk/indicators/validation
 */

import type { PriceSeries } from '@research-desk/contracts';
import { InsufficientDataError, InvalidSeriesError } from '@research-desk/contracts';

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const PRICE_FIELDS = ['open', 'high', 'low', 'close'] as const;

/**
 * Verifies a series before any indicator is computed.
 *
 * @throws {InsufficientDataError} If the series is empty or shorter than minBars
 * @throws {InvalidSeriesError} On a non-finite price, high below low, a
 *   malformed date, or dates that are not strictly ascending
 */
export function validateSeries(series: PriceSeries, minBars = 1, ticker?: string): void {
  if (series.length === 0 || series.length < minBars) {
    const subject = ticker ? ` for ${ticker}` : '';
    throw new InsufficientDataError(
      series.length === 0
        ? `No price history available${subject}`
        : `Need at least ${minBars} bars${subject}, got ${series.length}`,
      { required: Math.max(minBars, 1), received: series.length, ...(ticker ? { ticker } : {}) }
    );
  }

  let previousDate: string | null = null;

  series.forEach((bar, index) => {
    for (const field of PRICE_FIELDS) {
      if (!Number.isFinite(bar[field])) {
        throw new InvalidSeriesError(`Invalid ${field} at bar[${index}]: ${bar[field]}`, {
          index,
          field,
          date: bar.date,
        });
      }
    }

    if (bar.high < bar.low) {
      throw new InvalidSeriesError(`Invalid bar[${index}]: high (${bar.high}) < low (${bar.low})`, {
        index,
        date: bar.date,
      });
    }

    if (!DATE_PATTERN.test(bar.date) || Number.isNaN(Date.parse(`${bar.date}T00:00:00Z`))) {
      throw new InvalidSeriesError(`Invalid date at bar[${index}]: "${bar.date}"`, {
        index,
        date: bar.date,
      });
    }

    if (previousDate !== null && bar.date <= previousDate) {
      throw new InvalidSeriesError(
        bar.date === previousDate
          ? `Duplicate date ${bar.date} at bar[${index}]`
          : `Bars must be in chronological order: bar[${index}] (${bar.date}) <= bar[${index - 1}] (${previousDate})`,
        { index, date: bar.date }
      );
    }

    previousDate = bar.date;
  });
}
