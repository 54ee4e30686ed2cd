/**
 * Ticker argument validation shared by all commands.
 */

import { ResearchCommandError, ResearchErrorCode } from './errors.js';

/**
 * A letter followed by up to nine letters, digits, dots or dashes
 * (BRK.B, RDS-A).
 */
export const TICKER_PATTERN = /^[A-Za-z][A-Za-z0-9.\-]{0,9}$/;

/**
 * Validate and upper-case a ticker argument.
 *
 * @throws {ResearchCommandError} INVALID_ARGS when missing or malformed
 */
export function normalizeTicker(raw: string | undefined): string {
  const ticker = raw?.trim();

  if (!ticker) {
    throw new ResearchCommandError(ResearchErrorCode.INVALID_ARGS, 'Missing required argument: ticker', {
      argument: 'ticker',
    });
  }

  if (!TICKER_PATTERN.test(ticker)) {
    throw new ResearchCommandError(ResearchErrorCode.INVALID_ARGS, `Invalid ticker: ${ticker}`, {
      argument: 'ticker',
      value: ticker,
    });
  }

  return ticker.toUpperCase();
}
