/**
 * @fileoverview Public API for @research-desk/provider-yahoo.
 *
 * @module @research-desk/provider-yahoo
 * @example
 * ```typescript
 * import { YahooProvider } from '@research-desk/provider-yahoo';
 *
 * const provider = new YahooProvider({ fixturePath: './__fixtures__' });
 * const bars = await provider.getDailyBars({ ticker: 'ACME', lookbackDays: 500 });
 * ```
 */

export { YahooProvider } from './yahoo-provider.js';

export { YahooClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, QUOTE_SUMMARY_MODULES } from './client.js';

export {
  parseChartResponse,
  parseQuoteSummary,
  toSessionDate,
  yahooNumber,
  debtToEquity,
  QUARTERS_REPORTED,
} from './parser.js';
export type { ChartParseOptions } from './parser.js';

export { mapYahooError, extractYahooError, PROVIDER_ID } from './errors.js';

export type {
  YahooClientOptions,
  YahooProviderOptions,
  YahooChartResponse,
  YahooQuoteSummaryResponse,
  YahooApiError,
} from './types.js';
