/**
 * @fileoverview Parsers for Yahoo Finance responses.
 *
 * Converts validated chart and quoteSummary bodies into the PriceBar and
 * FundamentalSnapshot shapes defined in @research-desk/contracts.
 *
 * @module @research-desk/provider-yahoo/parser
 */

import type { FundamentalSnapshot, PriceBar, QuarterlyResult } from '@research-desk/contracts';
import { ProviderError } from '@research-desk/contracts';
import type { ZodIssue } from 'zod';
import { extractYahooError, isNotFound, PROVIDER_ID, symbolNotFound } from './errors.js';
import { chartResponseSchema, quoteSummaryResponseSchema } from './types.js';
import type { YahooNumber } from './types.js';

/**
 * Quarters reported in a FundamentalSnapshot.
 */
export const QUARTERS_REPORTED = 4;

export interface ChartParseOptions {
  ticker: string;

  /** @default true */
  adjusted?: boolean;
}

function shapeError(ticker: string, endpoint: string, issues: ZodIssue[]): ProviderError {
  return new ProviderError(`Unexpected Yahoo ${endpoint} response for ${ticker}`, {
    provider: PROVIDER_ID,
    ticker,
    issues: issues.slice(0, 5).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  });
}

/**
 * Session date of an epoch-seconds timestamp in the exchange's local time.
 *
 * @example
 * ```typescript
 * toSessionDate(1709562600, -18000); // '2024-03-04' (09:30 New York)
 * ```
 */
export function toSessionDate(epochSeconds: number, gmtOffsetSeconds = 0): string {
  return new Date((epochSeconds + gmtOffsetSeconds) * 1000).toISOString().slice(0, 10);
}

/**
 * Parses a chart response into daily bars, oldest first.
 *
 * - Bars with any missing OHLC value are dropped.
 * - When two timestamps fall on the same session date the later one wins
 *   (Yahoo appends a live bar for the current session).
 * - When adjusted, open/high/low are scaled by adjclose/close and close is
 *   replaced by adjclose.
 *
 * @throws {SymbolResolutionError} If the body reports "Not Found"
 * @throws {ProviderError} If the body does not match the expected shape
 */
export function parseChartResponse(raw: unknown, options: ChartParseOptions): PriceBar[] {
  const { ticker, adjusted = true } = options;

  const apiError = extractYahooError(raw);
  if (isNotFound(apiError)) {
    throw symbolNotFound(ticker, apiError?.description);
  }

  const parsed = chartResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw shapeError(ticker, 'chart', parsed.error.issues);
  }

  const result = parsed.data.chart.result?.[0];
  if (!result) {
    if (apiError) {
      throw new ProviderError(`Yahoo chart error for ${ticker}: ${apiError.description ?? apiError.code}`, {
        provider: PROVIDER_ID,
        ticker,
        errorCode: apiError.code,
      });
    }
    return [];
  }

  const timestamps = result.timestamp ?? [];
  const quote = result.indicators.quote[0];
  const adjCloses = result.indicators.adjclose?.[0]?.adjclose;
  const gmtOffset = result.meta?.gmtoffset ?? 0;

  if (!quote) {
    return [];
  }

  const byDate = new Map<string, PriceBar>();

  timestamps.forEach((timestamp, i) => {
    const open = quote.open?.[i];
    const high = quote.high?.[i];
    const low = quote.low?.[i];
    const close = quote.close?.[i];

    if (open == null || high == null || low == null || close == null) {
      return;
    }

    const adjClose = adjCloses?.[i];
    const factor = adjusted && adjClose != null && close !== 0 ? adjClose / close : 1;

    const date = toSessionDate(timestamp, gmtOffset);
    byDate.set(date, {
      date,
      open: open * factor,
      high: high * factor,
      low: low * factor,
      close: factor === 1 ? close : (adjClose ?? close),
    });
  });

  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/**
 * Reads a Yahoo number field; null when absent or not finite.
 */
export function yahooNumber(value: YahooNumber): number | null {
  const n = typeof value === 'number' ? value : value?.raw;
  return typeof n === 'number' && Number.isFinite(n) ? n : null;
}

function statementDate(value: { raw?: number | null; fmt?: string | null } | null | undefined): string | null {
  if (value?.fmt) {
    return value.fmt;
  }
  return typeof value?.raw === 'number' ? toSessionDate(value.raw) : null;
}

/**
 * Debt-to-equity from total debt and the latest quarterly equity; null when
 * either is missing or equity is zero.
 */
export function debtToEquity(totalDebt: number | null, equity: number | null): number | null {
  if (totalDebt === null || equity === null || equity === 0) {
    return null;
  }
  return totalDebt / equity;
}

/**
 * Parses a quoteSummary response into a FundamentalSnapshot. Every field the
 * response does not carry is null.
 *
 * @throws {SymbolResolutionError} If the body reports "Not Found" or has no result
 * @throws {ProviderError} If the body does not match the expected shape
 */
export function parseQuoteSummary(ticker: string, raw: unknown): FundamentalSnapshot {
  const apiError = extractYahooError(raw);
  if (isNotFound(apiError)) {
    throw symbolNotFound(ticker, apiError?.description);
  }

  const parsed = quoteSummaryResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw shapeError(ticker, 'quoteSummary', parsed.error.issues);
  }

  const result = parsed.data.quoteSummary.result?.[0];
  if (!result) {
    throw symbolNotFound(ticker, apiError?.description);
  }

  const { price, assetProfile, summaryDetail, defaultKeyStatistics, financialData } = result;
  const income = result.incomeStatementHistoryQuarterly?.incomeStatementHistory ?? [];
  const balance = result.balanceSheetHistoryQuarterly?.balanceSheetStatements ?? [];

  const quarters: QuarterlyResult[] = income.slice(0, QUARTERS_REPORTED).map((statement) => ({
    periodEnd: statementDate(statement.endDate),
    revenue: yahooNumber(statement.totalRevenue),
    grossProfit: yahooNumber(statement.grossProfit),
    netIncome: yahooNumber(statement.netIncome),
  }));

  return {
    ticker,
    companyName: price?.longName || price?.shortName || null,
    sector: assetProfile?.sector || null,
    industry: assetProfile?.industry || null,
    ratios: {
      peRatio: yahooNumber(summaryDetail?.trailingPE),
      pbRatio: yahooNumber(defaultKeyStatistics?.priceToBook),
      roe: yahooNumber(financialData?.returnOnEquity),
      roa: yahooNumber(financialData?.returnOnAssets),
      profitMargin: yahooNumber(financialData?.profitMargins),
      eps: yahooNumber(defaultKeyStatistics?.trailingEps),
      debtToEquity: debtToEquity(
        yahooNumber(financialData?.totalDebt),
        yahooNumber(balance[0]?.totalStockholderEquity)
      ),
      evToEbitda: yahooNumber(defaultKeyStatistics?.enterpriseToEbitda),
    },
    quarters,
  };
}
