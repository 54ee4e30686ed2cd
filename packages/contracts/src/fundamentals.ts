/**
 * @fileoverview Fundamental data types.
 *
 * Every numeric or descriptive field is nullable: providers routinely omit
 * ratios for young companies, funds, or foreign listings, and consumers render
 * null as "N/A" rather than failing.
 *
 * @module @research-desk/contracts/fundamentals
 */

/**
 * Key valuation and profitability ratios (trailing twelve months unless noted).
 */
export interface ValuationRatios {
  /** Trailing price-to-earnings */
  peRatio: number | null;

  /** Price-to-book */
  pbRatio: number | null;

  /** Return on equity, as a fraction (0.25 = 25%) */
  roe: number | null;

  /** Return on assets, as a fraction */
  roa: number | null;

  /** Net profit margin, as a fraction */
  profitMargin: number | null;

  /** Trailing earnings per share */
  eps: number | null;

  /** Total debt divided by latest stockholder equity */
  debtToEquity: number | null;

  /** Enterprise value to EBITDA */
  evToEbitda: number | null;
}

/**
 * Income statement highlights for one fiscal quarter.
 */
export interface QuarterlyResult {
  /** Quarter end date (YYYY-MM-DD), null when the provider omits it */
  periodEnd: string | null;

  revenue: number | null;

  grossProfit: number | null;

  netIncome: number | null;
}

/**
 * Fundamentals for a single company.
 *
 * @example
 * ```typescript
 * const snapshot: FundamentalSnapshot = {
 *   ticker: 'ACME',
 *   companyName: 'Acme Corp',
 *   sector: 'Industrials',
 *   industry: 'Machinery',
 *   ratios: { peRatio: 18.2, pbRatio: 3.1, roe: 0.17, roa: 0.08,
 *             profitMargin: 0.11, eps: 4.2, debtToEquity: 0.6, evToEbitda: 12.4 },
 *   quarters: [],
 * };
 * ```
 */
export interface FundamentalSnapshot {
  ticker: string;

  companyName: string | null;

  sector: string | null;

  industry: string | null;

  ratios: ValuationRatios;

  /** Up to four most recent quarters, newest first */
  quarters: QuarterlyResult[];
}
