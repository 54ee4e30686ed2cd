/**
 * @fileoverview Yahoo Finance response schemas and provider options.
 *
 * Responses are validated with zod before any field is read; the inferred
 * types below are the only view of Yahoo payloads the rest of the package
 * sees.
 *
 * @module @research-desk/provider-yahoo/types
 */

import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Logger } from '@research-desk/logger';

/**
 * Error object Yahoo embeds in chart and quoteSummary bodies.
 */
export const yahooApiErrorSchema = z.object({
  code: z.string(),
  description: z.string().nullish(),
});

export type YahooApiError = z.infer<typeof yahooApiErrorSchema>;

const priceArray = z.array(z.number().nullable()).optional();

/**
 * `/v8/finance/chart/{ticker}` response.
 */
export const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z
            .object({
              symbol: z.string().optional(),
              currency: z.string().nullish(),
              gmtoffset: z.number().optional(),
              exchangeTimezoneName: z.string().optional(),
            })
            .optional(),
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: priceArray,
                high: priceArray,
                low: priceArray,
                close: priceArray,
                volume: priceArray,
              })
            ),
            adjclose: z.array(z.object({ adjclose: priceArray })).optional(),
          }),
        })
      )
      .nullish(),
    error: yahooApiErrorSchema.nullish(),
  }),
});

export type YahooChartResponse = z.infer<typeof chartResponseSchema>;

/**
 * Yahoo numeric field: a bare number or `{ raw, fmt }`. Empty objects mean
 * "not reported".
 */
export const yahooNumberSchema = z
  .union([z.number(), z.object({ raw: z.number().nullish(), fmt: z.string().nullish() })])
  .nullish();

export type YahooNumber = z.infer<typeof yahooNumberSchema>;

const statementDateSchema = z
  .object({ raw: z.number().nullish(), fmt: z.string().nullish() })
  .nullish();

/**
 * `/v10/finance/quoteSummary/{ticker}` response, restricted to the modules
 * requested by YahooClient.
 */
export const quoteSummaryResponseSchema = z.object({
  quoteSummary: z.object({
    result: z
      .array(
        z.object({
          price: z
            .object({
              longName: z.string().nullish(),
              shortName: z.string().nullish(),
              currency: z.string().nullish(),
            })
            .nullish(),
          assetProfile: z
            .object({
              sector: z.string().nullish(),
              industry: z.string().nullish(),
            })
            .nullish(),
          summaryDetail: z.object({ trailingPE: yahooNumberSchema }).nullish(),
          defaultKeyStatistics: z
            .object({
              priceToBook: yahooNumberSchema,
              trailingEps: yahooNumberSchema,
              enterpriseToEbitda: yahooNumberSchema,
            })
            .nullish(),
          financialData: z
            .object({
              returnOnEquity: yahooNumberSchema,
              returnOnAssets: yahooNumberSchema,
              profitMargins: yahooNumberSchema,
              totalDebt: yahooNumberSchema,
            })
            .nullish(),
          incomeStatementHistoryQuarterly: z
            .object({
              incomeStatementHistory: z
                .array(
                  z.object({
                    endDate: statementDateSchema,
                    totalRevenue: yahooNumberSchema,
                    grossProfit: yahooNumberSchema,
                    netIncome: yahooNumberSchema,
                  })
                )
                .nullish(),
            })
            .nullish(),
          balanceSheetHistoryQuarterly: z
            .object({
              balanceSheetStatements: z
                .array(
                  z.object({
                    endDate: statementDateSchema,
                    totalStockholderEquity: yahooNumberSchema,
                  })
                )
                .nullish(),
            })
            .nullish(),
        })
      )
      .nullish(),
    error: yahooApiErrorSchema.nullish(),
  }),
});

export type YahooQuoteSummaryResponse = z.infer<typeof quoteSummaryResponseSchema>;

/**
 * Connection options for YahooClient.
 */
export interface YahooClientOptions {
  /**
   * API root.
   * @default 'https://query1.finance.yahoo.com'
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds.
   * @default 10000
   */
  timeout?: number;

  /**
   * Directory of recorded responses. When set, no HTTP request is made and
   * `{TICKER}-chart-1d.json` / `{TICKER}-quote-summary.json` are read instead.
   */
  fixturePath?: string;

  /**
   * Pre-configured axios instance (tests inject one with an in-process adapter).
   */
  httpClient?: AxiosInstance;

  /**
   * Crumb and cookie pair some quoteSummary deployments require.
   */
  crumb?: string;
  cookie?: string;

  logger?: Logger;
}

/**
 * Options for YahooProvider.
 */
export interface YahooProviderOptions extends YahooClientOptions {
  /**
   * Scale open/high/low by adjclose/close and report adjclose as close, so
   * prices are split- and dividend-adjusted.
   * @default true
   */
  adjusted?: boolean;
}
