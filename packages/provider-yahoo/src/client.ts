/**
 * HTTP client for the Yahoo Finance chart and quoteSummary endpoints.
 *
 * Returns raw JSON bodies; validation and mapping happen in the parser. In
 * fixture mode, recorded bodies are read from disk and no request is made.
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import type { Logger } from '@research-desk/logger';
import { symbolNotFound } from './errors.js';
import type { YahooClientOptions } from './types.js';

export const DEFAULT_BASE_URL = 'https://query1.finance.yahoo.com';

export const DEFAULT_TIMEOUT_MS = 10_000;

/**
 * quoteSummary modules needed for a FundamentalSnapshot.
 */
export const QUOTE_SUMMARY_MODULES = [
  'price',
  'assetProfile',
  'summaryDetail',
  'defaultKeyStatistics',
  'financialData',
  'incomeStatementHistoryQuarterly',
  'balanceSheetHistoryQuarterly',
] as const;

export class YahooClient {
  private readonly http: AxiosInstance;
  private readonly fixturePath: string | undefined;
  private readonly crumb: string | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: YahooClientOptions = {}) {
    this.fixturePath = options.fixturePath;
    this.crumb = options.crumb;
    this.logger = options.logger;
    this.http =
      options.httpClient ??
      axios.create({
        baseURL: options.baseUrl ?? DEFAULT_BASE_URL,
        timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
        headers: {
          Accept: 'application/json',
          ...(options.cookie ? { Cookie: options.cookie } : {}),
        },
      });
  }

  isFixtureMode(): boolean {
    return this.fixturePath !== undefined;
  }

  /**
   * Daily bars between period1 and period2.
   *
   * @example
   * ```typescript
   * const body = await client.getChart('MSFT', new Date('2024-01-01'), new Date('2025-05-15'));
   * ```
   */
  async getChart(ticker: string, period1: Date, period2: Date): Promise<unknown> {
    if (this.fixturePath !== undefined) {
      return this.readFixture(ticker, 'chart-1d');
    }

    const params = {
      interval: '1d',
      period1: Math.floor(period1.getTime() / 1000),
      period2: Math.floor(period2.getTime() / 1000),
      includePrePost: false,
      events: 'div,splits',
    };
    this.logger?.debug('Yahoo chart request', { ticker, ...params });

    const { data } = await this.http.get<unknown>(`/v8/finance/chart/${encodeURIComponent(ticker)}`, { params });
    return data;
  }

  /**
   * Company profile, valuation ratios and quarterly statements.
   */
  async getQuoteSummary(ticker: string): Promise<unknown> {
    if (this.fixturePath !== undefined) {
      return this.readFixture(ticker, 'quote-summary');
    }

    const params = {
      modules: QUOTE_SUMMARY_MODULES.join(','),
      ...(this.crumb ? { crumb: this.crumb } : {}),
    };
    this.logger?.debug('Yahoo quoteSummary request', { ticker, ...params });

    const { data } = await this.http.get<unknown>(`/v10/finance/quoteSummary/${encodeURIComponent(ticker)}`, {
      params,
    });
    return data;
  }

  /**
   * Reads `{fixturePath}/{TICKER}-{kind}.json`. A missing file means the
   * ticker is unknown.
   */
  private async readFixture(ticker: string, kind: 'chart-1d' | 'quote-summary'): Promise<unknown> {
    const file = join(this.fixturePath ?? '.', `${ticker}-${kind}.json`);
    this.logger?.debug('Reading Yahoo fixture', { ticker, file });

    let content: string;
    try {
      content = await readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw symbolNotFound(ticker, `no fixture at ${file}`);
      }
      throw error;
    }

    const body: unknown = JSON.parse(content);
    return body;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
