/**
 * Maps Yahoo Finance failures onto the shared error taxonomy.
 */

import axios from 'axios';
import { z } from 'zod';
import {
  ProviderError,
  ProviderRateLimitError,
  SymbolResolutionError,
  isResearchError,
} from '@research-desk/contracts';
import type { ResearchError } from '@research-desk/contracts';
import { yahooApiErrorSchema } from './types.js';
import type { YahooApiError } from './types.js';

export const PROVIDER_ID = 'yahoo';

const NOT_FOUND_CODE = 'Not Found';

const errorBodySchema = z.object({
  chart: z.object({ error: yahooApiErrorSchema.nullish() }).optional(),
  quoteSummary: z.object({ error: yahooApiErrorSchema.nullish() }).optional(),
});

/**
 * Pulls the embedded `{ code, description }` error out of a Yahoo body, if any.
 */
export function extractYahooError(body: unknown): YahooApiError | null {
  const parsed = errorBodySchema.safeParse(body);
  if (!parsed.success) {
    return null;
  }
  return parsed.data.chart?.error ?? parsed.data.quoteSummary?.error ?? null;
}

export function isNotFound(apiError: YahooApiError | null): boolean {
  return apiError?.code === NOT_FOUND_CODE;
}

export function symbolNotFound(ticker: string, detail?: string | null): SymbolResolutionError {
  return new SymbolResolutionError(`Ticker "${ticker}" not found on Yahoo Finance${detail ? `: ${detail}` : ''}`, {
    ticker,
    provider: PROVIDER_ID,
  });
}

/**
 * Converts anything thrown while talking to Yahoo into a ResearchError.
 *
 * - 404, or a body whose error code is "Not Found" -> SymbolResolutionError
 * - 429 -> ProviderRateLimitError (with retryAfter when the header is numeric)
 * - anything else -> ProviderError
 *
 * ResearchErrors pass through unchanged.
 */
export function mapYahooError(error: unknown, ticker: string, operation: string): ResearchError {
  if (isResearchError(error)) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    const apiError = extractYahooError(error.response?.data);

    if (status === 404 || isNotFound(apiError)) {
      return symbolNotFound(ticker, apiError?.description);
    }

    if (status === 429) {
      const retryAfter = Number(error.response?.headers['retry-after']);
      return new ProviderRateLimitError(`Yahoo Finance rate limit exceeded during ${operation}`, {
        provider: PROVIDER_ID,
        ticker,
        ...(Number.isFinite(retryAfter) ? { retryAfter } : {}),
      });
    }

    return new ProviderError(
      `Yahoo Finance ${operation} failed for ${ticker}: ${apiError?.description ?? error.message}`,
      { provider: PROVIDER_ID, ticker, statusCode: status, errorCode: error.code }
    );
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProviderError(`Yahoo Finance ${operation} failed for ${ticker}: ${message}`, {
    provider: PROVIDER_ID,
    ticker,
  });
}
