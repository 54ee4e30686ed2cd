/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
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
} from '../src/errors.js';

describe('ResearchError', () => {
  it('should create error with code and message', () => {
    const error = new ResearchError('TEST_CODE', 'Test message');

    expect(error.name).toBe('ResearchError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.timestamp).toBeDefined();
    expect(error.stack).toBeDefined();
  });

  it('should include optional data', () => {
    const data = { foo: 'bar', count: 42 };
    const error = new ResearchError('TEST_CODE', 'Test message', data);

    expect(error.data).toEqual(data);
  });

  it('should have valid ISO timestamp', () => {
    const error = new ResearchError('TEST_CODE', 'Test message');
    const timestamp = new Date(error.timestamp);

    expect(timestamp.toISOString()).toBe(error.timestamp);
  });

  it('should serialize to JSON correctly', () => {
    const error = new ResearchError('TEST_CODE', 'Test message', { key: 'value' });
    const json = error.toJSON();

    expect(json['name']).toBe('ResearchError');
    expect(json['code']).toBe('TEST_CODE');
    expect(json['message']).toBe('Test message');
    expect(json['data']).toEqual({ key: 'value' });
    expect(json['timestamp']).toBe(error.timestamp);
  });

  it('should be JSON stringifiable', () => {
    const error = new ResearchError('TEST_CODE', 'Test message', { key: 'value' });
    const parsed: unknown = JSON.parse(JSON.stringify(error));

    expect(parsed).toMatchObject({ name: 'ResearchError', code: 'TEST_CODE', message: 'Test message' });
  });
});

describe('InsufficientDataError', () => {
  it('should carry required and received counts', () => {
    const error = new InsufficientDataError('No price history', {
      required: 1,
      received: 0,
      ticker: 'ACME',
    });

    expect(error.name).toBe('InsufficientDataError');
    expect(error.code).toBe('INSUFFICIENT_DATA');
    expect(error.data).toEqual({ required: 1, received: 0, ticker: 'ACME' });
    expect(error).toBeInstanceOf(ResearchError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('InvalidSeriesError', () => {
  it('should record the offending index', () => {
    const error = new InvalidSeriesError('Duplicate date', { index: 3, date: '2025-01-03' });

    expect(error.code).toBe('INVALID_SERIES');
    expect(error.data?.['index']).toBe(3);
  });
});

describe('InvalidConfigError', () => {
  it('should record field and value', () => {
    const error = new InvalidConfigError('pivotWindow must be >= 3', { field: 'pivotWindow', value: 1 });

    expect(error.code).toBe('INVALID_CONFIG');
    expect(error.data).toEqual({ field: 'pivotWindow', value: 1 });
  });
});

describe('ProviderError', () => {
  it('should default to PROVIDER_ERROR code', () => {
    const error = new ProviderError('Upstream failed', { provider: 'yahoo', statusCode: 503 });

    expect(error.name).toBe('ProviderError');
    expect(error.code).toBe('PROVIDER_ERROR');
    expect(error.data?.['statusCode']).toBe(503);
  });
});

describe('ProviderRateLimitError', () => {
  it('should create rate limit error with provider data', () => {
    const error = new ProviderRateLimitError('Rate limit exceeded', {
      provider: 'yahoo',
      retryAfter: 60,
    });

    expect(error.name).toBe('ProviderRateLimitError');
    expect(error.code).toBe('PROVIDER_RATE_LIMIT');
    expect(error.data).toEqual({ provider: 'yahoo', retryAfter: 60, statusCode: 429 });
    expect(error).toBeInstanceOf(ProviderError);
  });
});

describe('SymbolResolutionError', () => {
  it('should include ticker and provider', () => {
    const error = new SymbolResolutionError('Ticker "ACMEE" not found', {
      ticker: 'ACMEE',
      provider: 'yahoo',
    });

    expect(error.code).toBe('SYMBOL_NOT_FOUND');
    expect(error.data?.['ticker']).toBe('ACMEE');
  });
});

describe('type guards', () => {
  const insufficient = new InsufficientDataError('x', { required: 1, received: 0 });
  const invalid = new InvalidSeriesError('x', { index: 0 });
  const provider = new ProviderError('x', { provider: 'yahoo' });
  const rateLimit = new ProviderRateLimitError('x', { provider: 'yahoo' });
  const symbol = new SymbolResolutionError('x', { ticker: 'X', provider: 'yahoo' });

  it('isResearchError accepts every subclass and rejects plain errors', () => {
    for (const err of [insufficient, invalid, provider, rateLimit, symbol]) {
      expect(isResearchError(err)).toBe(true);
    }
    expect(isResearchError(new Error('plain'))).toBe(false);
    expect(isResearchError('string')).toBe(false);
  });

  it('specific guards only match their class', () => {
    expect(isInsufficientDataError(insufficient)).toBe(true);
    expect(isInsufficientDataError(invalid)).toBe(false);
    expect(isInvalidSeriesError(invalid)).toBe(true);
    expect(isProviderError(rateLimit)).toBe(true);
    expect(isProviderRateLimitError(provider)).toBe(false);
    expect(isProviderRateLimitError(rateLimit)).toBe(true);
    expect(isSymbolResolutionError(symbol)).toBe(true);
    expect(isSymbolResolutionError(provider)).toBe(false);
  });
});
