/**
 * Fakes and sample data shared by the research tests.
 */

import { Writable } from 'node:stream';
import type {
  FundamentalSnapshot,
  FundamentalsProvider,
  GetDailyBarsParams,
  PriceBar,
  PriceHistoryProvider,
  TechnicalSnapshot,
} from '@research-desk/contracts';
import { createLogger, type Logger } from '@research-desk/logger';
import type { SectorBenchmarks } from '../src/valuation/sector-benchmarks.js';

export function silentLogger(): Logger {
  return createLogger({ level: 'error', console: false });
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * One bar per calendar day; close rises by 1 from `start`, high/low sit 1 away.
 */
export function rampBars(count: number, start = 100, firstDate = '2024-01-01'): PriceBar[] {
  const origin = Date.parse(`${firstDate}T00:00:00Z`);
  return Array.from({ length: count }, (_, i) => {
    const close = start + i;
    return {
      date: new Date(origin + i * DAY_MS).toISOString().slice(0, 10),
      open: close,
      high: close + 1,
      low: close - 1,
      close,
    };
  });
}

export class FakePriceProvider implements PriceHistoryProvider {
  readonly id = 'fake';
  readonly calls: GetDailyBarsParams[] = [];

  constructor(private readonly result: PriceBar[] | Error) {}

  async getDailyBars(params: GetDailyBarsParams): Promise<PriceBar[]> {
    this.calls.push(params);
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

export class FakeFundamentalsProvider implements FundamentalsProvider {
  readonly id = 'fake';
  readonly calls: string[] = [];

  constructor(private readonly result: FundamentalSnapshot | Error) {}

  async getFundamentals(ticker: string): Promise<FundamentalSnapshot> {
    this.calls.push(ticker);
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }
}

export function sampleFundamentals(): FundamentalSnapshot {
  return {
    ticker: 'ACME',
    companyName: 'Acme Robotics Inc.',
    sector: 'Technology',
    industry: 'Software - Application',
    ratios: {
      peRatio: 24.5,
      pbRatio: 6.2,
      roe: 0.31,
      roa: 0.12,
      profitMargin: 0.21,
      eps: 4.1,
      debtToEquity: 0.25,
      evToEbitda: 17.8,
    },
    quarters: [
      { periodEnd: '2024-09-30', revenue: 1_250_000_000, grossProfit: 800_000_000, netIncome: 262_500_000 },
      { periodEnd: '2024-06-30', revenue: 1_180_000_000, grossProfit: null, netIncome: 240_000_000 },
    ],
  };
}

export const TEST_BENCHMARKS: SectorBenchmarks = {
  asOf: '2024-06-30',
  sectors: {
    Technology: { peRatio: 28, pbRatio: 8 },
    Utilities: { peRatio: 18.5, pbRatio: null },
  },
};

export function sampleSnapshot(): TechnicalSnapshot {
  return {
    ticker: 'ACME',
    asOf: '2024-03-13',
    barsAnalyzed: 150,
    currentPrice: 1234.5,
    recentCloses: [1230, 1225.25, 1219.999, 1210],
    latest: {
      date: '2024-03-13',
      sma20: 1200.123,
      sma50: 1150,
      sma200: null,
      ema12: 1220.5,
      ema26: 1210.25,
      macd: 10.25,
      macdSignal: 8.5,
      macdHist: 1.75,
      rsi14: 64.321,
      bbUpper: 1260,
      bbMiddle: 1200,
      bbLower: 1140,
    },
    levels: {
      currentPrice: 1234.5,
      resistance: { levels: [], noneFound: true },
      support: { levels: [1201.5, 1150.25, 1099], noneFound: false },
      pivotHighCount: 0,
      pivotLowCount: 5,
    },
    interpretation: {
      longTerm: 'NEUTRAL',
      shortTerm: 'BULLISH',
      rsi: { zone: 'NEUTRAL', value: 64.321 },
      macd: 'BULLISH',
      bollinger: { zone: 'NEAR_OVERBOUGHT', position: 0.8292 },
    },
    warnings: ['SMA(200) unavailable: needs 200 bars, got 150'],
  };
}

/**
 * Writable that keeps everything written to it.
 */
export function captureStream(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}
