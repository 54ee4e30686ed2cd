/**
 * Tests for sector valuation benchmarks
 */

import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import { InvalidConfigError } from '@research-desk/contracts';
import {
  compareRatio,
  compareToSector,
  findSectorBenchmark,
  loadSectorBenchmarks,
} from '../src/valuation/sector-benchmarks.js';
import { TEST_BENCHMARKS, sampleFundamentals } from './helpers.js';

describe('loadSectorBenchmarks', () => {
  it('should load the bundled table', () => {
    const benchmarks = loadSectorBenchmarks();

    expect(benchmarks.asOf).toBe('2024-06-30');
    expect(Object.keys(benchmarks.sectors)).toHaveLength(11);
    expect(benchmarks.sectors['Technology']).toEqual({ peRatio: 28, pbRatio: 8 });
  });

  it('should reject a malformed table', () => {
    const dir = mkdtempSync(join(tmpdir(), 'benchmarks-'));
    const path = join(dir, 'bad.json');
    writeFileSync(path, JSON.stringify({ sectors: { Energy: { peRatio: 'cheap', pbRatio: 2 } } }));

    expect(() => loadSectorBenchmarks(path)).toThrow(InvalidConfigError);
    expect(() => loadSectorBenchmarks(path)).toThrow(`Invalid sector benchmark file: ${path}`);
  });
});

describe('findSectorBenchmark', () => {
  it('should match sector names case-insensitively', () => {
    expect(findSectorBenchmark(TEST_BENCHMARKS, ' technology ')).toEqual([
      'Technology',
      { peRatio: 28, pbRatio: 8 },
    ]);
  });

  it('should return null for an unknown sector', () => {
    expect(findSectorBenchmark(TEST_BENCHMARKS, 'Shipping')).toBeNull();
  });
});

describe('compareRatio', () => {
  it('should compute the premium over the sector', () => {
    expect(compareRatio(24.5, 28)).toEqual({ company: 24.5, sector: 28, premiumPct: -12.5 });
    expect(compareRatio(35, 28)?.premiumPct).toBe(25);
  });

  it('should return null when either side is missing', () => {
    expect(compareRatio(null, 28)).toBeNull();
    expect(compareRatio(24.5, null)).toBeNull();
    expect(compareRatio(24.5, 0)).toBeNull();
  });
});

describe('compareToSector', () => {
  it('should compare P/E and P/B against the sector', () => {
    const comparison = compareToSector(sampleFundamentals(), TEST_BENCHMARKS);

    expect(comparison?.sector).toBe('Technology');
    expect(comparison?.benchmarksAsOf).toBe('2024-06-30');
    expect(comparison?.peRatio).toEqual({ company: 24.5, sector: 28, premiumPct: -12.5 });
    expect(comparison?.pbRatio?.premiumPct).toBeCloseTo(-22.5, 10);
  });

  it('should leave a ratio null when the sector lacks it', () => {
    const snapshot = { ...sampleFundamentals(), sector: 'Utilities' };

    const comparison = compareToSector(snapshot, TEST_BENCHMARKS);

    expect(comparison?.pbRatio).toBeNull();
    expect(comparison?.peRatio?.sector).toBe(18.5);
  });

  it('should return null without a known sector', () => {
    expect(compareToSector({ ...sampleFundamentals(), sector: null }, TEST_BENCHMARKS)).toBeNull();
    expect(compareToSector({ ...sampleFundamentals(), sector: 'Shipping' }, TEST_BENCHMARKS)).toBeNull();
  });
});
