/**
 * @fileoverview Sector valuation benchmarks.
 *
 * Sector-average P/E and P/B are read from a JSON table and compared with a
 * company's own ratios. A missing ratio on either side gives a null
 * comparison for that ratio, never a zero.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { FundamentalSnapshot } from '@research-desk/contracts';
import { InvalidConfigError } from '@research-desk/contracts';

export const DEFAULT_BENCHMARKS_PATH = fileURLToPath(
  new URL('../../data/sector-valuations.json', import.meta.url)
);

const sectorValuationSchema = z.object({
  peRatio: z.number().positive().nullable(),
  pbRatio: z.number().positive().nullable(),
});

export const sectorBenchmarksSchema = z.object({
  asOf: z.string(),
  sectors: z.record(sectorValuationSchema),
});

export type SectorValuation = z.infer<typeof sectorValuationSchema>;
export type SectorBenchmarks = z.infer<typeof sectorBenchmarksSchema>;

export interface RatioComparison {
  company: number;
  sector: number;
  /** (company - sector) / sector * 100 */
  premiumPct: number;
}

export interface SectorComparison {
  /** Sector name as it appears in the benchmark table */
  sector: string;
  benchmarksAsOf: string;
  peRatio: RatioComparison | null;
  pbRatio: RatioComparison | null;
}

/**
 * Read and validate a benchmark table.
 *
 * @throws {InvalidConfigError} When the file is not a valid benchmark table
 */
export function loadSectorBenchmarks(path: string = DEFAULT_BENCHMARKS_PATH): SectorBenchmarks {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const result = sectorBenchmarksSchema.safeParse(raw);

  if (!result.success) {
    throw new InvalidConfigError(`Invalid sector benchmark file: ${path}`, {
      path,
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  return result.data;
}

/**
 * Case-insensitive sector lookup.
 */
export function findSectorBenchmark(
  benchmarks: SectorBenchmarks,
  sector: string
): [name: string, valuation: SectorValuation] | null {
  const wanted = sector.trim().toLowerCase();
  for (const [name, valuation] of Object.entries(benchmarks.sectors)) {
    if (name.toLowerCase() === wanted) {
      return [name, valuation];
    }
  }
  return null;
}

export function compareRatio(company: number | null, sector: number | null): RatioComparison | null {
  if (company === null || sector === null || sector === 0) {
    return null;
  }
  return { company, sector, premiumPct: ((company - sector) / sector) * 100 };
}

/**
 * Compare a company's valuation ratios with its sector's averages.
 * Returns null when the company has no sector or the sector is not in the
 * table.
 *
 * @example
 * ```typescript
 * const comparison = compareToSector(snapshot, loadSectorBenchmarks());
 * comparison?.peRatio?.premiumPct; // -12.5 (trades at a discount)
 * ```
 */
export function compareToSector(
  snapshot: FundamentalSnapshot,
  benchmarks: SectorBenchmarks
): SectorComparison | null {
  if (!snapshot.sector) {
    return null;
  }

  const match = findSectorBenchmark(benchmarks, snapshot.sector);
  if (!match) {
    return null;
  }

  const [sector, valuation] = match;
  return {
    sector,
    benchmarksAsOf: benchmarks.asOf,
    peRatio: compareRatio(snapshot.ratios.peRatio, valuation.peRatio),
    pbRatio: compareRatio(snapshot.ratios.pbRatio, valuation.pbRatio),
  };
}
