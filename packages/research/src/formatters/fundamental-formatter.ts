/**
 * Fundamentals report formatter
 */

import type { FundamentalSnapshot, QuarterlyResult } from '@research-desk/contracts';
import type { OutputFormat } from '../commands/types.js';
import type { RatioComparison, SectorComparison } from '../valuation/sector-benchmarks.js';
import {
  NOT_AVAILABLE,
  formatFixed,
  formatMoney,
  formatPercent,
  formatSignedPercent,
} from './number-format.js';

/**
 * Formatter for fundamental snapshots.
 *
 * `comparison` controls the sector section: omitted leaves it out, null
 * reports that no benchmark exists for the company's sector.
 */
export class FundamentalFormatter {
  format(
    snapshot: FundamentalSnapshot,
    format: OutputFormat = 'text',
    comparison?: SectorComparison | null
  ): string {
    switch (format) {
      case 'json':
        return JSON.stringify(
          comparison === undefined ? snapshot : { ...snapshot, sectorComparison: comparison },
          null,
          2
        );
      case 'markdown':
        return this.formatAsMarkdown(snapshot, comparison);
      case 'text':
      default:
        return this.formatAsText(snapshot, comparison);
    }
  }

  private formatAsText(snapshot: FundamentalSnapshot, comparison?: SectorComparison | null): string {
    const lines: string[] = [];

    lines.push(`Ticker: ${snapshot.ticker}`);
    for (const [label, value] of this.summaryLines(snapshot)) {
      lines.push(`${label}: ${value}`);
    }

    lines.push('');
    lines.push(`LAST ${snapshot.quarters.length} QUARTERS:`);
    if (snapshot.quarters.length === 0) {
      lines.push('  (no quarterly results reported)');
    }
    snapshot.quarters.forEach((quarter, i) => {
      lines.push(`Quarter T-${i + 1}${quarter.periodEnd ? ` (${quarter.periodEnd})` : ''}:`);
      for (const [label, value] of this.quarterLines(quarter)) {
        lines.push(`  • ${label}: ${value}`);
      }
    });

    if (comparison !== undefined) {
      lines.push('');
      if (comparison === null) {
        lines.push('SECTOR COMPARISON:');
        lines.push(`  (no benchmark for sector ${snapshot.sector ?? NOT_AVAILABLE})`);
      } else {
        lines.push(`SECTOR COMPARISON (${comparison.sector}, benchmarks as of ${comparison.benchmarksAsOf}):`);
        lines.push(`  P/E: ${this.comparisonText(comparison.peRatio)}`);
        lines.push(`  P/B: ${this.comparisonText(comparison.pbRatio)}`);
      }
    }

    return lines.join('\n');
  }

  private formatAsMarkdown(snapshot: FundamentalSnapshot, comparison?: SectorComparison | null): string {
    const lines: string[] = [];

    lines.push(`# Fundamental Analysis: ${snapshot.ticker}`);
    lines.push('');
    for (const [label, value] of this.summaryLines(snapshot)) {
      lines.push(`- **${label}**: ${value}`);
    }
    lines.push('');

    lines.push('## Last Quarters');
    lines.push('');
    if (snapshot.quarters.length === 0) {
      lines.push('*No quarterly results reported*');
    } else {
      lines.push('| Quarter | Period End | Revenue | Gross Profit | Net Income |');
      lines.push('|---------|------------|---------|--------------|------------|');
      snapshot.quarters.forEach((quarter, i) => {
        const cells = this.quarterLines(quarter).map(([, value]) => value);
        lines.push(`| T-${i + 1} | ${quarter.periodEnd ?? NOT_AVAILABLE} | ${cells.join(' | ')} |`);
      });
    }

    if (comparison !== undefined) {
      lines.push('');
      lines.push('## Sector Comparison');
      lines.push('');
      if (comparison === null) {
        lines.push(`*No benchmark for sector ${snapshot.sector ?? NOT_AVAILABLE}*`);
      } else {
        lines.push(`Sector: ${comparison.sector} (benchmarks as of ${comparison.benchmarksAsOf})`);
        lines.push('');
        lines.push(`- **P/E**: ${this.comparisonText(comparison.peRatio)}`);
        lines.push(`- **P/B**: ${this.comparisonText(comparison.pbRatio)}`);
      }
    }

    return lines.join('\n');
  }

  private summaryLines(snapshot: FundamentalSnapshot): Array<[string, string]> {
    const { ratios } = snapshot;
    return [
      ['Company', snapshot.companyName ?? NOT_AVAILABLE],
      ['Sector / Industry', `${snapshot.sector ?? NOT_AVAILABLE} / ${snapshot.industry ?? NOT_AVAILABLE}`],
      ['P/E', formatFixed(ratios.peRatio)],
      ['P/B', formatFixed(ratios.pbRatio)],
      ['ROE', formatPercent(ratios.roe)],
      ['ROA', formatPercent(ratios.roa)],
      ['Profit Margin', formatPercent(ratios.profitMargin)],
      ['EPS (ttm)', formatFixed(ratios.eps)],
      ['Debt-to-Equity', formatFixed(ratios.debtToEquity)],
      ['EV/EBITDA', formatFixed(ratios.evToEbitda)],
    ];
  }

  private quarterLines(quarter: QuarterlyResult): Array<[string, string]> {
    return [
      ['Revenue', formatMoney(quarter.revenue, 0)],
      ['Gross Profit', formatMoney(quarter.grossProfit, 0)],
      ['Net Income', formatMoney(quarter.netIncome, 0)],
    ];
  }

  private comparisonText(ratio: RatioComparison | null): string {
    if (ratio === null) {
      return NOT_AVAILABLE;
    }
    return `${ratio.company.toFixed(2)} vs sector ${ratio.sector.toFixed(2)} (${formatSignedPercent(ratio.premiumPct)})`;
  }
}
