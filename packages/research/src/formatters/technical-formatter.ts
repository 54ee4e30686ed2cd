/**
 * Technical analysis report formatter
 * Supports multiple output formats with deterministic output
 */

import type { BollingerZone, IndicatorRow, LevelSide, TechnicalSnapshot } from '@research-desk/contracts';
import type { OutputFormat } from '../commands/types.js';
import { formatFixed, formatMoney } from './number-format.js';

/**
 * Indicator rows in report order.
 */
const INDICATOR_LINES: ReadonlyArray<[label: string, key: Exclude<keyof IndicatorRow, 'date'>]> = [
  ['SMA(20)', 'sma20'],
  ['SMA(50)', 'sma50'],
  ['SMA(200)', 'sma200'],
  ['EMA(12)', 'ema12'],
  ['EMA(26)', 'ema26'],
  ['RSI(14)', 'rsi14'],
  ['MACD', 'macd'],
  ['MACD Signal', 'macdSignal'],
  ['MACD Hist', 'macdHist'],
  ['Bollinger Upper', 'bbUpper'],
  ['Bollinger Middle', 'bbMiddle'],
  ['Bollinger Lower', 'bbLower'],
];

const BOLLINGER_DESCRIPTIONS: Record<BollingerZone, string> = {
  OVERBOUGHT: 'Overbought (above upper band)',
  OVERSOLD: 'Oversold (below lower band)',
  NEAR_OVERBOUGHT: 'Near overbought zone',
  NEAR_OVERSOLD: 'Near oversold zone',
  NEUTRAL: 'Neutral',
};

/**
 * Formatter for technical snapshots
 */
export class TechnicalFormatter {
  /**
   * Format snapshot in specified format
   */
  format(snapshot: TechnicalSnapshot, format: OutputFormat = 'text'): string {
    switch (format) {
      case 'json':
        return this.formatAsJSON(snapshot);
      case 'markdown':
        return this.formatAsMarkdown(snapshot);
      case 'text':
      default:
        return this.formatAsText(snapshot);
    }
  }

  /**
   * Format as plain text (default)
   */
  private formatAsText(snapshot: TechnicalSnapshot): string {
    const lines: string[] = [];

    lines.push(`Ticker: ${snapshot.ticker}`);
    lines.push(`As Of: ${snapshot.asOf} (${snapshot.barsAnalyzed} bars)`);
    lines.push(`Current Price: ${formatMoney(snapshot.currentPrice)}`);
    lines.push('');

    lines.push('RECENT CLOSES:');
    snapshot.recentCloses.forEach((close, i) => {
      lines.push(`  • T-${i + 1}: ${formatMoney(close)}`);
    });
    lines.push('');

    lines.push('LATEST INDICATORS:');
    for (const [label, key] of INDICATOR_LINES) {
      lines.push(`  ${label}: ${formatFixed(snapshot.latest[key])}`);
    }
    lines.push('');

    lines.push('SUPPORT / RESISTANCE:');
    lines.push(...this.levelLines(snapshot.levels.resistance, 'R', 'resistance').map((l) => `  • ${l}`));
    lines.push(...this.levelLines(snapshot.levels.support, 'S', 'support').map((l) => `  • ${l}`));
    lines.push('');

    lines.push('TECHNICAL INTERPRETATION:');
    for (const [label, value] of this.interpretationLines(snapshot)) {
      lines.push(`  ${label}: ${value}`);
    }

    if (snapshot.warnings.length > 0) {
      lines.push('');
      lines.push('WARNINGS:');
      for (const warning of snapshot.warnings) {
        lines.push(`  • ${warning}`);
      }
    }

    return lines.join('\n');
  }

  /**
   * Format as JSON
   */
  private formatAsJSON(snapshot: TechnicalSnapshot): string {
    return JSON.stringify(snapshot, null, 2);
  }

  /**
   * Format as markdown
   */
  private formatAsMarkdown(snapshot: TechnicalSnapshot): string {
    const lines: string[] = [];

    lines.push(`# Technical Analysis: ${snapshot.ticker}`);
    lines.push('');
    lines.push(`*As of ${snapshot.asOf}, ${snapshot.barsAnalyzed} bars analyzed*`);
    lines.push('');
    lines.push(`**Current Price**: ${formatMoney(snapshot.currentPrice)}`);
    lines.push('');

    lines.push('## Recent Closes');
    lines.push('');
    lines.push('| Session | Close |');
    lines.push('|---------|-------|');
    snapshot.recentCloses.forEach((close, i) => {
      lines.push(`| T-${i + 1} | ${formatMoney(close)} |`);
    });
    lines.push('');

    lines.push('## Latest Indicators');
    lines.push('');
    lines.push('| Indicator | Value |');
    lines.push('|-----------|-------|');
    for (const [label, key] of INDICATOR_LINES) {
      lines.push(`| ${label} | ${formatFixed(snapshot.latest[key])} |`);
    }
    lines.push('');

    lines.push('## Support / Resistance');
    lines.push('');
    for (const line of this.levelLines(snapshot.levels.resistance, 'R', 'resistance')) {
      lines.push(`- ${line}`);
    }
    for (const line of this.levelLines(snapshot.levels.support, 'S', 'support')) {
      lines.push(`- ${line}`);
    }
    lines.push('');

    lines.push('## Interpretation');
    lines.push('');
    for (const [label, value] of this.interpretationLines(snapshot)) {
      lines.push(`- **${label}**: ${value}`);
    }

    if (snapshot.warnings.length > 0) {
      lines.push('');
      lines.push('## Warnings');
      lines.push('');
      for (const warning of snapshot.warnings) {
        lines.push(`- ${warning}`);
      }
    }

    return lines.join('\n');
  }

  private levelLines(side: LevelSide, prefix: 'R' | 'S', name: string): string[] {
    if (side.noneFound) {
      return [`(no significant ${name} found)`];
    }
    return side.levels.map((level, i) => `${prefix}${i + 1}: ${formatMoney(level)}`);
  }

  private interpretationLines(snapshot: TechnicalSnapshot): Array<[string, string]> {
    const { interpretation } = snapshot;
    const { position } = interpretation.bollinger;
    const bollinger = BOLLINGER_DESCRIPTIONS[interpretation.bollinger.zone];

    return [
      ['Long-term trend', interpretation.longTerm],
      ['Short-term trend', interpretation.shortTerm],
      ['RSI', `${interpretation.rsi.zone} (${formatFixed(interpretation.rsi.value)})`],
      ['MACD', interpretation.macd],
      ['Bollinger', position === null ? bollinger : `${bollinger} (position ${position.toFixed(2)})`],
    ];
  }
}
