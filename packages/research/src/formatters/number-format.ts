/**
 * Number rendering shared by the report formatters. Null always renders as
 * "N/A".
 */

export const NOT_AVAILABLE = 'N/A';

const groupedFormats = new Map<number, Intl.NumberFormat>();

function grouped(value: number, digits: number): string {
  let formatter = groupedFormats.get(digits);
  if (!formatter) {
    formatter = new Intl.NumberFormat('en-US', {
      minimumFractionDigits: digits,
      maximumFractionDigits: digits,
    });
    groupedFormats.set(digits, formatter);
  }
  return formatter.format(value);
}

/**
 * Dollar amount with thousands separators: `$1,234.56`, `$-80` for losses.
 */
export function formatMoney(value: number | null, digits = 2): string {
  return value === null ? NOT_AVAILABLE : `$${grouped(value, digits)}`;
}

export function formatFixed(value: number | null, digits = 2): string {
  return value === null ? NOT_AVAILABLE : value.toFixed(digits);
}

/**
 * Fraction as a percentage: 0.315 → `31.50%`.
 */
export function formatPercent(value: number | null, digits = 2): string {
  return value === null ? NOT_AVAILABLE : `${(value * 100).toFixed(digits)}%`;
}

/**
 * Percentage that is already scaled, with an explicit sign: `+12.50%`.
 */
export function formatSignedPercent(value: number, digits = 2): string {
  const sign = value > 0 ? '+' : '';
  return `${sign}${value.toFixed(digits)}%`;
}
