/**
 * Exact decimal helpers.
 *
 * Money is handled as integer cents and percentages as integer hundredths so
 * that sums and ratios never go through binary floating point. Only the final
 * value handed to callers is a JavaScript number.
 */

import type { DecimalValue } from '../types/ticketing.types';

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/;

/**
 * Convert a stored decimal (numeric string or number) to integer cents,
 * rounding half away from zero past the second fraction digit.
 */
export function toCents(value: DecimalValue | null | undefined): number {
  if (value === null || value === undefined) {
    return 0;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid decimal value: ${value}`);
    }
    const cents = Math.round(Math.abs(value) * 100);
    return value < 0 && cents !== 0 ? -cents : cents;
  }

  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid decimal value: ${value}`);
  }

  const [, sign, whole, fraction = ''] = match;
  const digits = fraction.padEnd(3, '0');
  let cents = parseInt(whole, 10) * 100 + parseInt(digits.slice(0, 2), 10);
  if (parseInt(digits[2], 10) >= 5) {
    cents += 1;
  }

  return sign === '-' && cents !== 0 ? -cents : cents;
}

export function centsToAmount(cents: number): number {
  return cents / 100;
}

/**
 * Parse an aggregated integer (`SUM`/`COUNT`), which PostgreSQL returns as a
 * bigint string. Missing aggregates count as zero.
 */
export function toCount(value: string | number | null | undefined): number {
  if (value === null || value === undefined) {
    return 0;
  }

  const parsed = typeof value === 'number' ? value : Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`Invalid integer aggregate: ${value}`);
  }
  return parsed;
}

/**
 * `100 * remaining / capacity`, rounded up to hundredths. For any threshold
 * given to 0.01, the rounded share is at or below it exactly when the exact
 * share is. `remaining` must be non-negative and `capacity` positive.
 */
export function percentageOf(remaining: number, capacity: number): number {
  const hundredths = Math.floor((remaining * 10000 + capacity - 1) / capacity);
  return hundredths / 100;
}

/**
 * Exact check of `100 * remaining / capacity <= threshold`, with the
 * threshold taken to 0.01 precision.
 */
export function isAtOrBelowPercentage(remaining: number, capacity: number, threshold: number): boolean {
  const thresholdHundredths = Math.round(threshold * 100);
  return remaining * 10000 <= thresholdHundredths * capacity;
}
