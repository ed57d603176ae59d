/**
 * Decimath – Result formatting
 *
 * Renders values as plain decimal strings: "." as the decimal separator, no
 * digit grouping, no exponent notation, no trailing zeros. The output does
 * not depend on the process locale.
 *
 * License: Apache-2.0
 */

import { Decimal } from 'decimal.js';

import { createOperandError } from './errors';

export interface FormatOptions {
  /**
   * Round the displayed value to this many significant digits.
   */
  significantDigits?: number;

  /**
   * Round the displayed value to at most this many fractional digits.
   */
  maxFractionDigits?: number;
}

/**
 * Format a value for display. Rounding (half away from zero) applies to the
 * returned string only; `value` is never modified.
 *
 *   formatNumber(new Decimal('1234.5000'));                     // "1234.5"
 *   formatNumber(new Decimal('2.71828'), { maxFractionDigits: 2 }); // "2.72"
 */
export function formatNumber(value: Decimal, options: FormatOptions = {}): string {
  if (!value.isFinite()) {
    throw createOperandError({
      message: `cannot format non-finite value ${value.toString()}`,
      subject: 'format',
    });
  }

  let shown = value;

  const { significantDigits, maxFractionDigits } = options;
  if (significantDigits !== undefined) {
    assertDigits('significantDigits', significantDigits, 1);
    shown = shown.toSignificantDigits(significantDigits, Decimal.ROUND_HALF_UP);
  }
  if (maxFractionDigits !== undefined) {
    assertDigits('maxFractionDigits', maxFractionDigits, 0);
    shown = shown.toDecimalPlaces(maxFractionDigits, Decimal.ROUND_HALF_UP);
  }

  // toFixed() without arguments prints every stored digit in normal
  // notation and drops the sign of zero.
  return shown.toFixed();
}

function assertDigits(option: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new RangeError(
      `Decimath: ${option} must be an integer >= ${min}, got ${value}.`,
    );
  }
}
