/**
 * Decimal.js utility functions for tax calculations
 *
 * Every monetary amount and every rate in the engine is a Decimal. Arithmetic
 * inside a stage stays exact; rounding to cents happens once, when the stage
 * produces its result (see roundCents).
 *
 * WHY DECIMAL.JS?
 * - JavaScript's native number type uses IEEE 754 floating-point
 * - 0.1 + 0.2 !== 0.3, and half-cent boundaries round the wrong way
 * - Decimal.js provides arbitrary-precision decimal arithmetic
 */

import Decimal from 'decimal.js';

// Precision: 28 significant digits covers any realistic return to the cent
// Rounding: ROUND_HALF_UP (away from zero on a tie)
Decimal.set({
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -9e15,
  toExpPos: 9e15
});

export type DecimalInput = number | string | Decimal;

export const ZERO = new Decimal(0);

/**
 * Create a Decimal without rounding.
 * Rates such as 0.0145 must survive intact, so no cents rounding happens here.
 */
export function decimal(value: DecimalInput): Decimal {
  return new Decimal(value);
}

/**
 * Sum any number of values
 * Example: sum(10.5, 20.3, 5.1) = 35.9
 */
export function sum(...values: DecimalInput[]): Decimal {
  return values.reduce<Decimal>((total, val) => total.plus(val), ZERO);
}

/**
 * Sum a field across a list of records
 */
export function sumBy<T>(records: readonly T[], pick: (record: T) => Decimal): Decimal {
  return records.reduce<Decimal>((total, record) => total.plus(pick(record)), ZERO);
}

export function min(...values: DecimalInput[]): Decimal {
  return Decimal.min(...values);
}

export function max(...values: DecimalInput[]): Decimal {
  return Decimal.max(...values);
}

/**
 * Floor a value at zero
 */
export function nonNegative(value: DecimalInput): Decimal {
  return Decimal.max(0, value);
}

/**
 * Round to the cent, half-up. Stage results pass through here exactly once.
 */
export function roundCents(value: DecimalInput): Decimal {
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

/**
 * Round a ratio (effective rate) to six places, half-up
 */
export function roundRate(value: DecimalInput): Decimal {
  return new Decimal(value).toDecimalPlaces(6, Decimal.ROUND_HALF_UP);
}

/**
 * Format as US dollars: "$1,234.56", negatives as "-$1,234.56"
 */
export function formatCurrency(value: DecimalInput): string {
  const rounded = roundCents(value);
  // -0.00 prints as $0.00
  if (rounded.isZero()) {
    return '$0.00';
  }

  const [whole, cents] = rounded.abs().toFixed(2).split('.');
  const grouped = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return `${rounded.isNegative() ? '-' : ''}$${grouped}.${cents}`;
}

/**
 * Format a rate as a percentage string: 0.22 -> "22.00%"
 */
export function formatPercent(rate: DecimalInput, places = 2): string {
  return `${new Decimal(rate).times(100).toFixed(places)}%`;
}

// Export the configured Decimal class for advanced use cases
export { Decimal };
