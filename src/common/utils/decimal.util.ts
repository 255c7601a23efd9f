import Decimal from 'decimal.js';

// Configure Decimal.js globally for monetary precision
Decimal.set({
  precision: 28,                       // enough for 8dp balances into the trillions
  rounding: Decimal.ROUND_HALF_EVEN,   // banker's rounding
  toExpPos: 9e15,                      // no exponential notation for large numbers
  toExpNeg: -9e15,                     // no exponential notation for small numbers
});

/**
 * Converts any number-like value to Decimal for monetary calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Rounds to a currency's declared precision using round-half-even.
 */
export function roundToPrecision(value: Decimal, places: number): Decimal {
  return value.toDecimalPlaces(places, Decimal.ROUND_HALF_EVEN);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to the given number of places first (8 by default, crypto precision).
 */
export function toNumber(value: Decimal, places = 8): number {
  return roundToPrecision(value, places).toNumber();
}

/**
 * Fixed-point string with exactly `places` decimals, for display.
 */
export function toFixed(value: Decimal | number, places: number): string {
  return roundToPrecision(toDecimal(value), places).toFixed(places);
}

/**
 * Safe division with zero check.
 */
export function divide(a: Decimal, b: Decimal): Decimal {
  if (b.isZero()) {
    throw new Error('Division by zero');
  }
  return a.dividedBy(b);
}
