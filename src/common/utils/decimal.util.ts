import Decimal from 'decimal.js';

// Configure Decimal.js globally for fund accounting precision
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

export type DecimalInput = number | string | Decimal;

/**
 * Converts any number-like value to Decimal for unit and NAV calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: DecimalInput): Decimal {
  return new Decimal(value);
}

/**
 * Parses a loosely typed value into a finite Decimal.
 * Returns undefined for anything that is not a finite number.
 */
export function parseDecimal(value: unknown): Decimal | undefined {
  if (Decimal.isDecimal(value)) {
    return value.isFinite() ? value : undefined;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? new Decimal(value) : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    try {
      const parsed = new Decimal(value.trim());
      return parsed.isFinite() ? parsed : undefined;
    } catch {
      return undefined;
    }
  }
  return undefined;
}

/**
 * Rounds to a fixed number of places and converts back to a JavaScript number
 * for JSON serialization. Ledger views use 6 places for units and NAV.
 */
export function toRoundedNumber(value: Decimal, decimalPlaces: number): number {
  return value.toDecimalPlaces(decimalPlaces, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Safe addition of Decimal values.
 */
export function add(...values: Decimal[]): Decimal {
  return values.reduce((sum, val) => sum.plus(val), new Decimal(0));
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
