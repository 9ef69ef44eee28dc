import Decimal from 'decimal.js';

// Configure Decimal.js globally for financial precision
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

export const ZERO = new Decimal(0);

/**
 * Converts any number-like value to Decimal for financial calculations.
 * Exchange payloads carry amounts as strings ("0.00100000").
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Lenient parse for exchange fields that may be absent or malformed.
 * Anything that is not a finite number becomes zero.
 */
export function parseAmount(value: unknown): Decimal {
  if (value instanceof Decimal) {
    return value;
  }
  if (typeof value !== 'string' && typeof value !== 'number') {
    return ZERO;
  }
  try {
    const parsed = new Decimal(value);
    return parsed.isFinite() ? parsed : ZERO;
  } catch {
    return ZERO;
  }
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places (standard crypto precision).
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/**
 * Converts Decimal to a quote-currency string with 2 decimal places.
 */
export function toUSD(value: Decimal): string {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2);
}

/** Formats a percentage with 2 decimal places, e.g. "50.00%" */
export function toPercent(value: Decimal): string {
  return `${value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2)}%`;
}

/**
 * Safe addition of Decimal values.
 */
export function add(...values: Decimal[]): Decimal {
  return values.reduce((sum, val) => sum.plus(val), ZERO);
}

/**
 * Profit rate in percent. Zero when nothing was invested.
 */
export function profitRate(currentValue: Decimal, investment: Decimal): Decimal {
  if (investment.isZero()) {
    return ZERO;
  }
  return currentValue.minus(investment).dividedBy(investment).times(100);
}
