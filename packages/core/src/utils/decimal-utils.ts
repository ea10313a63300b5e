import { Decimal } from 'decimal.js';

// Configure Decimal.js once for every package that imports @sharepool/core.
// Share quantities after repeated splits and pooled costs need well beyond
// the two decimal places used for reporting.
Decimal.set({
  maxE: 9e15, // Maximum exponent
  minE: -9e15, // Minimum exponent
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7, // Use exponential notation for numbers smaller than 1e-7
  toExpPos: 21, // Use exponential notation for numbers larger than 1e+21
});

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(value: string | number | Decimal | undefined | null, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string or number to a Decimal. Missing values are zero; anything
 * else that is not a number throws.
 */
export function parseDecimal(value: string | number | Decimal | undefined | null): Decimal {
  const result = { value: new Decimal(0) };
  if (!tryParseDecimal(value, result)) {
    throw new Error(`Invalid decimal value: ${String(value)}`);
  }
  return result.value;
}

/**
 * Convert Decimal to string with a fixed number of decimal places for display
 */
export function formatDecimal(decimal: Decimal, decimalPlaces = 2): string {
  return decimal.toFixed(decimalPlaces);
}

/**
 * Product of a list of decimals (1 for an empty list)
 */
export function productOf(values: readonly Decimal[]): Decimal {
  return values.reduce((product, value) => product.times(value), new Decimal(1));
}

/**
 * Sum of a list of decimals (0 for an empty list)
 */
export function sumOf(values: readonly Decimal[]): Decimal {
  return values.reduce((sum, value) => sum.plus(value), new Decimal(0));
}
