/**
 * Currency value object
 *
 * Represents an ISO 4217 currency code. Ensures consistent normalization
 * and provides type safety for Money amounts.
 *
 * Examples: GBP, USD, EUR
 */

const CURRENCY_CODE_PATTERN = /^[A-Z]{3}$/;

export class Currency {
  /**
   * Create a Currency from a raw string
   * Normalizes to uppercase and trims whitespace
   */
  static create(code: string): Currency {
    const normalized = code.toUpperCase().trim();

    if (normalized.length === 0) {
      throw new Error('Currency code cannot be empty');
    }

    if (!CURRENCY_CODE_PATTERN.test(normalized)) {
      throw new Error(`Invalid currency code: ${code}`);
    }

    return new Currency(normalized);
  }

  /**
   * Validate a code without throwing
   */
  static isValid(code: string): boolean {
    return CURRENCY_CODE_PATTERN.test(code.toUpperCase().trim());
  }

  private readonly code: string;

  private constructor(code: string) {
    this.code = code;
  }

  /**
   * Get the normalized uppercase currency code
   */
  toString(): string {
    return this.code;
  }

  /**
   * Check equality with another Currency
   */
  equals(other: Currency): boolean {
    return this.code === other.code;
  }

  /**
   * For JSON serialization
   */
  toJSON(): string {
    return this.code;
  }
}

export const GBP = Currency.create('GBP');
