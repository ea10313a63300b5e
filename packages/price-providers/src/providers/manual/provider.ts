import { Currency } from '@sharepool/core';
import { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { DataNotFoundError } from '../../core/errors.js';
import type { LiveExchangeRateProvider } from '../../core/types.js';

/**
 * Manual FX rate entry: units of `quote` per one unit of `base`
 */
export interface ManualRateEntry {
  base: string | Currency;
  quote: string | Currency;
  rate: Decimal.Value;
}

function toCurrency(value: string | Currency): Currency {
  return typeof value === 'string' ? Currency.create(value) : value;
}

function pairKey(base: Currency, quote: Currency): string {
  return `${base.toString()}-${quote.toString()}`;
}

/**
 * Exchange rates entered by hand. The inverse of every pair is derived.
 */
export class ManualExchangeRateProvider implements LiveExchangeRateProvider {
  readonly name = 'manual';
  private readonly rates = new Map<string, Decimal>();

  constructor(entries: readonly ManualRateEntry[] = []) {
    for (const entry of entries) {
      this.setRate(entry.base, entry.quote, entry.rate);
    }
  }

  setRate(base: string | Currency, quote: string | Currency, rate: Decimal.Value): void {
    this.rates.set(pairKey(toCurrency(base), toCurrency(quote)), new Decimal(rate));
  }

  getRate(base: Currency, quote: Currency): Result<Decimal, DataNotFoundError> {
    if (base.equals(quote)) {
      return ok(new Decimal(1));
    }

    const direct = this.rates.get(pairKey(base, quote));
    if (direct) {
      return ok(direct);
    }

    const inverse = this.rates.get(pairKey(quote, base));
    if (inverse && !inverse.isZero()) {
      return ok(new Decimal(1).dividedBy(inverse));
    }

    return err(new DataNotFoundError(`Exchange rate not found: ${pairKey(base, quote)}`, this.name));
  }
}
