import { IncompleteRecordsError } from '@sharepool/core';
import { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

/**
 * Section 104 pool for one security: the shares not identified with a
 * same-day or 30-day acquisition, held at their pooled cost.
 *
 * Immutable. Every change returns a new holding.
 */
export class Section104Holding {
  private constructor(
    readonly isin: string,
    readonly name: string,
    readonly quantity: Decimal,
    /** Total allowable cost in the base currency */
    readonly cost: Decimal
  ) {}

  static create(isin: string, name: string, quantity: Decimal, cost: Decimal): Section104Holding {
    return new Section104Holding(isin, name, quantity, cost);
  }

  static empty(isin: string, name: string): Section104Holding {
    return new Section104Holding(isin, name, new Decimal(0), new Decimal(0));
  }

  get averageCost(): Decimal {
    return this.quantity.isZero() ? new Decimal(0) : this.cost.dividedBy(this.quantity);
  }

  increase(quantity: Decimal, cost: Decimal): Section104Holding {
    return new Section104Holding(this.isin, this.name, this.quantity.plus(quantity), this.cost.plus(cost));
  }

  decrease(quantity: Decimal, cost: Decimal): Result<Section104Holding, IncompleteRecordsError> {
    const remaining = this.quantity.minus(quantity);
    if (remaining.isNegative()) {
      return err(
        new IncompleteRecordsError(this.isin, this.name, 'share quantity cannot be negative', {
          additionalContext: { held: this.quantity.toFixed(), disposed: quantity.toFixed() },
        })
      );
    }
    return ok(new Section104Holding(this.isin, this.name, remaining, this.cost.minus(cost)));
  }
}
