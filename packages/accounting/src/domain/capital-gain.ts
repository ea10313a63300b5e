import { createMoney, formatIsoDate, formatMoney, getGrossProceeds, getTaxYear, isSameCalendarDate } from '@sharepool/core';
import type { Disposal } from '@sharepool/core';
import type { Decimal } from 'decimal.js';

export type Identification = 'Section 104' | 'Same day' | `Bed & B. (${string})`;

/**
 * A taxable event: a disposal, or part of one, identified with the cost of
 * the shares it is matched against.
 */
export class CapitalGain {
  constructor(
    readonly disposal: Disposal,
    /** Allowable cost in the base currency, disposal fees included */
    readonly cost: Decimal,
    /** Date of the matched acquisition, undefined for a Section 104 match */
    readonly acquisitionDate?: Date | undefined
  ) {}

  /** Disposal proceeds before fees; the fees are already part of `cost` */
  get grossProceeds(): Decimal {
    return getGrossProceeds(this.disposal).amount;
  }

  get gainLoss(): Decimal {
    return this.grossProceeds.minus(this.cost);
  }

  /** Quantity as traded, before any share split restatement */
  get quantity(): Decimal {
    return this.disposal.originalQuantity ?? this.disposal.quantity;
  }

  get identification(): Identification {
    if (this.acquisitionDate === undefined) {
      return 'Section 104';
    }
    if (isSameCalendarDate(this.acquisitionDate, this.disposal.timestamp)) {
      return 'Same day';
    }
    return `Bed & B. (${formatIsoDate(this.acquisitionDate)})`;
  }

  get taxYear(): number {
    return getTaxYear(this.disposal.timestamp);
  }

  toString(): string {
    const currency = this.disposal.total.currency;
    return (
      `${formatIsoDate(this.disposal.timestamp)} ${this.disposal.isin} ${this.disposal.name} ` +
      `quantity: ${this.quantity.toString()}, ` +
      `cost: ${formatMoney(createMoney(this.cost, currency))}, ` +
      `proceeds: ${formatMoney(createMoney(this.grossProceeds, currency))}, ` +
      `gain: ${formatMoney(createMoney(this.gainLoss, currency))} ` +
      `(${this.identification})`
    );
  }
}
