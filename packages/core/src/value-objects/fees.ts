import type { Decimal } from 'decimal.js';

import type { Currency } from './currency.js';
import { GBP } from './currency.js';
import { addMoney, divideMoney, moneyEquals, multiplyMoney, negateMoney, subtractMoney, zeroMoney } from './money.js';
import type { Money } from './money.js';

/**
 * Fee categories charged on a share order
 *
 * - stampDuty: Stamp Duty or Stamp Duty Reserve Tax
 * - forex: currency conversion fee
 * - finra: Financial Industry Regulatory Authority trading activity fee
 * - sec: Securities and Exchange Commission transaction fee
 */
export type FeeCategory = 'stampDuty' | 'forex' | 'finra' | 'sec';

export const FEE_CATEGORIES: readonly FeeCategory[] = ['stampDuty', 'forex', 'finra', 'sec'];

export type FeeAmounts = Partial<Record<FeeCategory, Money | undefined>>;

function addOptional(a: Money | undefined, b: Money | undefined): Money | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return addMoney(a, b);
}

function subtractOptional(a: Money | undefined, b: Money | undefined): Money | undefined {
  if (b === undefined) return a;
  if (a === undefined) return negateMoney(b);
  return subtractMoney(a, b);
}

/**
 * Fees incurred on a share acquisition or disposal.
 *
 * Every category is independently optional. Arithmetic is component-wise and
 * keeps absent categories absent, so a fee that was never charged does not
 * turn into an explicit zero after a split or merge.
 */
export class Fees {
  readonly stampDuty: Money | undefined;
  readonly forex: Money | undefined;
  readonly finra: Money | undefined;
  readonly sec: Money | undefined;
  readonly defaultCurrency: Currency;

  constructor(amounts: FeeAmounts = {}, defaultCurrency: Currency = GBP) {
    this.stampDuty = amounts.stampDuty;
    this.forex = amounts.forex;
    this.finra = amounts.finra;
    this.sec = amounts.sec;
    this.defaultCurrency = defaultCurrency;
  }

  static none(defaultCurrency: Currency = GBP): Fees {
    return new Fees({}, defaultCurrency);
  }

  get(category: FeeCategory): Money | undefined {
    return this[category];
  }

  /**
   * Categories that carry an amount, in declaration order
   */
  presentCategories(): FeeCategory[] {
    return FEE_CATEGORIES.filter((category) => this.get(category) !== undefined);
  }

  /**
   * Sum of the present fees, or zero in the default currency
   */
  get total(): Money {
    let total: Money | undefined;
    for (const category of FEE_CATEGORIES) {
      total = addOptional(total, this.get(category));
    }
    return total ?? zeroMoney(this.defaultCurrency);
  }

  plus(other: Fees): Fees {
    return this.combine(other, addOptional);
  }

  minus(other: Fees): Fees {
    return this.combine(other, subtractOptional);
  }

  times(factor: Decimal.Value): Fees {
    return this.scale((money) => multiplyMoney(money, factor));
  }

  dividedBy(divisor: Decimal.Value): Fees {
    return this.scale((money) => divideMoney(money, divisor));
  }

  /**
   * Copy with one category removed
   */
  without(category: FeeCategory): Fees {
    const amounts = this.toAmounts();
    amounts[category] = undefined;
    return new Fees(amounts, this.defaultCurrency);
  }

  equals(other: Fees): boolean {
    return FEE_CATEGORIES.every((category) => moneyEquals(this.get(category), other.get(category)));
  }

  toAmounts(): FeeAmounts {
    return {
      stampDuty: this.stampDuty,
      forex: this.forex,
      finra: this.finra,
      sec: this.sec,
    };
  }

  private combine(other: Fees, fn: (a: Money | undefined, b: Money | undefined) => Money | undefined): Fees {
    return new Fees(
      {
        stampDuty: fn(this.stampDuty, other.stampDuty),
        forex: fn(this.forex, other.forex),
        finra: fn(this.finra, other.finra),
        sec: fn(this.sec, other.sec),
      },
      this.defaultCurrency
    );
  }

  private scale(fn: (money: Money) => Money): Fees {
    const scaled: FeeAmounts = {};
    for (const category of FEE_CATEGORIES) {
      const amount = this.get(category);
      scaled[category] = amount === undefined ? undefined : fn(amount);
    }
    return new Fees(scaled, this.defaultCurrency);
  }
}
