import { Decimal } from 'decimal.js';

import { parseDecimal } from '../utils/decimal-utils.js';

import { Currency } from './currency.js';

// Money type for consistent amount and currency structure with high precision
export interface Money {
  readonly amount: Decimal;
  readonly currency: Currency;
}

/**
 * Create a Money object with proper decimal parsing
 */
export function createMoney(amount: string | number | Decimal, currency: string | Currency): Money {
  return {
    amount: parseDecimal(amount),
    currency: typeof currency === 'string' ? Currency.create(currency) : currency,
  };
}

export function zeroMoney(currency: Currency): Money {
  return { amount: new Decimal(0), currency };
}

/**
 * Safe addition of Money objects (same currency)
 */
export function addMoney(a: Money, b: Money): Money {
  if (!a.currency.equals(b.currency)) {
    throw new Error(`Cannot add different currencies: ${a.currency.toString()} and ${b.currency.toString()}`);
  }

  return {
    amount: a.amount.plus(b.amount),
    currency: a.currency,
  };
}

/**
 * Safe subtraction of Money objects (same currency)
 */
export function subtractMoney(a: Money, b: Money): Money {
  if (!a.currency.equals(b.currency)) {
    throw new Error(`Cannot subtract different currencies: ${a.currency.toString()} and ${b.currency.toString()}`);
  }

  return {
    amount: a.amount.minus(b.amount),
    currency: a.currency,
  };
}

export function negateMoney(money: Money): Money {
  return { amount: money.amount.negated(), currency: money.currency };
}

export function multiplyMoney(money: Money, factor: Decimal.Value): Money {
  return { amount: money.amount.times(factor), currency: money.currency };
}

export function divideMoney(money: Money, divisor: Decimal.Value): Money {
  return { amount: money.amount.dividedBy(divisor), currency: money.currency };
}

/**
 * Compare Money objects for equality
 */
export function moneyEquals(a: Money | undefined, b: Money | undefined): boolean {
  if (!a && !b) return true;
  if (!a || !b) return false;

  return a.currency.equals(b.currency) && a.amount.equals(b.amount);
}

/**
 * Check if Money amount is zero
 */
export function isZeroMoney(money: Money | undefined): boolean {
  return !money || money.amount.isZero();
}

/**
 * Render money rounded to two decimal places: `£12.50` for sterling,
 * `12.50 USD` for anything else
 */
export function formatMoney(money: Money): string {
  const amount = money.amount.toFixed(2);
  if (money.currency.toString() === 'GBP') {
    return money.amount.isNegative() ? `-£${amount.slice(1)}` : `£${amount}`;
  }
  return `${amount} ${money.currency.toString()}`;
}
