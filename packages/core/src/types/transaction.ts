import type { Decimal } from 'decimal.js';

import type { Fees } from '../value-objects/fees.js';
import type { Money } from '../value-objects/money.js';

interface TransactionBase {
  readonly timestamp: Date;
  /**
   * Cash amount of the transaction. For an acquisition this is the total
   * cost including fees; for a disposal the net proceeds after fees.
   */
  readonly total: Money;
  /** Identifier assigned by the broker, when known */
  readonly transactionId?: string | undefined;
  readonly notes?: string | undefined;
}

interface OrderBase extends TransactionBase {
  /**
   * Sequence number assigned when the order was created. Only referenced by
   * the audit notes of derived orders, never used for ordering.
   */
  readonly number: number;
  readonly isin: string;
  /** Display only: tickers may be shared between securities */
  readonly ticker?: string | undefined;
  readonly name: string;
  readonly quantity: Decimal;
  /** Quantity before share-split restatement, set only when one happened */
  readonly originalQuantity?: Decimal | undefined;
  readonly fees: Fees;
}

export interface Acquisition extends OrderBase {
  readonly kind: 'acquisition';
}

export interface Disposal extends OrderBase {
  readonly kind: 'disposal';
}

export type Order = Acquisition | Disposal;

export type OrderKind = Order['kind'];

export interface Dividend extends TransactionBase {
  readonly kind: 'dividend';
  readonly isin: string;
  readonly name: string;
  readonly ticker?: string | undefined;
  /** Tax withheld at source */
  readonly withheld?: Money | undefined;
}

/**
 * Cash moved in (positive total) or out (negative total) of the account
 */
export interface Transfer extends TransactionBase {
  readonly kind: 'transfer';
}

export interface Interest extends TransactionBase {
  readonly kind: 'interest';
}

export type Transaction = Order | Dividend | Transfer | Interest;

export type OrderInputOf<T extends Order> = Omit<T, 'number' | 'fees'> & { readonly fees?: Fees | undefined };

/**
 * An order as supplied by a caller, before a sequence number is assigned.
 * Missing fees default to none in the order's currency.
 */
export type OrderInput = OrderInputOf<Acquisition> | OrderInputOf<Disposal>;

/**
 * Fields a derived order may replace
 */
export type OrderOverrides = Partial<
  Pick<OrderBase, 'timestamp' | 'total' | 'quantity' | 'originalQuantity' | 'fees' | 'notes' | 'transactionId'>
>;
