import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { InvariantViolationError } from '../errors/index.js';
import type { ShareSplit } from '../types/security.js';
import type { Acquisition, Disposal, Order, OrderInput, OrderInputOf, OrderOverrides } from '../types/transaction.js';
import { Fees } from '../value-objects/fees.js';
import { addMoney, divideMoney, multiplyMoney, subtractMoney } from '../value-objects/money.js';
import type { Money } from '../value-objects/money.js';

import { toCalendarDate } from './date-utils.js';
import { productOf, sumOf } from './decimal-utils.js';
import type { OrderSequence } from './order-sequence.js';

/**
 * Assign a number to a caller-supplied order
 */
export function createOrder(input: OrderInputOf<Acquisition>, number: number): Acquisition;
export function createOrder(input: OrderInputOf<Disposal>, number: number): Disposal;
export function createOrder(input: OrderInput, number: number): Order;
export function createOrder(input: OrderInput, number: number): Order {
  return { ...input, fees: input.fees ?? Fees.none(input.total.currency), number };
}

/**
 * Price paid for the shares alone
 */
export function getCostBeforeFees(acquisition: Acquisition): Money {
  return subtractMoney(acquisition.total, acquisition.fees.total);
}

/**
 * Proceeds before any fees were deducted
 */
export function getGrossProceeds(disposal: Disposal): Money {
  return addMoney(disposal.total, disposal.fees.total);
}

/**
 * Price per share, excluding fees
 */
export function getUnitPrice(order: Order): Decimal {
  const amount = order.kind === 'acquisition' ? getCostBeforeFees(order) : getGrossProceeds(order);
  return amount.amount.dividedBy(order.quantity);
}

/**
 * Copy of an order with some fields replaced and a new number.
 * Derived orders never mutate their source.
 */
export function deriveOrder<T extends Order>(order: T, overrides: OrderOverrides, number: number): T {
  return { ...order, ...overrides, number };
}

/**
 * Split an order in two: the first part holds exactly `quantity` shares, the
 * second the rest. Totals, fees and any original quantity are apportioned by
 * quantity, and the two parts always add up to the source order.
 */
export function splitOrder<T extends Order>(
  order: T,
  quantity: Decimal,
  sequence: OrderSequence
): Result<[T, T], InvariantViolationError> {
  if (quantity.lte(0) || quantity.gt(order.quantity)) {
    return err(
      new InvariantViolationError(
        `Cannot split ${quantity.toString()} shares from order ${order.number} with quantity ${order.quantity.toString()}`,
        { transactionId: order.transactionId }
      )
    );
  }

  const matchedTotal = divideMoney(multiplyMoney(order.total, quantity), order.quantity);
  const matchedFees = order.fees.times(quantity).dividedBy(order.quantity);
  const matchedOriginalQuantity = order.originalQuantity?.times(quantity).dividedBy(order.quantity);
  const notes = `Split from order ${order.number}`;

  const matched = deriveOrder(
    order,
    {
      total: matchedTotal,
      quantity,
      originalQuantity: matchedOriginalQuantity,
      fees: matchedFees,
      notes,
    },
    sequence.next()
  );

  const remainder = deriveOrder(
    order,
    {
      total: subtractMoney(order.total, matchedTotal),
      quantity: order.quantity.minus(quantity),
      originalQuantity:
        order.originalQuantity && matchedOriginalQuantity
          ? order.originalQuantity.minus(matchedOriginalQuantity)
          : undefined,
      fees: order.fees.minus(matchedFees),
      notes,
    },
    sequence.next()
  );

  return ok([matched, remainder]);
}

/**
 * Combine orders of one security and direction into a single order dated at
 * the calendar date of the first. Totals, quantities and fees are summed, so
 * the result does not depend on the order of the inputs.
 */
export function mergeOrders<T extends Order>(
  orders: readonly T[],
  sequence: OrderSequence
): Result<T, InvariantViolationError> {
  const [first, ...rest] = orders;
  if (first === undefined || rest.length === 0) {
    return err(new InvariantViolationError('At least two orders are required to merge'));
  }

  const mismatched = rest.find((order) => order.isin !== first.isin || order.kind !== first.kind);
  if (mismatched) {
    return err(
      new InvariantViolationError(
        `Cannot merge order ${mismatched.number} (${mismatched.kind} of ${mismatched.isin}) with order ${first.number} (${first.kind} of ${first.isin})`
      )
    );
  }

  let total = first.total;
  let fees = first.fees;
  for (const order of rest) {
    total = addMoney(total, order.total);
    fees = fees.plus(order.fees);
  }

  // A split effective during the day restates only the earlier orders
  const anyAdjusted = orders.some((order) => order.originalQuantity !== undefined);

  return ok(
    deriveOrder(
      first,
      {
        timestamp: toCalendarDate(first.timestamp),
        total,
        quantity: sumOf(orders.map((order) => order.quantity)),
        originalQuantity: anyAdjusted
          ? sumOf(orders.map((order) => order.originalQuantity ?? order.quantity))
          : undefined,
        fees,
        transactionId: undefined,
        notes: `Merged from orders ${orders.map((order) => order.number).join(',')}`,
      },
      sequence.next()
    )
  );
}

/**
 * Restate an order's quantity in post-split units by applying every split
 * that became effective after the order was placed. Orders unaffected by any
 * split are returned as they are.
 */
export function adjustOrderQuantity<T extends Order>(
  order: T,
  splits: readonly ShareSplit[],
  sequence: OrderSequence
): T {
  const ratios = splits
    .filter((split) => order.timestamp.getTime() < split.dateEffective.getTime())
    .map((split) => split.ratio);

  if (ratios.length === 0) {
    return order;
  }

  return deriveOrder(
    order,
    {
      quantity: order.quantity.times(productOf(ratios)),
      originalQuantity: order.originalQuantity ?? order.quantity,
      notes: `Adjusted from order ${order.number} after applying the following split ratios: ${ratios
        .map((ratio) => ratio.toString())
        .join(', ')}`,
    },
    sequence.next()
  );
}

/**
 * Drop the currency conversion fee from an order, moving it out of the total
 * as well. Orders without one are returned as they are.
 */
export function excludeForexFee<T extends Order>(order: T, sequence: OrderSequence): T {
  const forex = order.fees.forex;
  if (forex === undefined) {
    return order;
  }

  const total = order.kind === 'acquisition' ? subtractMoney(order.total, forex) : addMoney(order.total, forex);

  return deriveOrder(
    order,
    {
      total,
      fees: order.fees.without('forex'),
      notes: `Excluded currency conversion fee from order ${order.number}`,
    },
    sequence.next()
  );
}
