import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import type { Acquisition, Disposal } from '../../types/transaction.js';
import { Fees } from '../../value-objects/fees.js';
import { createMoney } from '../../value-objects/money.js';
import { OrderSequence } from '../order-sequence.js';
import {
  adjustOrderQuantity,
  createOrder,
  excludeForexFee,
  getCostBeforeFees,
  getGrossProceeds,
  getUnitPrice,
  mergeOrders,
  splitOrder,
} from '../order-utils.js';

const gbp = (amount: string) => createMoney(amount, 'GBP');

type OrderFields = Partial<Omit<Acquisition, 'kind' | 'number'>>;

function acquisition(number: number, fields: OrderFields = {}): Acquisition {
  return {
    kind: 'acquisition',
    timestamp: new Date('2024-03-10T10:00:00Z'),
    isin: 'GB00TEST0001',
    name: 'Test Plc',
    quantity: new Decimal(10),
    total: gbp('1005'),
    fees: new Fees({ stampDuty: gbp('5') }),
    ...fields,
    number,
  };
}

function disposal(number: number, fields: OrderFields = {}): Disposal {
  return {
    kind: 'disposal',
    timestamp: new Date('2024-03-10T15:00:00Z'),
    isin: 'GB00TEST0001',
    name: 'Test Plc',
    quantity: new Decimal(10),
    total: gbp('995'),
    fees: new Fees({ stampDuty: gbp('5') }),
    ...fields,
    number,
  };
}

describe('order accessors', () => {
  it('should exclude fees from the unit price of an acquisition', () => {
    const order = acquisition(1);

    expect(getCostBeforeFees(order).amount.toString()).toBe('1000');
    expect(getUnitPrice(order).toString()).toBe('100');
  });

  it('should add fees back to the proceeds of a disposal', () => {
    const order = disposal(1);

    expect(getGrossProceeds(order).amount.toString()).toBe('1000');
    expect(getUnitPrice(order).toString()).toBe('100');
  });

  it('should default missing fees to none in the order currency', () => {
    const order = createOrder(
      {
        kind: 'disposal',
        timestamp: new Date('2024-03-10T15:00:00Z'),
        isin: 'US00TEST0001',
        name: 'Test Inc',
        quantity: new Decimal(2),
        total: createMoney('30', 'USD'),
      },
      4
    );

    expect(order.number).toBe(4);
    expect(order.fees.total.currency.toString()).toBe('USD');
    expect(getGrossProceeds(order).amount.toString()).toBe('30');
  });
});

describe('OrderSequence', () => {
  it('should continue after the highest number in use', () => {
    const sequence = OrderSequence.after([acquisition(1), disposal(7), acquisition(3)]);

    expect(sequence.peek()).toBe(7);
    expect(sequence.next()).toBe(8);
    expect(sequence.next()).toBe(9);
  });
});

describe('splitOrder', () => {
  it('should apportion total and fees by quantity', () => {
    const order = acquisition(1);

    const [matched, remainder] = splitOrder(order, new Decimal(4), new OrderSequence(1))._unsafeUnwrap();

    expect(matched.number).toBe(2);
    expect(matched.quantity.toString()).toBe('4');
    expect(matched.total.amount.toString()).toBe('402');
    expect(matched.fees.stampDuty?.amount.toString()).toBe('2');
    expect(matched.notes).toBe('Split from order 1');
    expect(remainder.number).toBe(3);
    expect(remainder.quantity.toString()).toBe('6');
    expect(remainder.total.amount.toString()).toBe('603');
    expect(remainder.fees.stampDuty?.amount.toString()).toBe('3');
  });

  it('should keep the parts summing to the source when the division does not terminate', () => {
    const order = disposal(1, { quantity: new Decimal(3), total: gbp('100'), fees: new Fees({ sec: gbp('1') }) });

    const [matched, remainder] = splitOrder(order, new Decimal(1), new OrderSequence(1))._unsafeUnwrap();

    expect(matched.quantity.plus(remainder.quantity).equals(order.quantity)).toBe(true);
    expect(matched.total.amount.plus(remainder.total.amount).equals(order.total.amount)).toBe(true);
    expect(matched.fees.total.amount.plus(remainder.fees.total.amount).equals(order.fees.total.amount)).toBe(true);
  });

  it('should split the original quantity in the same proportion', () => {
    const order = acquisition(1, { quantity: new Decimal(30), originalQuantity: new Decimal(10) });

    const [matched, remainder] = splitOrder(order, new Decimal(12), new OrderSequence(1))._unsafeUnwrap();

    expect(matched.originalQuantity?.toString()).toBe('4');
    expect(remainder.originalQuantity?.toString()).toBe('6');
  });

  it('should not touch the source order', () => {
    const order = acquisition(1);

    splitOrder(order, new Decimal(4), new OrderSequence(1));

    expect(order.quantity.toString()).toBe('10');
    expect(order.total.amount.toString()).toBe('1005');
  });

  it('should reject a quantity larger than the order', () => {
    const result = splitOrder(acquisition(1), new Decimal(11), new OrderSequence(1));

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().message).toBe('Cannot split 11 shares from order 1 with quantity 10');
  });

  it('should reject a non-positive quantity', () => {
    expect(splitOrder(acquisition(1), new Decimal(0), new OrderSequence(1)).isErr()).toBe(true);
  });
});

describe('mergeOrders', () => {
  const first = acquisition(1, { total: gbp('100'), quantity: new Decimal(10), fees: new Fees({ stampDuty: gbp('0.5') }) });
  const second = acquisition(2, {
    timestamp: new Date('2024-03-10T16:30:00Z'),
    total: gbp('50'),
    quantity: new Decimal(5),
    fees: Fees.none(),
  });

  it('should sum totals, quantities and fees at the start of the day', () => {
    const merged = mergeOrders([first, second], new OrderSequence(2))._unsafeUnwrap();

    expect(merged.kind).toBe('acquisition');
    expect(merged.number).toBe(3);
    expect(merged.timestamp.toISOString()).toBe('2024-03-10T00:00:00.000Z');
    expect(merged.total.amount.toString()).toBe('150');
    expect(merged.quantity.toString()).toBe('15');
    expect(merged.fees.stampDuty?.amount.toString()).toBe('0.5');
    expect(merged.notes).toBe('Merged from orders 1,2');
  });

  it('should not depend on the order of the inputs', () => {
    const forward = mergeOrders([first, second], new OrderSequence(2))._unsafeUnwrap();
    const backward = mergeOrders([second, first], new OrderSequence(2))._unsafeUnwrap();

    expect(backward.total.amount.equals(forward.total.amount)).toBe(true);
    expect(backward.quantity.equals(forward.quantity)).toBe(true);
    expect(backward.fees.equals(forward.fees)).toBe(true);
    expect(backward.timestamp.getTime()).toBe(forward.timestamp.getTime());
  });

  it('should sum original quantities when only some orders were restated', () => {
    const adjusted = acquisition(3, { quantity: new Decimal(20), originalQuantity: new Decimal(2) });

    expect(mergeOrders([first, adjusted], new OrderSequence(3))._unsafeUnwrap().originalQuantity?.toString()).toBe('12');
    expect(
      mergeOrders([adjusted, { ...adjusted, number: 4 }], new OrderSequence(4))._unsafeUnwrap().originalQuantity?.toString()
    ).toBe('4');
  });

  it('should leave the original quantity unset when no order was restated', () => {
    expect(mergeOrders([first, second], new OrderSequence(2))._unsafeUnwrap().originalQuantity).toBeUndefined();
  });

  it('should refuse a single order', () => {
    expect(mergeOrders([first], new OrderSequence(2))._unsafeUnwrapErr().message).toBe(
      'At least two orders are required to merge'
    );
  });

  it('should refuse orders of different securities', () => {
    const other = acquisition(5, { isin: 'GB00TEST0002' });

    expect(mergeOrders([first, other], new OrderSequence(5)).isErr()).toBe(true);
  });
});

describe('adjustOrderQuantity', () => {
  const splits = [
    { dateEffective: new Date('2021-06-01T00:00:00Z'), ratio: new Decimal(3) },
    { dateEffective: new Date('2022-01-01T00:00:00Z'), ratio: new Decimal(10) },
    { dateEffective: new Date('2019-01-01T00:00:00Z'), ratio: new Decimal(2) },
  ];

  it('should apply every split effective after the order', () => {
    const order = acquisition(1, { timestamp: new Date('2020-01-01T12:00:00Z') });

    const adjusted = adjustOrderQuantity(order, splits, new OrderSequence(1));

    expect(adjusted.number).toBe(2);
    expect(adjusted.quantity.toString()).toBe('300');
    expect(adjusted.originalQuantity?.toString()).toBe('10');
    expect(adjusted.total.amount.toString()).toBe('1005');
    expect(adjusted.notes).toBe('Adjusted from order 1 after applying the following split ratios: 3, 10');
  });

  it('should return the order itself when no split applies', () => {
    const order = acquisition(1, { timestamp: new Date('2023-01-01T12:00:00Z') });

    expect(adjustOrderQuantity(order, splits, new OrderSequence(1))).toBe(order);
  });
});

describe('excludeForexFee', () => {
  const fees = new Fees({ stampDuty: gbp('0.5'), forex: gbp('1.5') });

  it('should take the fee out of an acquisition cost', () => {
    const order = acquisition(1, { total: gbp('101.5'), fees });

    const adjusted = excludeForexFee(order, new OrderSequence(1));

    expect(adjusted.total.amount.toString()).toBe('100');
    expect(adjusted.fees.forex).toBeUndefined();
    expect(adjusted.fees.stampDuty?.amount.toString()).toBe('0.5');
    expect(adjusted.notes).toBe('Excluded currency conversion fee from order 1');
  });

  it('should add the fee back to disposal proceeds', () => {
    const order = disposal(1, { total: gbp('98.5'), fees });

    expect(excludeForexFee(order, new OrderSequence(1)).total.amount.toString()).toBe('100');
  });

  it('should return orders without a conversion fee unchanged', () => {
    const order = disposal(1);

    expect(excludeForexFee(order, new OrderSequence(1))).toBe(order);
  });
});
