import { Currency, Fees, InvariantViolationError, OrderSequence, createMoney, createOrder } from '@sharepool/core';
import type { Order } from '@sharepool/core';
import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { FakeSecurityDataSource, createLogger } from '../../__tests__/test-utils.js';
import { createTaxCalculatorConfig } from '../../config/tax-calculator-config.js';
import { checkBaseCurrency, normalizeOrders } from '../order-normalization-utils.js';

const GBP = Currency.create('GBP');

function acquisition(number: number, timestamp: string, fees = Fees.none()): Order {
  return createOrder(
    {
      kind: 'acquisition',
      timestamp: new Date(timestamp),
      isin: 'GB00TEST0001',
      name: 'Test Plc',
      quantity: new Decimal(10),
      total: createMoney('102', 'GBP'),
      fees,
    },
    number
  );
}

describe('checkBaseCurrency', () => {
  it('should accept orders entirely in the base currency', () => {
    const order = acquisition(1, '2024-01-10T10:00:00Z');

    expect(checkBaseCurrency(order, GBP)._unsafeUnwrap()).toBe(order);
  });

  it('should reject a fee in another currency', () => {
    const order = acquisition(7, '2024-01-10T10:00:00Z', new Fees({ forex: createMoney('2', 'USD') }));

    const error = checkBaseCurrency(order, GBP)._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(InvariantViolationError);
    expect(error.message).toBe('Order 7 for Test Plc (GB00TEST0001) is not denominated in GBP: found USD');
  });
});

describe('normalizeOrders', () => {
  const split = { dateEffective: new Date('2024-02-01T00:00:00Z'), ratio: new Decimal(2) };

  it('should restate orders placed before a share split', () => {
    const dataSource = new FakeSecurityDataSource({ GB00TEST0001: [split] });
    const config = createTaxCalculatorConfig()._unsafeUnwrap();
    const orders = [acquisition(1, '2024-01-10T10:00:00Z'), acquisition(2, '2024-02-10T10:00:00Z')];

    const normalized = normalizeOrders(
      orders,
      dataSource,
      config,
      new OrderSequence(2),
      createLogger()
    )._unsafeUnwrap();

    expect(normalized[0]?.number).toBe(3);
    expect(normalized[0]?.quantity.toString()).toBe('20');
    expect(normalized[0]?.originalQuantity?.toString()).toBe('10');
    expect(normalized[0]?.total.amount.toString()).toBe('102');
    expect(normalized[1]).toBe(orders[1]);
    expect(dataSource.infoCalls).toBe(2);
  });

  it('should take currency conversion fees out when they are not allowable', () => {
    const config = createTaxCalculatorConfig({ includeFxFees: false })._unsafeUnwrap();
    const orders = [acquisition(1, '2024-01-10T10:00:00Z', new Fees({ forex: createMoney('2', 'GBP') }))];

    const [normalized] = normalizeOrders(
      orders,
      new FakeSecurityDataSource(),
      config,
      new OrderSequence(1),
      createLogger()
    )._unsafeUnwrap();

    expect(normalized?.total.amount.toString()).toBe('100');
    expect(normalized?.fees.forex).toBeUndefined();
    expect(normalized?.notes).toBe('Excluded currency conversion fee from order 1');
  });

  it('should warn and drop foreign-currency orders in lenient mode', () => {
    const config = createTaxCalculatorConfig({ strict: false })._unsafeUnwrap();
    const logger = createLogger();
    const orders = [
      acquisition(1, '2024-01-10T10:00:00Z', new Fees({ sec: createMoney('0.01', 'USD') })),
      acquisition(2, '2024-01-11T10:00:00Z'),
    ];

    const normalized = normalizeOrders(
      orders,
      new FakeSecurityDataSource(),
      config,
      new OrderSequence(2),
      logger
    )._unsafeUnwrap();

    expect(normalized.map((order) => order.number)).toEqual([2]);
    expect(logger.warn).toHaveBeenCalledWith(
      { code: 'INVARIANT_VIOLATION', transactionId: undefined, isin: 'GB00TEST0001', orderNumber: 1 },
      'Order 1 for Test Plc (GB00TEST0001) is not denominated in GBP: found USD'
    );
  });
});
