import { Fees, createMoney, createOrder } from '@sharepool/core';
import type { Disposal } from '@sharepool/core';
import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { CapitalGain } from '../capital-gain.js';

function createDisposal(overrides: Partial<Omit<Disposal, 'kind' | 'number'>> = {}): Disposal {
  return createOrder(
    {
      kind: 'disposal',
      timestamp: new Date('2024-04-05T15:30:00Z'),
      isin: 'GB00TEST0001',
      name: 'Test Plc',
      quantity: new Decimal(10),
      total: createMoney('245', 'GBP'),
      fees: new Fees({ stampDuty: createMoney('5', 'GBP') }),
      ...overrides,
    },
    1
  );
}

describe('CapitalGain', () => {
  it('should compute the result against gross proceeds', () => {
    const gain = new CapitalGain(createDisposal(), new Decimal('205.5'));

    expect(gain.grossProceeds.toString()).toBe('250');
    expect(gain.gainLoss.toString()).toBe('44.5');
  });

  it('should file the gain under the tax year of the disposal', () => {
    expect(new CapitalGain(createDisposal(), new Decimal(0)).taxYear).toBe(2023);
  });

  it('should identify the matching rule', () => {
    const disposal = createDisposal();

    expect(new CapitalGain(disposal, new Decimal(1)).identification).toBe('Section 104');
    expect(new CapitalGain(disposal, new Decimal(1), new Date('2024-04-05T00:00:00Z')).identification).toBe(
      'Same day'
    );
    expect(new CapitalGain(disposal, new Decimal(1), new Date('2024-04-20T00:00:00Z')).identification).toBe(
      'Bed & B. (2024-04-20)'
    );
  });

  it('should report the quantity traded before any share split', () => {
    const disposal = createDisposal({ quantity: new Decimal(30), originalQuantity: new Decimal(10) });

    expect(new CapitalGain(disposal, new Decimal(1)).quantity.toString()).toBe('10');
  });

  it('should render a loss with a leading minus sign', () => {
    const gain = new CapitalGain(createDisposal(), new Decimal('300.126'));

    expect(gain.toString()).toBe(
      '2024-04-05 GB00TEST0001 Test Plc quantity: 10, cost: £300.13, proceeds: £250.00, gain: -£50.13 (Section 104)'
    );
  });
});
