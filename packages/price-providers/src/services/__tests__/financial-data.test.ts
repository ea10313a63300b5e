import { Currency, createMoney } from '@sharepool/core';
import type { Logger } from '@sharepool/logger';
import { describe, expect, it, vi } from 'vitest';

import { CachingSecurityInfoProvider } from '../../providers/caching/provider.js';
import { LocalHistoricalExchangeRateProvider } from '../../providers/local/provider.js';
import { ManualExchangeRateProvider } from '../../providers/manual/provider.js';
import { StaticSecurityInfoProvider } from '../../providers/static/provider.js';
import { FinancialData } from '../financial-data.js';

const GBP = Currency.create('GBP');
const USD = Currency.create('USD');

function createLogger(): Logger {
  return { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), isLevelEnabled: () => true };
}

const securities = StaticSecurityInfoProvider.create([
  { isin: 'US00TEST0001', name: 'Test Inc', price: { amount: '100', currency: 'USD' } },
])._unsafeUnwrap();

describe('FinancialData', () => {
  it('should return provider information', () => {
    const data = new FinancialData({ securityInfo: securities }, createLogger());

    expect(data.getSecurityInfo('US00TEST0001', 'Test Inc').name).toBe('Test Inc');
    expect(data.getSecurityPrice('US00TEST0001')?.amount.toString()).toBe('100');
  });

  it('should degrade a provider error to no splits and warn', () => {
    const logger = createLogger();
    const data = new FinancialData({ securityInfo: securities }, logger);

    const info = data.getSecurityInfo('GB00TEST0009', 'Unlisted Plc');

    expect(info.name).toBe('Unlisted Plc');
    expect(info.splits).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      { provider: 'static', error: 'DataNotFoundError' },
      'Security information not found for Unlisted Plc (GB00TEST0009)'
    );
  });

  it('should degrade cache misses silently', () => {
    const logger = createLogger();
    const data = new FinancialData({ securityInfo: new CachingSecurityInfoProvider(undefined, createLogger()) }, logger);

    expect(data.getSecurityInfo('GB00TEST0001', 'Test Plc').splits).toEqual([]);
    expect(data.getSecurityPrice('GB00TEST0001', 'Test Plc')).toBeUndefined();
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should return nothing without providers', () => {
    const data = new FinancialData({}, createLogger());

    expect(data.getSecurityPrice('US00TEST0001')).toBeUndefined();
    expect(data.getExchangeRate(USD, GBP)).toBeUndefined();
    expect(data.getExchangeRate(USD, GBP, new Date('2024-01-15T00:00:00Z'))).toBeUndefined();
  });

  it('should use live rates without a date and historical rates with one', () => {
    const historical = LocalHistoricalExchangeRateProvider.fromCsv('Date,Currency,Rate\n2024-01-15,USD,1.25\n')._unsafeUnwrap();
    const data = new FinancialData(
      { liveRates: new ManualExchangeRateProvider([{ base: 'GBP', quote: 'USD', rate: '1.6' }]), historicalRates: historical },
      createLogger()
    );

    expect(data.getExchangeRate(USD, GBP)?.toString()).toBe('0.625');
    expect(data.getExchangeRate(USD, GBP, new Date('2024-01-15T12:00:00Z'))?.toString()).toBe('0.8');
  });

  it('should convert money and keep money already in the target currency', () => {
    const data = new FinancialData(
      { liveRates: new ManualExchangeRateProvider([{ base: 'GBP', quote: 'USD', rate: '1.25' }]) },
      createLogger()
    );
    const sterling = createMoney('10', 'GBP');

    expect(data.convertMoney(createMoney('50', 'USD'), GBP)?.amount.toString()).toBe('40');
    expect(data.convertMoney(sterling, GBP)).toBe(sterling);
    expect(data.getExchangeRate(GBP, GBP)?.toString()).toBe('1');
  });

  it('should return undefined when no rate is known', () => {
    const data = new FinancialData({ liveRates: new ManualExchangeRateProvider() }, createLogger());

    expect(data.convertMoney(createMoney('50', 'USD'), GBP)).toBeUndefined();
  });
});
