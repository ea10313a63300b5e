import { Currency } from '@sharepool/core';
import { describe, expect, it } from 'vitest';

import { ManualExchangeRateProvider } from '../provider.js';

const GBP = Currency.create('GBP');
const USD = Currency.create('USD');
const EUR = Currency.create('EUR');

describe('ManualExchangeRateProvider', () => {
  it('should return entered rates and derive their inverse', () => {
    const provider = new ManualExchangeRateProvider([{ base: 'GBP', quote: 'USD', rate: '1.25' }]);

    expect(provider.getRate(GBP, USD)._unsafeUnwrap().toString()).toBe('1.25');
    expect(provider.getRate(USD, GBP)._unsafeUnwrap().toString()).toBe('0.8');
  });

  it('should return one for the same currency', () => {
    expect(new ManualExchangeRateProvider().getRate(EUR, EUR)._unsafeUnwrap().toString()).toBe('1');
  });

  it('should let later entries replace earlier ones', () => {
    const provider = new ManualExchangeRateProvider([{ base: GBP, quote: EUR, rate: 1.1 }]);
    provider.setRate('gbp', 'eur', '1.2');

    expect(provider.getRate(GBP, EUR)._unsafeUnwrap().toString()).toBe('1.2');
  });

  it('should report an unknown pair', () => {
    expect(new ManualExchangeRateProvider().getRate(USD, EUR)._unsafeUnwrapErr().message).toBe(
      'Exchange rate not found: USD-EUR'
    );
  });
});
