import type { Currency, Money, ShareSplit } from '@sharepool/core';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

import type { ProviderError } from './errors.js';

export type { ShareSplit } from '@sharepool/core';

/**
 * Reference data for one security
 */
export interface SecurityInfo {
  name: string;
  /** Ordered by effective date */
  splits: ShareSplit[];
  lastUpdated: Date;
}

/**
 * Source of security names, share splits and live prices
 */
export interface SecurityInfoProvider {
  readonly name: string;
  /**
   * @param refreshDate - cached information last updated before this instant is refreshed
   */
  getInfo(isin: string, name: string, refreshDate?: Date): Result<SecurityInfo, ProviderError>;
  getPrice(isin: string, name: string): Result<Money, ProviderError>;
}

/**
 * Current exchange rates: units of `quote` per one unit of `base`
 */
export interface LiveExchangeRateProvider {
  readonly name: string;
  getRate(base: Currency, quote: Currency): Result<Decimal, ProviderError>;
}

/**
 * Exchange rates on a given calendar date: units of `quote` per one unit of `base`
 */
export interface HistoricalExchangeRateProvider {
  readonly name: string;
  getRate(base: Currency, quote: Currency, date: Date): Result<Decimal, ProviderError>;
}

/**
 * What the capital gains engine needs from the outside world. Lookups never
 * fail: anything a provider cannot supply comes back as "no splits known" or
 * `undefined`.
 */
export interface SecurityDataSource {
  getSecurityInfo(isin: string, name: string, refreshDate?: Date): SecurityInfo;
  getSecurityPrice(isin: string, name?: string): Money | undefined;
  convertMoney(money: Money, currency: Currency, date?: Date): Money | undefined;
}
