import type { Currency, Money } from '@sharepool/core';
import { getLogger } from '@sharepool/logger';
import type { Logger } from '@sharepool/logger';
import { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

import { CacheMissError } from '../core/errors.js';
import type { ProviderError } from '../core/errors.js';
import type {
  HistoricalExchangeRateProvider,
  LiveExchangeRateProvider,
  SecurityDataSource,
  SecurityInfo,
  SecurityInfoProvider,
} from '../core/types.js';

export interface FinancialDataProviders {
  securityInfo?: SecurityInfoProvider | undefined;
  liveRates?: LiveExchangeRateProvider | undefined;
  historicalRates?: HistoricalExchangeRateProvider | undefined;
}

/**
 * Facade over the security and exchange rate providers.
 *
 * Provider failures never reach the caller: they are logged (cache misses
 * silently) and turned into "no data".
 */
export class FinancialData implements SecurityDataSource {
  private readonly securityInfoProvider: SecurityInfoProvider | undefined;
  private readonly liveRatesProvider: LiveExchangeRateProvider | undefined;
  private readonly historicalRatesProvider: HistoricalExchangeRateProvider | undefined;

  constructor(
    providers: FinancialDataProviders = {},
    private readonly logger: Logger = getLogger('FinancialData')
  ) {
    this.securityInfoProvider = providers.securityInfo;
    this.liveRatesProvider = providers.liveRates;
    this.historicalRatesProvider = providers.historicalRates;
  }

  getSecurityInfo(isin: string, name = '', refreshDate?: Date): SecurityInfo {
    const info = this.securityInfoProvider
      ? this.unwrapOrWarn(this.securityInfoProvider.getInfo(isin, name, refreshDate))
      : undefined;

    return info ?? { name, splits: [], lastUpdated: new Date() };
  }

  getSecurityPrice(isin: string, name = ''): Money | undefined {
    if (!this.securityInfoProvider) return undefined;
    return this.unwrapOrWarn(this.securityInfoProvider.getPrice(isin, name));
  }

  /**
   * Units of `quote` per one unit of `base`: live without a date, historical
   * on the date's calendar day otherwise
   */
  getExchangeRate(base: Currency, quote: Currency, date?: Date): Decimal | undefined {
    if (base.equals(quote)) {
      return new Decimal(1);
    }

    if (date === undefined) {
      return this.liveRatesProvider ? this.unwrapOrWarn(this.liveRatesProvider.getRate(base, quote)) : undefined;
    }

    return this.historicalRatesProvider
      ? this.unwrapOrWarn(this.historicalRatesProvider.getRate(base, quote, date))
      : undefined;
  }

  convertMoney(money: Money, currency: Currency, date?: Date): Money | undefined {
    if (money.currency.equals(currency)) {
      return money;
    }

    const rate = this.getExchangeRate(money.currency, currency, date);
    return rate ? { amount: money.amount.times(rate), currency } : undefined;
  }

  private unwrapOrWarn<T>(result: Result<T, ProviderError>): T | undefined {
    if (result.isOk()) {
      return result.value;
    }

    if (!(result.error instanceof CacheMissError)) {
      this.logger.warn({ provider: result.error.provider, error: result.error.name }, result.error.message);
    }
    return undefined;
  }
}
