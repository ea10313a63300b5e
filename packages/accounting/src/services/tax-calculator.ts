import { OrderSequence, multiplyMoney } from '@sharepool/core';
import type { IncompleteRecordsError, InvariantViolationError, Money } from '@sharepool/core';
import type { ITransactionRepository } from '@sharepool/data';
import { getLogger } from '@sharepool/logger';
import type { Logger } from '@sharepool/logger';
import type { SecurityDataSource } from '@sharepool/price-providers';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { TaxCalculatorConfigSchema } from '../config/tax-calculator-config.js';
import type { TaxCalculatorConfig } from '../config/tax-calculator-config.js';
import type { CapitalGain } from '../domain/capital-gain.js';
import type { Section104Holding } from '../domain/section104-holding.js';
import type { CapitalGainsSummary } from '../domain/types.js';
import { isSameDayMatch, isThirtyDayMatch, matchShares } from '../matching/matching-utils.js';
import { buildMatchingQueues } from '../matching/same-day-utils.js';
import { processSection104 } from '../matching/section104-utils.js';
import { normalizeOrders } from '../normalization/order-normalization-utils.js';
import { summarizeCapitalGains } from '../summary/capital-gains-summary-utils.js';

export type TaxCalculationError = IncompleteRecordsError | InvariantViolationError;

interface CalculationState {
  /** Keyed by tax year, ascending; each list ordered by disposal time then ISIN */
  gainsByYear: Map<number, CapitalGain[]>;
  /** Keyed by ISIN, ascending */
  holdings: Map<string, Section104Holding>;
}

function compareGains(a: CapitalGain, b: CapitalGain): number {
  const byTime = a.disposal.timestamp.getTime() - b.disposal.timestamp.getTime();
  if (byTime !== 0) return byTime;
  if (a.disposal.isin < b.disposal.isin) return -1;
  if (a.disposal.isin > b.disposal.isin) return 1;
  return 0;
}

/**
 * Capital gains engine for shares held by a UK individual.
 *
 * Nothing is computed until the first query. The outcome, including a strict
 * mode failure, is kept for the lifetime of the instance, so a changed
 * history needs a new calculator.
 */
export class TaxCalculator {
  private state: Result<CalculationState, TaxCalculationError> | undefined;

  constructor(
    private readonly repository: ITransactionRepository,
    private readonly dataSource: SecurityDataSource,
    private readonly config: TaxCalculatorConfig = TaxCalculatorConfigSchema.parse({}),
    private readonly logger: Logger = getLogger('TaxCalculator')
  ) {}

  /**
   * Gains for one tax year, or for every year in ascending order
   */
  getCapitalGains(taxYear?: number): Result<CapitalGain[], TaxCalculationError> {
    return this.calculate().map((state) => {
      if (taxYear !== undefined) {
        return [...(state.gainsByYear.get(taxYear) ?? [])];
      }
      return [...state.gainsByYear.values()].flat();
    });
  }

  getHoldings(): Result<Section104Holding[], TaxCalculationError> {
    return this.calculate().map((state) => [...state.holdings.values()]);
  }

  getHolding(isin: string): Result<Section104Holding | undefined, TaxCalculationError> {
    return this.calculate().map((state) => state.holdings.get(isin));
  }

  /**
   * Market value of a holding in the base currency, undefined when there is
   * no holding, no live price or no exchange rate
   */
  getHoldingValue(isin: string): Result<Money | undefined, TaxCalculationError> {
    return this.calculate().map((state) => {
      const holding = state.holdings.get(isin);
      if (!holding) return undefined;

      const price = this.dataSource.getSecurityPrice(isin, holding.name);
      if (!price) return undefined;

      const converted = this.dataSource.convertMoney(price, this.config.baseCurrency);
      if (!converted) return undefined;

      return multiplyMoney(converted, holding.quantity);
    });
  }

  /** Tax years with at least one disposal, ascending */
  getDisposalYears(): Result<number[], TaxCalculationError> {
    return this.calculate().map((state) => [...state.gainsByYear.keys()]);
  }

  getSummary(taxYear: number): Result<CapitalGainsSummary, TaxCalculationError> {
    return this.calculate().map((state) => summarizeCapitalGains(taxYear, state.gainsByYear.get(taxYear) ?? []));
  }

  private calculate(): Result<CalculationState, TaxCalculationError> {
    if (this.state === undefined) {
      this.state = this.calculateCapitalGains();
      if (this.state.isErr()) {
        this.logger.error({ code: this.state.error.code }, this.state.error.message);
      }
    }
    return this.state;
  }

  private calculateCapitalGains(): Result<CalculationState, TaxCalculationError> {
    const orders = this.repository.getOrders();
    this.logger.info({ orders: orders.length, strict: this.config.strict }, 'Calculating capital gains');

    const sequence = OrderSequence.after(orders);
    const strictMode = { strict: this.config.strict, logger: this.logger };

    const normalized = normalizeOrders(orders, this.dataSource, this.config, sequence, this.logger);
    if (normalized.isErr()) {
      return err(normalized.error);
    }

    const queuesResult = buildMatchingQueues(normalized.value, sequence, this.logger);
    if (queuesResult.isErr()) {
      return err(queuesResult.error);
    }
    const queuesByIsin = queuesResult.value;

    const gains: CapitalGain[] = [];
    const holdings = new Map<string, Section104Holding>();

    for (const isin of [...queuesByIsin.keys()].sort()) {
      const queues = queuesByIsin.get(isin);
      if (!queues) continue;

      const name = this.repository.getSecurityName(isin) ?? '';
      this.logger.debug({ isin }, `Calculating capital gains for ${name}`);

      const sameDay = matchShares(queues, isSameDayMatch, sequence);
      if (sameDay.isErr()) {
        return err(sameDay.error);
      }

      const thirtyDay = matchShares(sameDay.value.queues, isThirtyDayMatch, sequence);
      if (thirtyDay.isErr()) {
        return err(thirtyDay.error);
      }

      const pool = processSection104(isin, name, thirtyDay.value.queues, strictMode);
      if (pool.isErr()) {
        return err(pool.error);
      }

      gains.push(...sameDay.value.gains, ...thirtyDay.value.gains, ...pool.value.gains);
      if (pool.value.holding) {
        holdings.set(isin, pool.value.holding);
      }
    }

    const gainsByYear = new Map<number, CapitalGain[]>();
    for (const gain of gains.sort(compareGains)) {
      const yearGains = gainsByYear.get(gain.taxYear);
      if (yearGains) {
        yearGains.push(gain);
      } else {
        gainsByYear.set(gain.taxYear, [gain]);
      }
    }

    this.logger.info(
      { disposals: gains.length, holdings: holdings.size, taxYears: [...gainsByYear.keys()] },
      'Capital gains calculated'
    );

    return ok({ gainsByYear, holdings });
  }
}
