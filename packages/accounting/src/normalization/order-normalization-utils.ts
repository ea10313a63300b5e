import {
  FEE_CATEGORIES,
  InvariantViolationError,
  adjustOrderQuantity,
  excludeForexFee,
} from '@sharepool/core';
import type { Currency, Order, OrderSequence } from '@sharepool/core';
import type { Logger } from '@sharepool/logger';
import type { SecurityDataSource } from '@sharepool/price-providers';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { TaxCalculatorConfig } from '../config/tax-calculator-config.js';
import { raiseOrWarn } from '../utils/strict-mode-utils.js';

/**
 * Check that an order's total and every fee it carries are in the base currency
 */
export function checkBaseCurrency(order: Order, baseCurrency: Currency): Result<Order, InvariantViolationError> {
  const amounts = [order.total, ...FEE_CATEGORIES.map((category) => order.fees.get(category))];
  const foreign = amounts.find((money) => money !== undefined && !money.currency.equals(baseCurrency));

  if (foreign !== undefined) {
    return err(
      new InvariantViolationError(
        `Order ${order.number} for ${order.name} (${order.isin}) is not denominated in ${baseCurrency.toString()}: found ${foreign.currency.toString()}`,
        {
          transactionId: order.transactionId,
          additionalContext: { isin: order.isin, orderNumber: order.number },
        }
      )
    );
  }

  return ok(order);
}

/**
 * Restate an order in post-split units using the share splits the data
 * source knows for its security
 */
export function adjustForShareSplits<T extends Order>(
  order: T,
  dataSource: SecurityDataSource,
  sequence: OrderSequence
): T {
  const { splits } = dataSource.getSecurityInfo(order.isin, order.name, order.timestamp);
  return adjustOrderQuantity(order, splits, sequence);
}

/**
 * Prepare orders for matching: reject (or, in lenient mode, drop) orders not
 * in the base currency, apply share splits and, when configured, take
 * currency conversion fees out of the allowable costs.
 */
export function normalizeOrders(
  orders: readonly Order[],
  dataSource: SecurityDataSource,
  config: TaxCalculatorConfig,
  sequence: OrderSequence,
  logger: Logger
): Result<Order[], InvariantViolationError> {
  const normalized: Order[] = [];

  for (const order of orders) {
    const checked = checkBaseCurrency(order, config.baseCurrency);
    if (checked.isErr()) {
      const outcome = raiseOrWarn(checked.error, { strict: config.strict, logger });
      if (outcome.isErr()) {
        return err(outcome.error);
      }
      continue;
    }

    let adjusted = adjustForShareSplits(order, dataSource, sequence);
    if (adjusted !== order) {
      logger.debug({ isin: order.isin, orderNumber: adjusted.number }, adjusted.notes ?? 'Applied share splits');
    }

    if (!config.includeFxFees) {
      adjusted = excludeForexFee(adjusted, sequence);
    }

    normalized.push(adjusted);
  }

  return ok(normalized);
}
