import {
  AmbiguousTickerError,
  DividendSchema,
  InterestSchema,
  OrderInputSchema,
  OrderSequence,
  TransferSchema,
  ValidationError,
  compareByTimestamp,
  createOrder,
  formatZodIssues,
  fromZod,
  getTaxYear,
} from '@sharepool/core';
import type {
  Dividend,
  DividendRecord,
  Interest,
  InterestRecord,
  Order,
  OrderInputRecord,
  Transfer,
  TransferRecord,
} from '@sharepool/core';
import { getLogger } from '@sharepool/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { removeDuplicates } from '../utils/fingerprint-utils.js';

import type { ITransactionRepository, OrderFilters, Security } from './transaction-repository.interface.js';

const logger = getLogger('TransactionHistory');

export interface TransactionHistoryInput {
  orders?: readonly OrderInputRecord[] | undefined;
  dividends?: readonly DividendRecord[] | undefined;
  transfers?: readonly TransferRecord[] | undefined;
  interest?: readonly InterestRecord[] | undefined;
}

function parseRecords<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  records: readonly unknown[] | undefined,
  label: string
): Result<T[], ValidationError> {
  const parsed: T[] = [];
  for (const [index, record] of (records ?? []).entries()) {
    const result = fromZod(schema, record);
    if (result.isErr()) {
      return err(
        new ValidationError(`Invalid ${label} at index ${index}: ${formatZodIssues(result.error)}`, {
          additionalContext: { index, label },
        })
      );
    }
    parsed.push(result.value);
  }
  return ok(parsed);
}

function sortByTimestamp<T extends Order | Dividend | Transfer | Interest>(transactions: T[]): T[] {
  return transactions.sort(compareByTimestamp);
}

/**
 * In-memory share dealing history.
 *
 * Records are validated, exact duplicates dropped and every list sorted by
 * timestamp. Orders are numbered from 1 in the order they were supplied.
 */
export class TransactionHistory implements ITransactionRepository {
  private securities: Security[] | undefined;

  private constructor(
    private readonly orders: readonly Order[],
    private readonly dividends: readonly Dividend[],
    private readonly transfers: readonly Transfer[],
    private readonly interest: readonly Interest[]
  ) {}

  static create(input: TransactionHistoryInput = {}): Result<TransactionHistory, ValidationError> {
    const orderInputs = parseRecords(OrderInputSchema, input.orders, 'order');
    if (orderInputs.isErr()) return err(orderInputs.error);

    const dividends = parseRecords(DividendSchema, input.dividends, 'dividend');
    if (dividends.isErr()) return err(dividends.error);

    const transfers = parseRecords(TransferSchema, input.transfers, 'transfer');
    if (transfers.isErr()) return err(transfers.error);

    const interest = parseRecords(InterestSchema, input.interest, 'interest');
    if (interest.isErr()) return err(interest.error);

    const uniqueOrderInputs = removeDuplicates(orderInputs.value);
    const duplicates = orderInputs.value.length - uniqueOrderInputs.length;
    if (duplicates > 0) {
      logger.debug({ duplicates }, 'Dropped duplicate orders');
    }

    const sequence = new OrderSequence();
    const orders = uniqueOrderInputs.map((order) => createOrder(order, sequence.next()));

    return ok(
      new TransactionHistory(
        sortByTimestamp(orders),
        sortByTimestamp(removeDuplicates(dividends.value)),
        sortByTimestamp(removeDuplicates(transfers.value)),
        sortByTimestamp(removeDuplicates(interest.value))
      )
    );
  }

  getOrders(filters: OrderFilters = {}): readonly Order[] {
    const { isin, kind, taxYear } = filters;
    if (isin === undefined && kind === undefined && taxYear === undefined) {
      return this.orders;
    }

    return this.orders.filter(
      (order) =>
        (isin === undefined || order.isin === isin) &&
        (kind === undefined || order.kind === kind) &&
        (taxYear === undefined || getTaxYear(order.timestamp) === taxYear)
    );
  }

  getDividends(): readonly Dividend[] {
    return this.dividends;
  }

  getTransfers(): readonly Transfer[] {
    return this.transfers;
  }

  getInterest(): readonly Interest[] {
    return this.interest;
  }

  /**
   * Names come from each security's most recent order
   */
  getSecurities(): readonly Security[] {
    if (!this.securities) {
      const names = new Map<string, string>();
      for (const order of this.orders) {
        names.set(order.isin, order.name);
      }
      this.securities = [...names.entries()]
        .map(([isin, name]) => ({ isin, name }))
        .sort((a, b) => a.name.localeCompare(b.name) || a.isin.localeCompare(b.isin));
    }
    return this.securities;
  }

  getSecurityName(isin: string): string | undefined {
    return this.getSecurities().find((security) => security.isin === isin)?.name;
  }

  getTickerIsin(ticker: string): Result<string | undefined, AmbiguousTickerError> {
    const isins = [...new Set(this.orders.filter((order) => order.ticker === ticker).map((order) => order.isin))];

    if (isins.length > 1) {
      return err(new AmbiguousTickerError(ticker, isins.sort()));
    }
    return ok(isins[0]);
  }
}
