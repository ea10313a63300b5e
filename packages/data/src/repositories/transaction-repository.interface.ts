import type { AmbiguousTickerError, Dividend, Interest, Order, OrderKind, Transfer } from '@sharepool/core';
import type { Result } from 'neverthrow';

/**
 * A security as it appears in the history
 */
export interface Security {
  isin: string;
  name: string;
}

/**
 * Filters for querying orders
 */
export interface OrderFilters {
  isin?: string | undefined;
  kind?: OrderKind | undefined;
  /** Tax year identified by its starting calendar year */
  taxYear?: number | undefined;
}

/**
 * Port interface for the share dealing history.
 * Every list is free of duplicates and ordered by ascending timestamp.
 */
export interface ITransactionRepository {
  getOrders(filters?: OrderFilters): readonly Order[];

  getDividends(): readonly Dividend[];

  getTransfers(): readonly Transfer[];

  getInterest(): readonly Interest[];

  /**
   * One entry per ISIN, ordered by name
   */
  getSecurities(): readonly Security[];

  getSecurityName(isin: string): string | undefined;

  /**
   * The ISIN traded under a ticker, undefined when the ticker never appears
   */
  getTickerIsin(ticker: string): Result<string | undefined, AmbiguousTickerError>;
}
