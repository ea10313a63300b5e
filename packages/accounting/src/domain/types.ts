import type { Acquisition, Disposal, OrderKind } from '@sharepool/core';
import type { Decimal } from 'decimal.js';

/**
 * Same-day bucket: orders of one security, in one direction, on one calendar date
 */
export interface GroupKey {
  isin: string;
  /** YYYY-MM-DD */
  date: string;
  kind: OrderKind;
}

/**
 * Pending orders of one security, each queue in chronological order
 */
export interface MatchingQueues {
  acquisitions: Acquisition[];
  disposals: Disposal[];
}

export interface CapitalGainsSummary {
  taxYear: number;
  numberOfDisposals: number;
  /** Sum of gross proceeds */
  disposalProceeds: Decimal;
  /** Sum of allowable costs, purchase price included */
  allowableCosts: Decimal;
  gainsBeforeLosses: Decimal;
  /** Sum of losses, as a positive amount */
  losses: Decimal;
  netGains: Decimal;
}
