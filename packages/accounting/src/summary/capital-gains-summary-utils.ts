import { sumOf } from '@sharepool/core';

import type { CapitalGain } from '../domain/capital-gain.js';
import type { CapitalGainsSummary } from '../domain/types.js';

/**
 * Totals for the capital gains pages of a Self Assessment return. Each
 * matched part of a disposal counts as one disposal. Amounts are kept at full
 * precision.
 */
export function summarizeCapitalGains(taxYear: number, gains: readonly CapitalGain[]): CapitalGainsSummary {
  const yearGains = gains.filter((gain) => gain.taxYear === taxYear);
  const results = yearGains.map((gain) => gain.gainLoss);

  const gainsBeforeLosses = sumOf(results.filter((result) => result.isPositive() && !result.isZero()));
  const losses = sumOf(results.filter((result) => result.isNegative() || result.isZero()).map((result) => result.abs()));

  return {
    taxYear,
    numberOfDisposals: yearGains.length,
    disposalProceeds: sumOf(yearGains.map((gain) => gain.grossProceeds)),
    allowableCosts: sumOf(yearGains.map((gain) => gain.cost)),
    gainsBeforeLosses,
    losses,
    netGains: gainsBeforeLosses.minus(losses),
  };
}
