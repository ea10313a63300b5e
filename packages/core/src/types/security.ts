import type { Decimal } from 'decimal.js';

/**
 * A share split (or consolidation, for ratios below one) effective from
 * `dateEffective`: every share held before that instant becomes `ratio`
 * shares.
 */
export interface ShareSplit {
  dateEffective: Date;
  ratio: Decimal;
}
