export {
  TaxCalculatorConfigSchema,
  createTaxCalculatorConfig,
  loadTaxCalculatorConfig,
  type TaxCalculatorConfig,
  type TaxCalculatorConfigInput,
} from './config/tax-calculator-config.js';
export { CapitalGain, type Identification } from './domain/capital-gain.js';
export { Section104Holding } from './domain/section104-holding.js';
export type { CapitalGainsSummary, GroupKey, MatchingQueues } from './domain/types.js';
export {
  THIRTY_DAY_WINDOW,
  isSameDayMatch,
  isThirtyDayMatch,
  matchShares,
  type MatchPredicate,
  type MatchResult,
} from './matching/matching-utils.js';
export { buildMatchingQueues, getGroupKey, groupSameDayOrders } from './matching/same-day-utils.js';
export { processSection104, type Section104Result } from './matching/section104-utils.js';
export { adjustForShareSplits, checkBaseCurrency, normalizeOrders } from './normalization/order-normalization-utils.js';
export { TaxCalculator, type TaxCalculationError } from './services/tax-calculator.js';
export { summarizeCapitalGains } from './summary/capital-gains-summary-utils.js';
export { raiseOrWarn, type StrictModeOptions } from './utils/strict-mode-utils.js';
