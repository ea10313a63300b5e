export type { ITransactionRepository, OrderFilters, Security } from './repositories/transaction-repository.interface.js';
export { TransactionHistory, type TransactionHistoryInput } from './repositories/transaction-history.js';
export { computeTransactionFingerprint, removeDuplicates } from './utils/fingerprint-utils.js';
