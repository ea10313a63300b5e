import type { Transaction } from '../types/transaction.js';

/**
 * Comparator for ascending timestamp. Array.prototype.sort is stable, so
 * transactions with equal timestamps keep their relative order.
 */
export function compareByTimestamp(a: Transaction, b: Transaction): number {
  return a.timestamp.getTime() - b.timestamp.getTime();
}
