import type { Dividend, Fees, Interest, Money, OrderInput, Transfer } from '@sharepool/core';
import { FEE_CATEGORIES, assertNever } from '@sharepool/core';

export type FingerprintSource = OrderInput | Dividend | Transfer | Interest;

function moneyKey(money: Money | undefined): string {
  return money ? `${money.amount.toString()} ${money.currency.toString()}` : '';
}

function feesKey(fees: Fees | undefined): string {
  if (!fees) return '';
  return FEE_CATEGORIES.map((category) => `${category}=${moneyKey(fees.get(category))}`).join(',');
}

/**
 * Identity of a transaction record: two records with the same fingerprint
 * describe the same event and only one of them is kept.
 *
 * Format: ${kind}|${timestamp}|${total}|${transactionId}|${notes}|${kind-specific fields}
 */
export function computeTransactionFingerprint(record: FingerprintSource): string {
  const common = [
    record.kind,
    record.timestamp.toISOString(),
    moneyKey(record.total),
    record.transactionId ?? '',
    record.notes ?? '',
  ];

  switch (record.kind) {
    case 'acquisition':
    case 'disposal':
      return [
        ...common,
        record.isin,
        record.name,
        record.ticker ?? '',
        record.quantity.toString(),
        record.originalQuantity?.toString() ?? '',
        feesKey(record.fees),
      ].join('|');
    case 'dividend':
      return [...common, record.isin, record.name, record.ticker ?? '', moneyKey(record.withheld)].join('|');
    case 'transfer':
    case 'interest':
      return common.join('|');
    default:
      return assertNever(record);
  }
}

/**
 * Keep the first record of every fingerprint, in input order
 */
export function removeDuplicates<T extends FingerprintSource>(records: readonly T[]): T[] {
  const seen = new Set<string>();
  const unique: T[] = [];
  for (const record of records) {
    const fingerprint = computeTransactionFingerprint(record);
    if (!seen.has(fingerprint)) {
      seen.add(fingerprint);
      unique.push(record);
    }
  }
  return unique;
}
