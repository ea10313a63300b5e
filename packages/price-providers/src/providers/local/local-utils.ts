import { CurrencySchema, PositiveDecimalSchema } from '@sharepool/core';
import type { Decimal } from 'decimal.js';
import { z } from 'zod';

export const RATE_FILE_FIELDS = ['Date', 'Currency', 'Rate'] as const;

export const RateRowSchema = z.object({
  Date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date'),
  Currency: CurrencySchema,
  Rate: PositiveDecimalSchema,
});

export type RateRow = z.infer<typeof RateRowSchema>;

/**
 * Rates indexed by ISO date, then by currency code
 */
export type RateTable = Map<string, Map<string, Decimal>>;

export function hasExpectedHeader(header: readonly string[]): boolean {
  return header.length === RATE_FILE_FIELDS.length && RATE_FILE_FIELDS.every((field, index) => header[index] === field);
}

export function buildRateTable(rows: readonly RateRow[]): RateTable {
  const table: RateTable = new Map();
  for (const row of rows) {
    const rates = table.get(row.Date) ?? new Map<string, Decimal>();
    rates.set(row.Currency.toString(), row.Rate);
    table.set(row.Date, rates);
  }
  return table;
}
