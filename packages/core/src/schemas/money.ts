import { Decimal } from 'decimal.js';
import { z } from 'zod';

import { Currency } from '../value-objects/currency.js';

// Decimal schema - accepts string, number, or Decimal instance, transforms to Decimal
// Used for parsing CSV cells (strings), hand-written fixtures (numbers) or validating in-memory objects (Decimal instances)
export const DecimalSchema = z
  .union([z.string().min(1, 'Must not be empty'), z.number(), z.instanceof(Decimal)])
  .transform((val, ctx) => {
    if (val instanceof Decimal) return val;
    try {
      return new Decimal(val);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid decimal value: ${String(val)}` });
      return z.NEVER;
    }
  });

export const PositiveDecimalSchema = DecimalSchema.refine((val) => val.gt(0), {
  message: 'Must be greater than zero',
});

// Date-time string without a zone designator or offset, e.g. 2024-04-06T00:30:00 or 2024-04-06 00:30
const NAIVE_DATE_TIME_PATTERN = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;

/**
 * Parse an ISO 8601 string. Date-time strings without an offset are read as
 * UTC, so parsing does not depend on the host time zone.
 */
export function parseIsoDate(value: string): Date {
  const naive = NAIVE_DATE_TIME_PATTERN.exec(value.trim());
  return naive ? new Date(`${naive[1] ?? ''}T${naive[2] ?? ''}Z`) : new Date(value);
}

// Date schema - accepts Unix timestamp in milliseconds, ISO 8601 string, or Date instance, transforms to Date
export const DateSchema = z
  .union([
    z.number().int().positive(),
    z.string().refine((val) => !isNaN(parseIsoDate(val).getTime()), { message: 'Invalid date string' }),
    z.date(),
  ])
  .transform((val) => {
    if (typeof val === 'number') {
      return new Date(val);
    }
    if (typeof val === 'string') {
      return parseIsoDate(val);
    }
    return val;
  })
  .refine((val) => !isNaN(val.getTime()), { message: 'Invalid date' });

// Currency schema - transforms string to Currency instance
export const CurrencySchema = z
  .string()
  .min(1, 'Currency must not be empty')
  .transform((val, ctx) => {
    if (!Currency.isValid(val)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid currency code: ${val}` });
      return z.NEVER;
    }
    return Currency.create(val);
  })
  .or(z.custom<Currency>((val) => val instanceof Currency, { message: 'Expected Currency instance' }));

// Money schema for consistent amount and currency structure
export const MoneySchema = z.object({
  amount: DecimalSchema,
  currency: CurrencySchema,
});
