import { z } from 'zod';

import type { Currency } from '../value-objects/currency.js';
import { Fees } from '../value-objects/fees.js';
import type { FeeAmounts } from '../value-objects/fees.js';

import { DateSchema, MoneySchema, PositiveDecimalSchema } from './money.js';

export const IsinSchema = z
  .string()
  .trim()
  .min(1, 'ISIN must not be empty')
  .transform((val) => val.toUpperCase());

export const FeeAmountsSchema = z.object({
  stampDuty: MoneySchema.optional(),
  forex: MoneySchema.optional(),
  finra: MoneySchema.optional(),
  sec: MoneySchema.optional(),
});

function toFees(fees: Fees | FeeAmounts | undefined, currency: Currency): Fees {
  return fees instanceof Fees ? fees : new Fees(fees, currency);
}

const TransactionFieldsSchema = z.object({
  timestamp: DateSchema,
  total: MoneySchema,
  transactionId: z.string().min(1).optional(),
  notes: z.string().optional(),
});

const OrderFieldsSchema = TransactionFieldsSchema.extend({
  isin: IsinSchema,
  ticker: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1, 'Security name must not be empty'),
  quantity: PositiveDecimalSchema,
  originalQuantity: PositiveDecimalSchema.optional(),
  fees: z.union([z.instanceof(Fees), FeeAmountsSchema]).optional(),
});

export const AcquisitionInputSchema = OrderFieldsSchema.extend({ kind: z.literal('acquisition') });
export const DisposalInputSchema = OrderFieldsSchema.extend({ kind: z.literal('disposal') });

// Fees default to none, in the currency of the order total
export const OrderInputSchema = z
  .discriminatedUnion('kind', [AcquisitionInputSchema, DisposalInputSchema])
  .transform((order) => ({ ...order, fees: toFees(order.fees, order.total.currency) }));

export const DividendSchema = TransactionFieldsSchema.extend({
  kind: z.literal('dividend'),
  isin: IsinSchema,
  name: z.string().trim().min(1),
  ticker: z.string().trim().min(1).optional(),
  withheld: MoneySchema.optional(),
});

export const TransferSchema = TransactionFieldsSchema.extend({ kind: z.literal('transfer') });

export const InterestSchema = TransactionFieldsSchema.extend({ kind: z.literal('interest') });

export type OrderInputRecord = z.input<typeof OrderInputSchema>;
export type DividendRecord = z.input<typeof DividendSchema>;
export type TransferRecord = z.input<typeof TransferSchema>;
export type InterestRecord = z.input<typeof InterestSchema>;
