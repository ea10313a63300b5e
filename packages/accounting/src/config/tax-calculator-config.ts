import { CurrencySchema, ValidationError, formatZodIssues, fromZod } from '@sharepool/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

export const TaxCalculatorConfigSchema = z.object({
  /** Currency every order must be denominated in, and gains are reported in */
  baseCurrency: CurrencySchema.default('GBP'),
  /** Abort on the first data integrity violation instead of warning */
  strict: z.boolean().default(true),
  /** Whether currency conversion fees count as allowable costs */
  includeFxFees: z.boolean().default(true),
});

export type TaxCalculatorConfig = z.infer<typeof TaxCalculatorConfigSchema>;
export type TaxCalculatorConfigInput = z.input<typeof TaxCalculatorConfigSchema>;

const booleanFlag = z
  .enum(['true', 'false'], { errorMap: () => ({ message: "Expected 'true' or 'false'" }) })
  .transform((val) => val === 'true')
  .optional();

const taxCalculatorEnvSchema = z.object({
  SHAREPOOL_BASE_CURRENCY: z.string().trim().min(1).optional(),
  SHAREPOOL_STRICT: booleanFlag,
  SHAREPOOL_INCLUDE_FX_FEES: booleanFlag,
});

export function createTaxCalculatorConfig(
  input: TaxCalculatorConfigInput = {}
): Result<TaxCalculatorConfig, ValidationError> {
  const parsed = fromZod(TaxCalculatorConfigSchema, input);
  if (parsed.isErr()) {
    return err(new ValidationError(`Invalid tax calculator configuration: ${formatZodIssues(parsed.error)}`));
  }
  return ok(parsed.value);
}

/**
 * Build a configuration from SHAREPOOL_* environment variables, defaulting
 * whatever is unset
 */
export function loadTaxCalculatorConfig(
  env: NodeJS.ProcessEnv = process.env
): Result<TaxCalculatorConfig, ValidationError> {
  const parsed = fromZod(taxCalculatorEnvSchema, env);
  if (parsed.isErr()) {
    return err(new ValidationError(`Invalid tax calculator environment: ${formatZodIssues(parsed.error)}`));
  }

  const { SHAREPOOL_BASE_CURRENCY, SHAREPOOL_STRICT, SHAREPOOL_INCLUDE_FX_FEES } = parsed.value;
  return createTaxCalculatorConfig({
    ...(SHAREPOOL_BASE_CURRENCY !== undefined && { baseCurrency: SHAREPOOL_BASE_CURRENCY }),
    ...(SHAREPOOL_STRICT !== undefined && { strict: SHAREPOOL_STRICT }),
    ...(SHAREPOOL_INCLUDE_FX_FEES !== undefined && { includeFxFees: SHAREPOOL_INCLUDE_FX_FEES }),
  });
}
