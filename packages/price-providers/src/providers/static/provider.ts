import {
  DateSchema,
  IsinSchema,
  MoneySchema,
  PositiveDecimalSchema,
  ValidationError,
  formatZodIssues,
  fromZod,
} from '@sharepool/core';
import type { Money } from '@sharepool/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import { DataNotFoundError } from '../../core/errors.js';
import type { ShareSplit, SecurityInfo, SecurityInfoProvider } from '../../core/types.js';

const ShareSplitSchema = z.object({
  dateEffective: DateSchema,
  ratio: PositiveDecimalSchema,
});

export const SecurityRecordSchema = z.object({
  isin: IsinSchema,
  name: z.string().trim().min(1, 'Security name must not be empty'),
  splits: z.array(ShareSplitSchema).default([]),
  price: MoneySchema.optional(),
});

export type SecurityRecord = z.input<typeof SecurityRecordSchema>;

interface StoredSecurity {
  name: string;
  splits: ShareSplit[];
  price: Money | undefined;
}

/**
 * Security information held in memory, e.g. loaded from a fixture or a
 * configuration file
 */
export class StaticSecurityInfoProvider implements SecurityInfoProvider {
  readonly name = 'static';

  private constructor(
    private readonly securities: Map<string, StoredSecurity>,
    private readonly lastUpdated: Date
  ) {}

  static create(
    records: readonly SecurityRecord[],
    lastUpdated: Date = new Date()
  ): Result<StaticSecurityInfoProvider, ValidationError> {
    const parsed = fromZod(z.array(SecurityRecordSchema), records);
    if (parsed.isErr()) {
      return err(new ValidationError(`Invalid security records: ${formatZodIssues(parsed.error)}`));
    }

    const securities = new Map<string, StoredSecurity>();
    for (const record of parsed.value) {
      if (securities.has(record.isin)) {
        return err(new ValidationError(`Duplicate security record for ${record.isin}`));
      }
      securities.set(record.isin, {
        name: record.name,
        splits: [...record.splits].sort((a, b) => a.dateEffective.getTime() - b.dateEffective.getTime()),
        price: record.price,
      });
    }

    return ok(new StaticSecurityInfoProvider(securities, lastUpdated));
  }

  getInfo(isin: string, name: string): Result<SecurityInfo, DataNotFoundError> {
    const security = this.securities.get(isin);
    if (!security) {
      return err(new DataNotFoundError(`Security information not found for ${name} (${isin})`, this.name));
    }

    return ok({ name: security.name, splits: [...security.splits], lastUpdated: this.lastUpdated });
  }

  getPrice(isin: string, name: string): Result<Money, DataNotFoundError> {
    const price = this.securities.get(isin)?.price;
    if (!price) {
      return err(new DataNotFoundError(`Price not found for ${name} (${isin})`, this.name));
    }

    return ok(price);
  }
}
