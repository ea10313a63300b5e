import fs from 'node:fs/promises';

import { GBP, formatIsoDate, formatZodIssues, fromZod, getErrorMessage, toCalendarDate } from '@sharepool/core';
import type { Currency } from '@sharepool/core';
import { getLogger } from '@sharepool/logger';
import { parse } from 'csv-parse/sync';
import { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

import { DataNotFoundError, ProviderError, RequestError } from '../../core/errors.js';
import type { HistoricalExchangeRateProvider } from '../../core/types.js';

import { RateRowSchema, buildRateTable, hasExpectedHeader } from './local-utils.js';
import type { RateTable } from './local-utils.js';

const PROVIDER_NAME = 'local-historical';

const logger = getLogger('LocalHistoricalExchangeRateProvider');

/**
 * Historical exchange rates read from a CSV file with a `Date,Currency,Rate`
 * header. Each row gives the units of `Currency` per one unit of the base
 * currency on that date, so one side of every query must be the base
 * currency.
 */
export class LocalHistoricalExchangeRateProvider implements HistoricalExchangeRateProvider {
  readonly name = PROVIDER_NAME;

  private constructor(
    private readonly rates: RateTable,
    private readonly baseCurrency: Currency
  ) {}

  static fromCsv(content: string, baseCurrency: Currency = GBP): Result<LocalHistoricalExchangeRateProvider, ProviderError> {
    let header: string[] = [];
    let records: unknown;
    try {
      // Remove BOM
      records = parse(content.replace(/^\uFEFF/, ''), {
        columns: (columns: string[]) => {
          header = columns;
          return columns;
        },
        skip_empty_lines: true,
        trim: true,
      });
    } catch (error) {
      return err(new ProviderError(`Exchange rates file is invalid: ${getErrorMessage(error)}`, PROVIDER_NAME));
    }

    if (!hasExpectedHeader(header)) {
      return err(new ProviderError('Exchange rates file is invalid: expected header Date,Currency,Rate', PROVIDER_NAME));
    }

    const rows = fromZod(z.array(RateRowSchema), records);
    if (rows.isErr()) {
      return err(new ProviderError(`Exchange rates file is invalid: ${formatZodIssues(rows.error)}`, PROVIDER_NAME));
    }

    return ok(new LocalHistoricalExchangeRateProvider(buildRateTable(rows.value), baseCurrency));
  }

  static async fromFile(
    filePath: string,
    baseCurrency: Currency = GBP
  ): Promise<Result<LocalHistoricalExchangeRateProvider, ProviderError>> {
    logger.info({ filePath }, 'Loading historical exchange rates');
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      return LocalHistoricalExchangeRateProvider.fromCsv(content, baseCurrency);
    } catch (error) {
      return err(new ProviderError(`Failed to read exchange rates file: ${getErrorMessage(error)}`, PROVIDER_NAME));
    }
  }

  getRate(base: Currency, quote: Currency, date: Date): Result<Decimal, ProviderError> {
    const rates = this.rates.get(formatIsoDate(toCalendarDate(date)));

    if (base.equals(this.baseCurrency)) {
      const rate = rates?.get(quote.toString());
      if (rate) return ok(rate);
    } else if (quote.equals(this.baseCurrency)) {
      const rate = rates?.get(base.toString());
      if (rate) return ok(new Decimal(1).dividedBy(rate));
    } else {
      return err(new RequestError(`Either base or quote must be ${this.baseCurrency.toString()}`, this.name));
    }

    return err(
      new DataNotFoundError(
        `Exchange rate not found: ${base.toString()}-${quote.toString()} on ${formatIsoDate(date)}`,
        this.name
      )
    );
  }
}
