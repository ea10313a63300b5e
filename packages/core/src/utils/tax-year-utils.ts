import { toCalendarDate } from './date-utils.js';

// UK tax years run from 6 April to 5 April of the following year
const TAX_YEAR_MONTH_INDEX = 3;
const TAX_YEAR_START_DAY = 6;
const TAX_YEAR_END_DAY = 5;

export interface TaxYearPeriod {
  /** 6 April of the tax year, UTC midnight */
  start: Date;
  /** 5 April of the following calendar year, UTC midnight */
  end: Date;
}

/**
 * Tax years are identified by the calendar year in which they start
 * (2023 is 6 April 2023 to 5 April 2024).
 */
export function getTaxYearPeriod(taxYear: number): TaxYearPeriod {
  return {
    start: new Date(Date.UTC(taxYear, TAX_YEAR_MONTH_INDEX, TAX_YEAR_START_DAY)),
    end: new Date(Date.UTC(taxYear + 1, TAX_YEAR_MONTH_INDEX, TAX_YEAR_END_DAY)),
  };
}

export function getTaxYear(date: Date): number {
  const calendarDate = toCalendarDate(date);
  const year = calendarDate.getUTCFullYear();
  const { start } = getTaxYearPeriod(year);
  return calendarDate.getTime() >= start.getTime() ? year : year - 1;
}

export function isWithinTaxYear(date: Date, taxYear: number): boolean {
  return getTaxYear(date) === taxYear;
}

/** `2023/24` style label */
export function formatTaxYear(taxYear: number): string {
  const nextYear = String((taxYear + 1) % 100).padStart(2, '0');
  return `${taxYear}/${nextYear}`;
}
