/**
 * Reference Lookups
 *
 * Countries, exchange rates and GDP deflators indexed for point lookups.
 * Each table is expected to hold one row per key; when it does not, the first
 * row read wins and the duplicate is logged, so a bad reference table never
 * multiplies project rows.
 */

import { z } from 'zod';
import { ReferenceDataError } from '../core/errors.js';
import type {
  CountryReference,
  ExchangeRateReference,
  GdpDeflatorReference,
  ReferenceData,
  TargetYear,
} from './types.js';

// pg returns `numeric` columns as strings
const NumericSchema = z.union([
  z.number(),
  z.string().trim().min(1).pipe(z.coerce.number()),
]).pipe(z.number().finite());

export const CountryRowSchema = z.object({
  alpha3_code: z.string(),
  name: z.string(),
  subregion_name: z.string().nullable().default(null),
}).transform((row): CountryReference => ({
  alpha3Code: row.alpha3_code,
  name: row.name,
  subregionName: row.subregion_name,
}));

export const ExchangeRateRowSchema = z.object({
  country_code: z.string(),
  year: NumericSchema.pipe(z.number().int()),
  exchange_rate: NumericSchema.nullable(),
});

export const GdpDeflatorRowSchema = z.object({
  country_code: z.string(),
  year: NumericSchema.pipe(z.number().int()),
  deflation_factor: NumericSchema.nullable(),
});

function parseRows<T extends z.ZodTypeAny>(table: string, schema: T, rows: unknown[]): z.output<T>[] {
  const result = z.array(schema).safeParse(rows);
  if (!result.success) {
    throw new ReferenceDataError(table, result.error.issues);
  }
  return result.data;
}

/**
 * Validate reference rows as read from the database. Rows with a null rate or
 * factor are kept; lookups treat them as no match.
 */
export function parseReferenceRows(raw: {
  countries: unknown[];
  exchangeRates: unknown[];
  gdpDeflators: unknown[];
}): ReferenceData {
  return {
    countries: parseRows('countries', CountryRowSchema, raw.countries),
    exchangeRates: parseRows('exchange_rates', ExchangeRateRowSchema, raw.exchangeRates).map(
      (row): ExchangeRateReference => ({
        countryCode: row.country_code,
        year: row.year,
        exchangeRate: row.exchange_rate,
      })
    ),
    gdpDeflators: parseRows('gdp_deflators', GdpDeflatorRowSchema, raw.gdpDeflators).map(
      (row): GdpDeflatorReference => ({
        countryCode: row.country_code,
        year: row.year,
        deflationFactor: row.deflation_factor,
      })
    ),
  };
}

export interface ReferenceIndex {
  country(code: string): CountryReference | null;
  exchangeRate(code: string, year: number): number | null;
  deflator(code: string, year: number): number | null;
  /** Newest year present anywhere in the deflator table, null factors included */
  latestDeflatorYear: number | null;
}

function yearKey(code: string, year: number): string {
  return `${code}:${year}`;
}

function indexFirst<T>(table: string, rows: T[], keyOf: (row: T) => string): Map<string, T> {
  const index = new Map<string, T>();
  for (const row of rows) {
    const key = keyOf(row);
    if (index.has(key)) {
      console.warn(`[reference] duplicate ${table} key ${key}; keeping the first row`);
      continue;
    }
    index.set(key, row);
  }
  return index;
}

export function buildReferenceIndex(data: ReferenceData): ReferenceIndex {
  const countries = indexFirst('countries', data.countries, c => c.alpha3Code);
  const rates = indexFirst('exchange_rates', data.exchangeRates, r => yearKey(r.countryCode, r.year));
  const deflators = indexFirst('gdp_deflators', data.gdpDeflators, d => yearKey(d.countryCode, d.year));

  let latestDeflatorYear: number | null = null;
  for (const d of data.gdpDeflators) {
    if (latestDeflatorYear === null || d.year > latestDeflatorYear) {
      latestDeflatorYear = d.year;
    }
  }

  return {
    country: code => countries.get(code) ?? null,
    exchangeRate: (code, year) => rates.get(yearKey(code, year))?.exchangeRate ?? null,
    deflator: (code, year) => deflators.get(yearKey(code, year))?.deflationFactor ?? null,
    latestDeflatorYear,
  };
}

/**
 * The year costs are normalized to. `'latest'` is the newest deflator year
 * across all countries, or null when there are no deflators at all.
 */
export function resolveTargetYear(index: ReferenceIndex, target: TargetYear): number | null {
  return target === 'latest' ? index.latestDeflatorYear : target;
}
