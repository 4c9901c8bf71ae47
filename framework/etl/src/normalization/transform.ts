/**
 * Project Normalization Transform
 *
 * Enriches raw project rows with country names, phase durations, schedule
 * overrun ratios and an estimated cost restated in US dollars at the target
 * year's price level.
 *
 * Every reference lookup is optional: a row that matches nothing keeps all of
 * its columns and gets nulls for what could not be derived. The output always
 * has exactly one row per input row, in input order.
 */

import { midYearDate, yearsBetween } from '../utils/dates.js';
import {
  buildReferenceIndex,
  resolveTargetYear,
  type ReferenceIndex,
} from './references.js';
import {
  DEFAULT_SOURCE_COLUMNS,
  type DerivedFields,
  type EnrichedRecord,
  type NormalizationOptions,
  type ProjectRecord,
  type ReferenceData,
  type ResolvedNormalizationOptions,
} from './types.js';

/** Country whose exchange rate is the dollar itself */
export const USD_COUNTRY_CODE = 'USA';

export function resolveNormalizationOptions(
  options: NormalizationOptions = {}
): ResolvedNormalizationOptions {
  return {
    targetYear: options.targetYear ?? 'latest',
    exchangeRateQuote: options.exchangeRateQuote ?? 'usd-per-local',
    imputeDatesFromYears: options.imputeDatesFromYears ?? false,
    columns: { ...DEFAULT_SOURCE_COLUMNS, ...options.columns },
  };
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toYear(value: unknown): number | null {
  const year = toFiniteNumber(value);
  return year !== null && Number.isInteger(year) ? year : null;
}

function toCountryCode(value: unknown): string | null {
  return typeof value === 'string' && value !== '' ? value : null;
}

function finiteOrNull(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}

/**
 * actual / estimated, or null when either is missing or the estimate is zero.
 * Negative durations pass through unclamped.
 */
export function overrunRatio(actual: number | null, estimated: number | null): number | null {
  if (actual === null || estimated === null || estimated === 0) {
    return null;
  }
  return finiteOrNull(actual / estimated);
}

function readDate(record: ProjectRecord, column: string, impute: boolean): unknown {
  const value = record[column];
  if (!impute || (value !== null && value !== undefined && value !== '')) {
    return value;
  }
  if (!column.endsWith('_date')) {
    return value;
  }
  const year = toYear(record[`${column.slice(0, -'_date'.length)}_year`]);
  return year === null ? value : midYearDate(year);
}

/**
 * Estimated cost at the target year's price level, in US dollars:
 *
 *   cost × deflator(country, target) × rate(country, cost year)
 *        ÷ deflator(country, cost year) ÷ rate(USA, cost year)
 *
 * with the two rates swapped for `local-per-usd` quotes.
 */
export function normalizeCost(
  record: ProjectRecord,
  index: ReferenceIndex,
  targetYear: number | null,
  options: ResolvedNormalizationOptions
): number | null {
  const { columns } = options;
  const cost = toFiniteNumber(record[columns.estimatedCost]);
  const costYear = toYear(record[columns.estimatedCostYear]);
  const country = toCountryCode(record[columns.countryIso3]);
  if (cost === null || costYear === null || country === null || targetYear === null) {
    return null;
  }

  const targetDeflator = index.deflator(country, targetYear);
  const costYearDeflator = index.deflator(country, costYear);
  const countryRate = index.exchangeRate(country, costYear);
  const usdRate = index.exchangeRate(USD_COUNTRY_CODE, costYear);
  if (targetDeflator === null || costYearDeflator === null || countryRate === null || usdRate === null) {
    return null;
  }

  const [multiplier, divisor] = options.exchangeRateQuote === 'usd-per-local'
    ? [countryRate, usdRate]
    : [usdRate, countryRate];

  return finiteOrNull(cost * targetDeflator * multiplier / costYearDeflator / divisor);
}

/**
 * Derive the enrichment fields for a single record against a prepared index.
 */
export function deriveFields(
  record: ProjectRecord,
  index: ReferenceIndex,
  targetYear: number | null,
  options: ResolvedNormalizationOptions
): DerivedFields {
  const { columns, imputeDatesFromYears: impute } = options;

  const decision = readDate(record, columns.decisionDate, impute);
  const constructionStart = readDate(record, columns.constructionStartDate, impute);
  const actualCompletion = readDate(record, columns.actualCompletionDate, impute);
  const estimatedCompletion = readDate(record, columns.estimatedCompletionDate, impute);

  const actConstruction = yearsBetween(constructionStart, actualCompletion);
  const estConstruction = yearsBetween(constructionStart, estimatedCompletion);
  const actFbc = yearsBetween(decision, actualCompletion);
  const estFbc = yearsBetween(decision, estimatedCompletion);

  const code = toCountryCode(record[columns.countryIso3]);
  const country = code === null ? null : index.country(code);

  return {
    country_name: country?.name ?? null,
    subregion_name: country?.subregionName ?? null,
    act_duration_construction: actConstruction,
    est_duration_construction: estConstruction,
    act_duration_fbc: actFbc,
    est_duration_fbc: estFbc,
    schedule_overrun_construction_ratio: overrunRatio(actConstruction, estConstruction),
    schedule_overrun_fbc_ratio: overrunRatio(actFbc, estFbc),
    est_cost_latest_usd_millions: normalizeCost(record, index, targetYear, options),
  };
}

/**
 * Normalize one record. Builds a reference index for the call; use
 * `normalizeProjects` for batches.
 */
export function normalizeProject(
  record: ProjectRecord,
  references: ReferenceData,
  options: NormalizationOptions = {}
): EnrichedRecord {
  return normalizeProjects([record], references, options)[0];
}

export function normalizeProjects(
  records: ProjectRecord[],
  references: ReferenceData,
  options: NormalizationOptions = {}
): EnrichedRecord[] {
  const resolved = resolveNormalizationOptions(options);
  const index = buildReferenceIndex(references);
  const targetYear = resolveTargetYear(index, resolved.targetYear);

  return records.map(record => ({
    ...record,
    ...deriveFields(record, index, targetYear, resolved),
  }));
}
