import type { ColumnType } from '../utils/columnTypes.js';

/** One raw project row, keyed by lowercase column name */
export type ProjectRecord = Record<string, unknown>;

/**
 * Where the transform finds its inputs in a raw table. Each project-type table
 * names its columns the same way by default; a source overrides only what differs.
 */
export interface SourceColumns {
  projectId: string;
  sample: string;
  countryIso3: string;
  /** Decision to build / full build commitment (FBC) date */
  decisionDate: string;
  constructionStartDate: string;
  actualCompletionDate: string;
  estimatedCompletionDate: string;
  /** Estimated cost in local currency, millions */
  estimatedCost: string;
  /** Price year of the estimated cost */
  estimatedCostYear: string;
}

export const DEFAULT_SOURCE_COLUMNS: SourceColumns = {
  projectId: 'project_id',
  sample: 'sample',
  countryIso3: 'country_iso3',
  decisionDate: 'start_decision_to_build_or_fbc_date',
  constructionStartDate: 'start_construction_date',
  actualCompletionDate: 'act_completion_date',
  estimatedCompletionDate: 'est_completion_date',
  estimatedCost: 'est_fbc_cost_local_millions',
  estimatedCostYear: 'est_cost_local_year',
};

export interface CountryReference {
  alpha3Code: string;
  name: string;
  subregionName: string | null;
}

/** A null rate matches nothing */
export interface ExchangeRateReference {
  countryCode: string;
  year: number;
  exchangeRate: number | null;
}

/** A null factor matches nothing, but its year still counts towards the latest year */
export interface GdpDeflatorReference {
  countryCode: string;
  year: number;
  deflationFactor: number | null;
}

export interface ReferenceData {
  countries: CountryReference[];
  exchangeRates: ExchangeRateReference[];
  gdpDeflators: GdpDeflatorReference[];
}

/** Price level costs are expressed in: the newest deflator year, or a fixed year */
export type TargetYear = 'latest' | number;

/**
 * `usd-per-local`: one unit of local currency buys `rate` US dollars.
 * `local-per-usd`: one US dollar buys `rate` units of local currency.
 */
export type ExchangeRateQuote = 'usd-per-local' | 'local-per-usd';

export interface NormalizationOptions {
  targetYear?: TargetYear;
  exchangeRateQuote?: ExchangeRateQuote;
  /** Fill a missing date from its sibling `_year` column (2 July of that year) */
  imputeDatesFromYears?: boolean;
  columns?: Partial<SourceColumns>;
}

export interface ResolvedNormalizationOptions {
  targetYear: TargetYear;
  exchangeRateQuote: ExchangeRateQuote;
  imputeDatesFromYears: boolean;
  columns: SourceColumns;
}

export interface DerivedFields {
  country_name: string | null;
  subregion_name: string | null;
  act_duration_construction: number | null;
  est_duration_construction: number | null;
  act_duration_fbc: number | null;
  est_duration_fbc: number | null;
  schedule_overrun_construction_ratio: number | null;
  schedule_overrun_fbc_ratio: number | null;
  est_cost_latest_usd_millions: number | null;
}

export type EnrichedRecord = ProjectRecord & DerivedFields;

/** Columns appended to every staged table, in output order */
export const DERIVED_COLUMNS: ReadonlyArray<{ name: keyof DerivedFields; type: ColumnType }> = [
  { name: 'country_name', type: 'text' },
  { name: 'subregion_name', type: 'text' },
  { name: 'act_duration_construction', type: 'double precision' },
  { name: 'est_duration_construction', type: 'double precision' },
  { name: 'act_duration_fbc', type: 'double precision' },
  { name: 'est_duration_fbc', type: 'double precision' },
  { name: 'schedule_overrun_construction_ratio', type: 'double precision' },
  { name: 'schedule_overrun_fbc_ratio', type: 'double precision' },
  { name: 'est_cost_latest_usd_millions', type: 'double precision' },
];
