import { describe, it, expect, vi } from 'vitest';
import { normalizeProject, normalizeProjects, overrunRatio } from '../normalization/transform.js';
import type { ProjectRecord, ReferenceData } from '../normalization/types.js';

// =============================================================================
// Test Helpers
// =============================================================================

/**
 * Rates are quoted as US dollars per unit of local currency.
 * Deflators run to 2022 for USA and DEU but stop at 2020 for FRA.
 */
function createReferences(overrides: Partial<ReferenceData> = {}): ReferenceData {
  return {
    countries: [
      { alpha3Code: 'USA', name: 'United States', subregionName: 'Northern America' },
      { alpha3Code: 'DEU', name: 'Germany', subregionName: 'Western Europe' },
      { alpha3Code: 'FRA', name: 'France', subregionName: null },
    ],
    exchangeRates: [
      { countryCode: 'USA', year: 2015, exchangeRate: 1 },
      { countryCode: 'USA', year: 2022, exchangeRate: 1 },
      { countryCode: 'DEU', year: 2015, exchangeRate: 1.1 },
      { countryCode: 'DEU', year: 2022, exchangeRate: 1.05 },
      { countryCode: 'FRA', year: 2015, exchangeRate: 1.1 },
    ],
    gdpDeflators: [
      { countryCode: 'USA', year: 2015, deflationFactor: 1 },
      { countryCode: 'USA', year: 2022, deflationFactor: 1.2 },
      { countryCode: 'DEU', year: 2015, deflationFactor: 1 },
      { countryCode: 'DEU', year: 2022, deflationFactor: 1.25 },
      { countryCode: 'FRA', year: 2015, deflationFactor: 1 },
      { countryCode: 'FRA', year: 2020, deflationFactor: 1.1 },
    ],
    ...overrides,
  };
}

/**
 * A German project decided on 2017-01-01, started 2018-01-01, due
 * 2020-01-01 and finished 2021-01-01, estimated at 200m in 2015 prices.
 */
function createRecord(overrides: ProjectRecord = {}): ProjectRecord {
  return {
    project_id: 'P1',
    sample: 'A',
    project_name: 'Alpha',
    country_iso3: 'DEU',
    start_decision_to_build_or_fbc_date: '2017-01-01',
    start_construction_date: '2018-01-01',
    act_completion_date: '2021-01-01',
    est_completion_date: '2020-01-01',
    est_fbc_cost_local_millions: 200,
    est_cost_local_year: 2015,
    ...overrides,
  };
}

// =============================================================================
// Durations and schedule overrun
// =============================================================================

describe('schedule fields', () => {
  it('computes phase durations in years of 365 days', () => {
    const result = normalizeProject(createRecord(), createReferences());

    // 2018-01-01 to 2021-01-01 spans the 2020 leap day
    expect(result.act_duration_construction).toBe(1096 / 365);
    expect(result.est_duration_construction).toBe(2);
    expect(result.act_duration_fbc).toBe(1461 / 365);
    expect(result.est_duration_fbc).toBe(3);
  });

  it('divides actual by estimated duration', () => {
    const result = normalizeProject(createRecord(), createReferences());

    expect(result.schedule_overrun_construction_ratio).toBeCloseTo(1096 / 730, 12);
    expect(result.schedule_overrun_fbc_ratio).toBeCloseTo(1461 / 1095, 12);
  });

  it('reports early completion as a ratio below one', () => {
    const result = normalizeProject(
      createRecord({ act_completion_date: '2019-01-01' }),
      createReferences()
    );
    expect(result.schedule_overrun_construction_ratio).toBeCloseTo(0.5, 12);
  });

  it('leaves durations null when a date is missing', () => {
    const result = normalizeProject(
      createRecord({ start_construction_date: null }),
      createReferences()
    );

    expect(result.act_duration_construction).toBeNull();
    expect(result.est_duration_construction).toBeNull();
    expect(result.schedule_overrun_construction_ratio).toBeNull();
    // FBC phase does not depend on the construction start
    expect(result.act_duration_fbc).toBe(1461 / 365);
  });

  it('leaves the ratio null when only the actual completion is missing', () => {
    const result = normalizeProject(
      createRecord({ act_completion_date: undefined }),
      createReferences()
    );

    expect(result.act_duration_construction).toBeNull();
    expect(result.est_duration_construction).toBe(2);
    expect(result.schedule_overrun_construction_ratio).toBeNull();
    expect(result.schedule_overrun_fbc_ratio).toBeNull();
  });

  it('returns a null ratio for a zero estimated duration', () => {
    const result = normalizeProject(
      createRecord({ est_completion_date: '2018-01-01' }),
      createReferences()
    );

    expect(result.est_duration_construction).toBe(0);
    expect(result.schedule_overrun_construction_ratio).toBeNull();
  });

  it('does not clamp negative durations', () => {
    const result = normalizeProject(
      createRecord({
        start_construction_date: '2020-01-01',
        act_completion_date: '2019-01-01',
        est_completion_date: '2021-01-01',
      }),
      createReferences()
    );

    expect(result.act_duration_construction).toBe(-1);
    expect(result.schedule_overrun_construction_ratio).toBeCloseTo(-365 / 366, 12);
  });

  it('treats unparsable dates as missing', () => {
    const result = normalizeProject(
      createRecord({ est_completion_date: 'TBD' }),
      createReferences()
    );
    expect(result.est_duration_construction).toBeNull();
    expect(result.est_duration_fbc).toBeNull();
  });
});

describe('overrunRatio', () => {
  it('handles missing and zero inputs', () => {
    expect(overrunRatio(2, 4)).toBe(0.5);
    expect(overrunRatio(null, 4)).toBeNull();
    expect(overrunRatio(2, null)).toBeNull();
    expect(overrunRatio(2, 0)).toBeNull();
    expect(overrunRatio(0, 2)).toBe(0);
  });
});

describe('year imputation', () => {
  it('fills a missing date with 2 July of its year when enabled', () => {
    const record = createRecord({
      start_construction_date: null,
      start_construction_year: 2018,
      act_completion_date: '2021-07-02',
    });

    const imputed = normalizeProject(record, createReferences(), { imputeDatesFromYears: true });
    expect(imputed.act_duration_construction).toBe(1096 / 365);

    const strict = normalizeProject(record, createReferences());
    expect(strict.act_duration_construction).toBeNull();
  });

  it('keeps a date that is present', () => {
    const result = normalizeProject(
      createRecord({ start_construction_year: 1990 }),
      createReferences(),
      { imputeDatesFromYears: true }
    );
    expect(result.est_duration_construction).toBe(2);
  });
});

// =============================================================================
// Cost normalization
// =============================================================================

describe('cost normalization', () => {
  it('restates a cost at the latest price level', () => {
    // 100 x 1.2 (USA 2022) x 1.0 (USA rate 2015) / 1.0 (USA 2015) / 1.0 (USA rate 2015)
    const result = normalizeProject(
      createRecord({ country_iso3: 'USA', est_fbc_cost_local_millions: 100 }),
      createReferences()
    );
    expect(result.est_cost_latest_usd_millions).toBeCloseTo(120, 10);
  });

  it('converts local currency to dollars', () => {
    // 200 x 1.25 x 1.1 / 1.0 / 1.0
    const result = normalizeProject(createRecord(), createReferences());
    expect(result.est_cost_latest_usd_millions).toBeCloseTo(275, 10);
  });

  it('swaps the rates for local-per-dollar quotes', () => {
    const result = normalizeProject(createRecord(), createReferences(), {
      exchangeRateQuote: 'local-per-usd',
    });
    expect(result.est_cost_latest_usd_millions).toBeCloseTo(250 / 1.1, 10);
  });

  it('only converts currency when the cost is already in target-year prices', () => {
    const result = normalizeProject(
      createRecord({ est_cost_local_year: 2022 }),
      createReferences()
    );
    expect(result.est_cost_latest_usd_millions).toBeCloseTo(200 * 1.05, 10);
  });

  it('takes the latest year across all countries, not per country', () => {
    // FRA has no 2022 deflator
    const result = normalizeProject(
      createRecord({ country_iso3: 'FRA' }),
      createReferences()
    );
    expect(result.est_cost_latest_usd_millions).toBeNull();
    expect(result.country_name).toBe('France');
  });

  it('counts a newest deflator year that has no factor', () => {
    const references = createReferences();
    references.gdpDeflators = [
      ...references.gdpDeflators,
      { countryCode: 'USA', year: 2023, deflationFactor: null },
    ];
    const result = normalizeProject(
      createRecord({ country_iso3: 'USA', est_fbc_cost_local_millions: 100 }),
      references
    );
    expect(result.est_cost_latest_usd_millions).toBeNull();
  });

  it('normalizes to an explicit target year', () => {
    const result = normalizeProject(
      createRecord({ country_iso3: 'FRA' }),
      createReferences(),
      { targetYear: 2020 }
    );
    // 200 x 1.1 x 1.1 / 1.0 / 1.0
    expect(result.est_cost_latest_usd_millions).toBeCloseTo(242, 10);
  });

  it('is null without an exchange rate for the cost year', () => {
    const result = normalizeProject(
      createRecord({ est_cost_local_year: 2010 }),
      createReferences()
    );
    expect(result.est_cost_latest_usd_millions).toBeNull();
    expect(result.est_duration_construction).toBe(2);
  });

  it('is null without a dollar rate for the cost year', () => {
    const references = createReferences();
    references.exchangeRates = references.exchangeRates.filter(r => r.countryCode !== 'USA');
    expect(normalizeProject(createRecord(), references).est_cost_latest_usd_millions).toBeNull();
  });

  it('is null when there are no deflators at all', () => {
    const result = normalizeProject(createRecord(), createReferences({ gdpDeflators: [] }));
    expect(result.est_cost_latest_usd_millions).toBeNull();
  });

  it('is null rather than infinite for a zero deflator', () => {
    const references = createReferences();
    references.gdpDeflators = references.gdpDeflators.map(d =>
      d.countryCode === 'DEU' && d.year === 2015 ? { ...d, deflationFactor: 0 } : d
    );
    expect(normalizeProject(createRecord(), references).est_cost_latest_usd_millions).toBeNull();
  });

  it('is null without a cost, a cost year or a country', () => {
    const references = createReferences();
    expect(normalizeProject(createRecord({ est_fbc_cost_local_millions: null }), references)
      .est_cost_latest_usd_millions).toBeNull();
    expect(normalizeProject(createRecord({ est_cost_local_year: null }), references)
      .est_cost_latest_usd_millions).toBeNull();
    expect(normalizeProject(createRecord({ country_iso3: null }), references)
      .est_cost_latest_usd_millions).toBeNull();
  });

  it('accepts numeric strings as PostgreSQL returns numeric columns', () => {
    const result = normalizeProject(
      createRecord({ est_fbc_cost_local_millions: '200', est_cost_local_year: '2015' }),
      createReferences()
    );
    expect(result.est_cost_latest_usd_millions).toBeCloseTo(275, 10);
  });
});

// =============================================================================
// Row handling
// =============================================================================

describe('normalizeProjects', () => {
  it('returns one row per input row, in order', () => {
    const records = [
      createRecord({ project_id: 'P1' }),
      createRecord({ project_id: 'P2', country_iso3: 'ZZZ' }),
      createRecord({ project_id: 'P3', country_iso3: null, start_construction_date: null }),
      createRecord({ project_id: 'P4', est_cost_local_year: 1900 }),
      {},
    ];

    const result = normalizeProjects(records, createReferences());

    expect(result).toHaveLength(5);
    expect(result.map(r => r.project_id)).toEqual(['P1', 'P2', 'P3', 'P4', undefined]);
  });

  it('keeps unmatched countries with null reference fields', () => {
    const [result] = normalizeProjects([createRecord({ country_iso3: 'ZZZ' })], createReferences());

    expect(result.country_name).toBeNull();
    expect(result.subregion_name).toBeNull();
    expect(result.est_cost_latest_usd_millions).toBeNull();
    expect(result.act_duration_construction).toBe(1096 / 365);
  });

  it('passes raw columns through and adds country details', () => {
    const [result] = normalizeProjects([createRecord()], createReferences());

    expect(result.project_name).toBe('Alpha');
    expect(result.start_construction_date).toBe('2018-01-01');
    expect(result.country_name).toBe('Germany');
    expect(result.subregion_name).toBe('Western Europe');
  });

  it('replaces a raw column that shares a derived name', () => {
    const [result] = normalizeProjects(
      [createRecord({ country_name: 'stale' })],
      createReferences()
    );
    expect(result.country_name).toBe('Germany');
  });

  it('reads columns through a source mapping', () => {
    const record = createRecord({ start_fid_date: '2017-01-01' });
    delete record.start_decision_to_build_or_fbc_date;

    const [result] = normalizeProjects([record], createReferences(), {
      columns: { decisionDate: 'start_fid_date' },
    });
    expect(result.est_duration_fbc).toBe(3);
  });

  it('keeps the first of duplicate reference rows', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const references = createReferences();
    references.countries.push({ alpha3Code: 'DEU', name: 'Duplicate', subregionName: null });

    const [result] = normalizeProjects([createRecord()], references);

    expect(result.country_name).toBe('Germany');
    expect(warn).toHaveBeenCalledWith('[reference] duplicate countries key DEU; keeping the first row');
  });

  it('gives identical output on repeated runs', () => {
    const records = [createRecord(), createRecord({ project_id: 'P2', country_iso3: 'USA' })];
    const references = createReferences();

    expect(normalizeProjects(records, references)).toEqual(normalizeProjects(records, references));
  });

  it('does not modify its input', () => {
    const record = createRecord();
    const before = { ...record };
    normalizeProjects([record], createReferences());
    expect(record).toEqual(before);
  });
});
