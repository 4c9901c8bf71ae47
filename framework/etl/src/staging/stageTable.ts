/**
 * Stage Tables
 *
 * Rebuilds `stage.<source>` from `raw.<source>` and the reference tables, and
 * reads staged rows back.
 *
 * A rebuild never leaves an empty or half-written stage table visible: rows are
 * written to a scratch table which replaces the live one inside the same
 * transaction. Concurrent rebuilds of one source queue on an advisory lock
 * taken before anything is read, so the last rebuild to commit has read the
 * newest raw and reference data.
 */

import { withTransaction, type Database, type Queryable } from '../core/db.js';
import { InvalidIdentifierError, UnknownTableError } from '../core/errors.js';
import { normalizeProjects } from '../normalization/transform.js';
import {
  DEFAULT_SOURCE_COLUMNS,
  DERIVED_COLUMNS,
  type EnrichedRecord,
  type NormalizationOptions,
  type ReferenceData,
  type SourceColumns,
} from '../normalization/types.js';
import { parseReferenceRows } from '../normalization/references.js';
import {
  assertIdentifier,
  MAX_IDENTIFIER_LENGTH,
  qualifiedName,
  quoteIdent,
} from '../utils/identifiers.js';
import {
  buildCreateTableQuery,
  buildInsertQuery,
  buildSelectQuery,
  chunk,
  insertBatchSize,
  type ColumnDefinition,
} from '../utils/queryBuilder.js';
import { resolveSchemas, type SchemaNames } from './schemas.js';
import { dropTable, selectTableRecord, selectTableRows, type PageOptions } from './tableReads.js';

/** A raw project table and any columns it names differently from the default */
export interface SourceDefinition {
  name: string;
  columns?: Partial<SourceColumns>;
}

export interface StageOptions {
  schemas?: Partial<SchemaNames>;
  /** Rows per INSERT statement (default: 1000) */
  batchSize?: number;
  normalization?: Omit<NormalizationOptions, 'columns'>;
}

export interface StageRunSummary {
  source: string;
  table: string;
  rowCount: number;
  durationMs: number;
}

const SCRATCH_SUFFIX = '__next';
const DEFAULT_BATCH_SIZE = 1000;

/** Longest source name whose scratch table name still fits an identifier */
export const MAX_SOURCE_NAME_LENGTH = MAX_IDENTIFIER_LENGTH - SCRATCH_SUFFIX.length;

/**
 * Columns of a table in ordinal order, with types as PostgreSQL formats them.
 * Empty when the table does not exist.
 */
export async function describeColumns(
  db: Queryable,
  schema: string,
  table: string
): Promise<ColumnDefinition[]> {
  const result = await db.query(
    `SELECT a.attname AS column_name, format_type(a.atttypid, a.atttypmod) AS data_type
     FROM pg_catalog.pg_attribute a
     JOIN pg_catalog.pg_class c ON c.oid = a.attrelid
     JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
     WHERE n.nspname = $1 AND c.relname = $2 AND a.attnum > 0 AND NOT a.attisdropped
     ORDER BY a.attnum`,
    [schema, table]
  );
  return result.rows.map(row => ({
    name: String(row.column_name),
    dataType: String(row.data_type),
  }));
}

export async function loadReferenceData(db: Queryable, schema: string): Promise<ReferenceData> {
  const countries = buildSelectQuery(
    qualifiedName(schema, 'countries'),
    ['alpha3_code', 'name', 'subregion_name'],
    { orderBy: { columns: ['alpha3_code'] } }
  );
  const exchangeRates = buildSelectQuery(
    qualifiedName(schema, 'exchange_rates'),
    ['country_code', 'year', 'exchange_rate'],
    { orderBy: { columns: ['country_code', 'year'] } }
  );
  const gdpDeflators = buildSelectQuery(
    qualifiedName(schema, 'gdp_deflators'),
    ['country_code', 'year', 'deflation_factor'],
    { orderBy: { columns: ['country_code', 'year'] } }
  );

  // Sequential: inside a rebuild all three reads share one client
  const countryRows = await db.query(countries.query, countries.params);
  const rateRows = await db.query(exchangeRates.query, exchangeRates.params);
  const deflatorRows = await db.query(gdpDeflators.query, gdpDeflators.params);

  return parseReferenceRows({
    countries: countryRows.rows,
    exchangeRates: rateRows.rows,
    gdpDeflators: deflatorRows.rows,
  });
}

/** Raw columns with derived ones replacing any of the same name, then the derived columns */
export function stageColumns(rawColumns: ColumnDefinition[]): ColumnDefinition[] {
  const derivedNames = new Set<string>(DERIVED_COLUMNS.map(c => c.name));
  return [
    ...rawColumns.filter(c => !derivedNames.has(c.name)),
    ...DERIVED_COLUMNS.map(c => ({ name: c.name, dataType: c.type })),
  ];
}

async function writeStageTable(
  client: Queryable,
  schema: string,
  source: string,
  columns: ColumnDefinition[],
  keyColumns: string[],
  records: EnrichedRecord[],
  batchSize: number
): Promise<void> {
  const target = qualifiedName(schema, source);
  const scratch = qualifiedName(schema, `${source}${SCRATCH_SUFFIX}`);
  const names = columns.map(c => c.name);

  await client.query(`DROP TABLE IF EXISTS ${scratch}`);
  await client.query(buildCreateTableQuery(scratch, columns));

  const size = insertBatchSize(batchSize, names.length);
  for (const batch of chunk(records, size)) {
    const { query, params } = buildInsertQuery(
      scratch,
      names,
      batch.map(record => names.map(name => record[name]))
    );
    await client.query(query, params);
  }

  await client.query(`DROP TABLE IF EXISTS ${target}`);
  await client.query(`ALTER TABLE ${scratch} RENAME TO ${quoteIdent(source)}`);
  // Added after the rename so the index carries the final table name
  if (keyColumns.length > 0) {
    await client.query(
      `ALTER TABLE ${target} ADD CONSTRAINT ${quoteIdent(`${source}_pkey`)} ` +
      `PRIMARY KEY (${keyColumns.map(quoteIdent).join(', ')})`
    );
  }
}

function assertSourceName(name: string): string {
  assertIdentifier(name);
  if (name.length > MAX_SOURCE_NAME_LENGTH) {
    throw new InvalidIdentifierError(name);
  }
  return name;
}

/**
 * Recompute `stage.<source>` from `raw.<source>`.
 *
 * Everything runs in one transaction on one client, after the source's
 * advisory lock: describing the raw table, reading references and raw rows,
 * and the swap. Raw rows are read in key order so that a rerun on unchanged
 * inputs writes an identical table. Database errors propagate; the previous
 * stage table survives any failure.
 */
export async function rebuildStageTable(
  db: Database,
  source: SourceDefinition,
  options: StageOptions = {}
): Promise<StageRunSummary> {
  const startedAt = Date.now();
  const schemas = resolveSchemas(options.schemas);
  const name = assertSourceName(source.name);
  const columns: SourceColumns = { ...DEFAULT_SOURCE_COLUMNS, ...source.columns };

  const rowCount = await withTransaction(db, async client => {
    await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [`${schemas.stage}.${name}`]);

    const rawColumns = await describeColumns(client, schemas.raw, name);
    if (rawColumns.length === 0) {
      throw new UnknownTableError(schemas.raw, name);
    }
    const present = new Set(rawColumns.map(c => c.name));
    const keyColumns = [columns.projectId, columns.sample].filter(c => present.has(c));

    const references = await loadReferenceData(client, schemas.reference);
    const select = buildSelectQuery(qualifiedName(schemas.raw, name), ['*'], {
      orderBy: { columns: keyColumns },
    });
    const raw = await client.query(select.query, select.params);

    const records = normalizeProjects(raw.rows, references, {
      ...options.normalization,
      columns,
    });

    await writeStageTable(
      client,
      schemas.stage,
      name,
      stageColumns(rawColumns),
      keyColumns.length === 2 ? keyColumns : [],
      records,
      options.batchSize ?? DEFAULT_BATCH_SIZE
    );
    return records.length;
  });

  const summary: StageRunSummary = {
    source: name,
    table: `${schemas.stage}.${name}`,
    rowCount,
    durationMs: Date.now() - startedAt,
  };
  console.log(`[stage] rebuilt ${summary.table}: ${summary.rowCount} rows in ${summary.durationMs}ms`);
  return summary;
}

export async function selectStageRows(
  db: Queryable,
  source: string,
  options: PageOptions & { schemas?: Partial<SchemaNames>; columns?: Partial<SourceColumns> } = {}
): Promise<Record<string, unknown>[]> {
  const schemas = resolveSchemas(options.schemas);
  const columns = { ...DEFAULT_SOURCE_COLUMNS, ...options.columns };
  return selectTableRows(db, schemas.stage, source, columns, options);
}

/** One staged project, or null when no row has that key */
export async function selectStageRecord(
  db: Queryable,
  source: string,
  projectId: string,
  sample: string,
  options: { schemas?: Partial<SchemaNames>; columns?: Partial<SourceColumns> } = {}
): Promise<Record<string, unknown> | null> {
  const schemas = resolveSchemas(options.schemas);
  const columns = { ...DEFAULT_SOURCE_COLUMNS, ...options.columns };
  return selectTableRecord(db, schemas.stage, source, columns, projectId, sample);
}

/** Staged columns holding schedule overrun (or any other) ratios */
export async function listRatioColumns(
  db: Queryable,
  source: string,
  options: { schemas?: Partial<SchemaNames> } = {}
): Promise<string[]> {
  const schemas = resolveSchemas(options.schemas);
  const columns = await describeColumns(db, schemas.stage, assertIdentifier(source));
  if (columns.length === 0) {
    throw new UnknownTableError(schemas.stage, source);
  }
  return columns.map(c => c.name).filter(name => name.endsWith('_ratio'));
}

export async function dropStageTable(
  db: Queryable,
  source: string,
  options: { schemas?: Partial<SchemaNames> } = {}
): Promise<void> {
  const schemas = resolveSchemas(options.schemas);
  await dropTable(db, schemas.stage, source);
  console.log(`[stage] dropped ${schemas.stage}.${source}`);
}
