/**
 * Raw Table Loading
 *
 * Loads a project CSV file into `raw.<file name>`, typing columns by their
 * names (see `inferColumnType`). The table is replaced wholesale. Loaded
 * tables can be read back by key and dropped.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import { withTransaction, type Database, type Queryable } from '../core/db.js';
import { RawDataError } from '../core/errors.js';
import { castValue, inferColumnType, type CellValue } from '../utils/columnTypes.js';
import { assertIdentifier, qualifiedName } from '../utils/identifiers.js';
import {
  buildCreateTableQuery,
  buildInsertQuery,
  chunk,
  insertBatchSize,
  type ColumnDefinition,
} from '../utils/queryBuilder.js';
import { DEFAULT_SOURCE_COLUMNS, type SourceColumns } from '../normalization/types.js';
import { resolveSchemas, type SchemaNames } from './schemas.js';
import { dropTable, selectTableRecord, selectTableRows, type PageOptions } from './tableReads.js';

export const DEFAULT_PRIMARY_KEY = ['project_id', 'sample'];

export interface RawTable {
  columns: ColumnDefinition[];
  rows: CellValue[][];
}

export interface LoadRawOptions {
  schemas?: Partial<SchemaNames>;
  primaryKey?: string[];
  batchSize?: number;
  /** Table name (default: the file name without extension, lowercased) */
  table?: string;
}

/**
 * Parse and type a raw project CSV.
 * `file` only labels errors.
 */
export function parseRawCsv(
  text: string,
  file: string,
  primaryKey: string[] = DEFAULT_PRIMARY_KEY
): RawTable {
  const parsed = Papa.parse<Record<string, string>>(text.replace(/^\uFEFF/, ''), {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
    transformHeader: header => header.trim().toLowerCase(),
  });

  if (parsed.errors.length > 0) {
    const [first] = parsed.errors;
    throw new RawDataError(`Malformed CSV: ${first.message}`, {
      file,
      // papaparse rows are 0-based data rows; line 1 is the header
      line: first.row !== undefined ? first.row + 2 : undefined,
    });
  }

  const headers = parsed.meta.fields ?? [];
  if (headers.length === 0) {
    throw new RawDataError('CSV file has no header row', { file });
  }
  for (const header of headers) {
    try {
      assertIdentifier(header);
    } catch {
      throw new RawDataError(`Column name ${JSON.stringify(header)} is not a valid identifier`, { file, line: 1 });
    }
  }
  const missingKeys = primaryKey.filter(key => !headers.includes(key));
  if (missingKeys.length > 0) {
    throw new RawDataError(`Missing key column(s): ${missingKeys.join(', ')}`, { file, line: 1 });
  }

  const columns = headers.map(name => ({ name, dataType: inferColumnType(name) }));
  const keyIndexes = primaryKey.map(key => headers.indexOf(key));
  const seenKeys = new Set<string>();

  const rows = parsed.data.map((record, i) => {
    const line = i + 2;
    const row = columns.map(column => {
      const result = castValue(column.dataType, record[column.name] ?? '');
      if (!result.ok) {
        throw new RawDataError(result.reason, { file, line, column: column.name });
      }
      return result.value;
    });

    const key = keyIndexes.map(index => row[index]);
    const missing = keyIndexes.find(index => row[index] === null);
    if (missing !== undefined) {
      throw new RawDataError('Key column is empty', { file, line, column: headers[missing] });
    }
    const keyText = JSON.stringify(key);
    if (seenKeys.has(keyText)) {
      throw new RawDataError(`Duplicate key ${keyText}`, { file, line });
    }
    seenKeys.add(keyText);

    return row;
  });

  return { columns, rows };
}

/**
 * Replace `raw.<table>` with the contents of a CSV file.
 * Returns the qualified table name and row count.
 */
export async function loadRawTable(
  db: Database,
  filePath: string,
  options: LoadRawOptions = {}
): Promise<{ table: string; rowCount: number }> {
  const schemas = resolveSchemas(options.schemas);
  const primaryKey = options.primaryKey ?? DEFAULT_PRIMARY_KEY;
  const tableName = options.table ?? path.basename(filePath, path.extname(filePath)).toLowerCase();

  try {
    assertIdentifier(tableName);
  } catch {
    throw new RawDataError(`File name does not make a valid table name: ${tableName}`, { file: filePath });
  }

  const text = await readFile(filePath, 'utf8');
  const { columns, rows } = parseRawCsv(text, filePath, primaryKey);
  const table = qualifiedName(schemas.raw, tableName);
  const names = columns.map(c => c.name);

  await withTransaction(db, async client => {
    await client.query(`DROP TABLE IF EXISTS ${table}`);
    await client.query(buildCreateTableQuery(table, columns, primaryKey));
    const size = insertBatchSize(options.batchSize ?? 1000, names.length);
    for (const batch of chunk(rows, size)) {
      const { query, params } = buildInsertQuery(table, names, batch);
      await client.query(query, params);
    }
  });

  console.log(`[raw] loaded ${rows.length} rows from ${path.basename(filePath)} into ${schemas.raw}.${tableName}`);
  return { table: `${schemas.raw}.${tableName}`, rowCount: rows.length };
}

export interface RawReadOptions {
  schemas?: Partial<SchemaNames>;
  columns?: Partial<SourceColumns>;
}

export async function selectRawRows(
  db: Queryable,
  table: string,
  options: PageOptions & RawReadOptions = {}
): Promise<Record<string, unknown>[]> {
  const schemas = resolveSchemas(options.schemas);
  return selectTableRows(db, schemas.raw, table, { ...DEFAULT_SOURCE_COLUMNS, ...options.columns }, options);
}

/** One raw project row, or null when no row has that key */
export async function selectRawRecord(
  db: Queryable,
  table: string,
  projectId: string,
  sample: string,
  options: RawReadOptions = {}
): Promise<Record<string, unknown> | null> {
  const schemas = resolveSchemas(options.schemas);
  const columns = { ...DEFAULT_SOURCE_COLUMNS, ...options.columns };
  return selectTableRecord(db, schemas.raw, table, columns, projectId, sample);
}

export async function dropRawTable(
  db: Queryable,
  table: string,
  options: { schemas?: Partial<SchemaNames> } = {}
): Promise<void> {
  const schemas = resolveSchemas(options.schemas);
  await dropTable(db, schemas.raw, table);
  console.log(`[raw] dropped ${schemas.raw}.${table}`);
}
