/**
 * Keyed reads shared by raw and stage tables.
 */

import type { Queryable } from '../core/db.js';
import { assertIdentifier, qualifiedName } from '../utils/identifiers.js';
import { buildSelectQuery } from '../utils/queryBuilder.js';
import type { SourceColumns } from '../normalization/types.js';

export interface PageOptions {
  limit?: number;
  offset?: number;
}

export type KeyColumns = Pick<SourceColumns, 'projectId' | 'sample'>;

export async function selectTableRows(
  db: Queryable,
  schema: string,
  table: string,
  keys: KeyColumns,
  page: PageOptions = {}
): Promise<Record<string, unknown>[]> {
  const { query, params } = buildSelectQuery(
    qualifiedName(schema, assertIdentifier(table)),
    ['*'],
    {
      orderBy: { columns: [keys.projectId, keys.sample] },
      limit: page.limit,
      offset: page.offset,
    }
  );
  const result = await db.query(query, params);
  return result.rows;
}

/** One row by project id and sample, or null */
export async function selectTableRecord(
  db: Queryable,
  schema: string,
  table: string,
  keys: KeyColumns,
  projectId: string,
  sample: string
): Promise<Record<string, unknown> | null> {
  const { query, params } = buildSelectQuery(
    qualifiedName(schema, assertIdentifier(table)),
    ['*'],
    {
      conditions: [
        { column: keys.projectId, operator: '=', value: projectId },
        { column: keys.sample, operator: '=', value: sample },
      ],
      limit: 1,
    }
  );
  const result = await db.query(query, params);
  return result.rows[0] ?? null;
}

export async function dropTable(db: Queryable, schema: string, table: string): Promise<void> {
  await db.query(`DROP TABLE IF EXISTS ${qualifiedName(schema, assertIdentifier(table))}`);
}

