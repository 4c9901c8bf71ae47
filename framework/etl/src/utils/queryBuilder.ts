/**
 * SQL Query Builder Utilities
 *
 * Identifiers are quoted here; callers pass plain names. Every value is a
 * bind parameter.
 */

import { quoteIdent } from './identifiers.js';

/** PostgreSQL's limit on bind parameters in one statement */
export const MAX_BIND_PARAMETERS = 65535;

export interface WhereCondition {
  column: string;
  operator: '=' | '!=' | '>' | '>=' | '<' | '<=' | 'IN';
  value: unknown;
}

export interface ColumnDefinition {
  name: string;
  /** SQL type as PostgreSQL renders it, e.g. `double precision` */
  dataType: string;
}

/**
 * Build WHERE clause from conditions
 */
export function buildWhereClause(
  conditions: WhereCondition[],
  startIndex: number = 1
): { clause: string; params: unknown[]; nextIndex: number } {
  if (conditions.length === 0) {
    return { clause: '', params: [], nextIndex: startIndex };
  }

  const clauses: string[] = [];
  const params: unknown[] = [];
  let paramIndex = startIndex;

  for (const condition of conditions) {
    const column = quoteIdent(condition.column);
    if (condition.operator === 'IN') {
      const values = Array.isArray(condition.value) ? condition.value : [condition.value];
      const placeholders = values.map(() => `$${paramIndex++}`).join(', ');
      clauses.push(`${column} IN (${placeholders})`);
      params.push(...values);
    } else {
      clauses.push(`${column} ${condition.operator} $${paramIndex++}`);
      params.push(condition.value);
    }
  }

  return {
    clause: `WHERE ${clauses.join(' AND ')}`,
    params,
    nextIndex: paramIndex,
  };
}

/**
 * Build ORDER BY clause
 */
export function buildOrderByClause(
  columns: string[],
  direction: 'ASC' | 'DESC' = 'ASC'
): string {
  if (columns.length === 0) {
    return '';
  }
  return `ORDER BY ${columns.map(c => `${quoteIdent(c)} ${direction}`).join(', ')}`;
}

/**
 * Build LIMIT/OFFSET clause
 */
export function buildLimitOffsetClause(
  startIndex: number,
  limit?: number,
  offset?: number
): { clause: string; params: unknown[]; nextIndex: number } {
  const parts: string[] = [];
  const params: unknown[] = [];
  let idx = startIndex;

  if (limit !== undefined) {
    parts.push(`LIMIT $${idx++}`);
    params.push(limit);
  }

  if (offset !== undefined) {
    parts.push(`OFFSET $${idx++}`);
    params.push(offset);
  }

  return {
    clause: parts.join(' '),
    params,
    nextIndex: idx,
  };
}

/**
 * Helper to build a simple select query.
 * `table` must already be quoted (see `qualifiedName`); `columns` of `['*']`
 * selects every column.
 */
export function buildSelectQuery(
  table: string,
  columns: string[],
  options: {
    conditions?: WhereCondition[];
    orderBy?: { columns: string[]; direction?: 'ASC' | 'DESC' };
    limit?: number;
    offset?: number;
  } = {}
): { query: string; params: unknown[] } {
  const { conditions = [], orderBy, limit, offset } = options;
  const parts: string[] = [];
  let params: unknown[] = [];
  let paramIndex = 1;

  // SELECT
  const columnList = columns.length === 1 && columns[0] === '*'
    ? '*'
    : columns.map(quoteIdent).join(', ');
  parts.push(`SELECT ${columnList} FROM ${table}`);

  // WHERE
  if (conditions.length > 0) {
    const where = buildWhereClause(conditions, paramIndex);
    parts.push(where.clause);
    params = params.concat(where.params);
    paramIndex = where.nextIndex;
  }

  // ORDER BY
  if (orderBy && orderBy.columns.length > 0) {
    parts.push(buildOrderByClause(orderBy.columns, orderBy.direction));
  }

  // LIMIT/OFFSET
  if (limit !== undefined || offset !== undefined) {
    const limitOffset = buildLimitOffsetClause(paramIndex, limit, offset);
    parts.push(limitOffset.clause);
    params = params.concat(limitOffset.params);
  }

  return {
    query: parts.join(' '),
    params,
  };
}

/**
 * CREATE TABLE statement for a quoted table name
 */
export function buildCreateTableQuery(
  table: string,
  columns: ColumnDefinition[],
  primaryKey: string[] = []
): string {
  const definitions = columns.map(c => {
    const notNull = primaryKey.includes(c.name) ? ' NOT NULL' : '';
    return `${quoteIdent(c.name)} ${c.dataType}${notNull}`;
  });
  if (primaryKey.length > 0) {
    definitions.push(`PRIMARY KEY (${primaryKey.map(quoteIdent).join(', ')})`);
  }
  return `CREATE TABLE ${table} (${definitions.join(', ')})`;
}

/**
 * Multi-row INSERT with one bind parameter per cell
 */
export function buildInsertQuery(
  table: string,
  columns: string[],
  rows: unknown[][]
): { query: string; params: unknown[] } {
  const params: unknown[] = [];
  let paramIndex = 1;

  const tuples = rows.map(row => {
    const placeholders = columns.map((_, i) => {
      params.push(row[i] ?? null);
      return `$${paramIndex++}`;
    });
    return `(${placeholders.join(', ')})`;
  });

  return {
    query: `INSERT INTO ${table} (${columns.map(quoteIdent).join(', ')}) VALUES ${tuples.join(', ')}`,
    params,
  };
}

/**
 * Largest batch that keeps an insert of `columnCount` columns under the
 * bind parameter limit, capped at `batchSize`.
 */
export function insertBatchSize(batchSize: number, columnCount: number): number {
  const byParameters = Math.floor(MAX_BIND_PARAMETERS / Math.max(columnCount, 1));
  return Math.max(1, Math.min(batchSize, byParameters));
}

/** Split rows into consecutive batches */
export function chunk<T>(items: T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, i + size));
  }
  return batches;
}
