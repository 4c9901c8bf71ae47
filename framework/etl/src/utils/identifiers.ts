/**
 * SQL Identifiers
 *
 * Table, schema and column names cannot travel as bind parameters, so every
 * name that reaches a statement goes through `quoteIdent`. Names that come from
 * outside the database (CLI arguments, file names, configuration) are also held
 * to the lowercase snake case the raw tables use.
 */

import { InvalidIdentifierError } from '../core/errors.js';

/** PostgreSQL truncates identifiers beyond NAMEDATALEN - 1 bytes */
export const MAX_IDENTIFIER_LENGTH = 63;

const SNAKE_CASE_IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

/**
 * Check that a name supplied from outside the database is a plain snake_case
 * identifier, returning it unchanged.
 */
export function assertIdentifier(name: string): string {
  if (!SNAKE_CASE_IDENTIFIER.test(name) || name.length > MAX_IDENTIFIER_LENGTH) {
    throw new InvalidIdentifierError(name);
  }
  return name;
}

/**
 * Double-quote an identifier, escaping embedded quotes.
 * Catalog names (columns read back from PostgreSQL) may use any characters.
 */
export function quoteIdent(name: string): string {
  if (name.length === 0 || name.length > MAX_IDENTIFIER_LENGTH || name.includes('\0')) {
    throw new InvalidIdentifierError(name);
  }
  return `"${name.replace(/"/g, '""')}"`;
}

/** `"schema"."table"` */
export function qualifiedName(schema: string, table: string): string {
  return `${quoteIdent(schema)}.${quoteIdent(table)}`;
}
