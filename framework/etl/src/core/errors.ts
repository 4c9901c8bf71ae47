/**
 * ETL Errors
 *
 * Error types raised by the ETL operations and a formatter for reporting them
 * from scripts.
 */

import pg from 'pg';
import { ZodError, type ZodIssue } from 'zod';

export class EtlError extends Error {
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export interface RawDataLocation {
  file: string;
  /** 1-based line in the file, header included */
  line?: number;
  column?: string;
}

/** A raw CSV file that cannot be loaded as-is */
export class RawDataError extends EtlError {
  constructor(message: string, readonly location: RawDataLocation) {
    super(message, 'RAW_DATA_ERROR', location);
  }
}

export class UnknownTableError extends EtlError {
  constructor(readonly schema: string, readonly table: string) {
    super(`Table ${schema}.${table} does not exist`, 'UNKNOWN_TABLE', { schema, table });
  }
}

/** A reference table row of the wrong shape, e.g. a non-numeric rate */
export class ReferenceDataError extends EtlError {
  constructor(readonly table: string, readonly issues: ZodIssue[]) {
    super(
      `Invalid ${table} rows: ${issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
      'INVALID_REFERENCE_DATA',
      issues
    );
  }
}

export class InvalidIdentifierError extends EtlError {
  constructor(readonly identifier: string) {
    super(`Invalid SQL identifier: ${JSON.stringify(identifier)}`, 'INVALID_IDENTIFIER', { identifier });
  }
}

/**
 * Render an error for a terminal
 *
 * Handles:
 * - Zod validation errors (one line per issue)
 * - EtlError subclasses (prefixed with their code)
 * - PostgreSQL errors (prefixed with the SQLSTATE)
 * - Generic errors
 */
export function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    return [
      'VALIDATION_ERROR: Invalid configuration',
      ...err.errors.map(e => `  ${e.path.join('.')}: ${e.message}`),
    ].join('\n');
  }

  if (err instanceof EtlError) {
    return `${err.code}: ${err.message}`;
  }

  if (err instanceof pg.DatabaseError) {
    return `DATABASE_ERROR${err.code ? ` (${err.code})` : ''}: ${err.message}`;
  }

  return err instanceof Error ? err.message : 'Unknown error';
}
