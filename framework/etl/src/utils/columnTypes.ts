/**
 * Column Type Notation
 *
 * Raw project files carry no schema. A column's SQL type is read from its name:
 * `_year` columns are integers, `is_` columns booleans, `_date` columns dates,
 * amounts and ratios floats, and everything else text.
 */

import { toUtcDay } from './dates.js';

export type ColumnType = 'integer' | 'boolean' | 'date' | 'double precision' | 'text';

export type CellValue = string | number | boolean | null;

interface TypeNotation {
  type: ColumnType;
  suffixes: string[];
  prefixes: string[];
}

// First match wins
const COLUMN_TYPE_NOTATION: TypeNotation[] = [
  { type: 'integer', suffixes: ['_year'], prefixes: [] },
  { type: 'boolean', suffixes: [], prefixes: ['is_'] },
  { type: 'date', suffixes: ['_date'], prefixes: [] },
  {
    type: 'double precision',
    suffixes: ['_millions', '_value', '_ratio', '_duration', '_thousands', '_rate'],
    prefixes: [],
  },
];

const TRUE_VALUES = new Set(['y', 'yes', 't', 'true', 'on', '1']);
const INTEGER_PATTERN = /^[+-]?\d+$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function inferColumnType(columnName: string): ColumnType {
  const name = columnName.toLowerCase();
  for (const notation of COLUMN_TYPE_NOTATION) {
    if (
      notation.suffixes.some(suffix => name.endsWith(suffix)) ||
      notation.prefixes.some(prefix => name.startsWith(prefix))
    ) {
      return notation.type;
    }
  }
  return 'text';
}

export type CastResult =
  | { ok: true; value: CellValue }
  | { ok: false; reason: string };

/**
 * Convert a CSV cell to the value stored for a column of `type`.
 * Empty (or whitespace-only) cells are null for every type.
 */
export function castValue(type: ColumnType, raw: string): CastResult {
  const value = raw.trim();
  if (value === '') {
    return { ok: true, value: null };
  }

  switch (type) {
    case 'integer': {
      if (!INTEGER_PATTERN.test(value)) {
        return { ok: false, reason: `expected an integer, got ${JSON.stringify(raw)}` };
      }
      return { ok: true, value: parseInt(value, 10) };
    }
    case 'double precision': {
      const parsed = Number(value);
      if (!Number.isFinite(parsed)) {
        return { ok: false, reason: `expected a number, got ${JSON.stringify(raw)}` };
      }
      return { ok: true, value: parsed };
    }
    case 'boolean':
      return { ok: true, value: TRUE_VALUES.has(value.toLowerCase()) };
    case 'date': {
      if (!ISO_DATE_PATTERN.test(value) || toUtcDay(value) === null) {
        return { ok: false, reason: `expected a YYYY-MM-DD date, got ${JSON.stringify(raw)}` };
      }
      return { ok: true, value };
    }
    case 'text':
      return { ok: true, value: raw };
  }
}
