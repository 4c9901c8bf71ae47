import { assertIdentifier } from '../utils/identifiers.js';

/** Where raw inputs, staged outputs and reference tables live */
export interface SchemaNames {
  raw: string;
  stage: string;
  reference: string;
}

export const DEFAULT_SCHEMAS: SchemaNames = {
  raw: 'raw',
  stage: 'stage',
  reference: 'reference',
};

export function resolveSchemas(schemas: Partial<SchemaNames> = {}): SchemaNames {
  const merged = { ...DEFAULT_SCHEMAS, ...schemas };
  return {
    raw: assertIdentifier(merged.raw),
    stage: assertIdentifier(merged.stage),
    reference: assertIdentifier(merged.reference),
  };
}
