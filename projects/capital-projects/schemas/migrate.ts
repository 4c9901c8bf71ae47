import {
  qualifiedName,
  quoteIdent,
  type Queryable,
  type SchemaNames,
} from '../../../framework/etl/src/index.js';

/**
 * Create the raw, stage and reference schemas and the reference tables.
 * Safe to run repeatedly.
 */
export async function runMigrations(db: Queryable, schemas: SchemaNames): Promise<void> {
  for (const schema of [schemas.raw, schemas.stage, schemas.reference]) {
    await db.query(`CREATE SCHEMA IF NOT EXISTS ${quoteIdent(schema)}`);
  }

  await db.query(`
    CREATE TABLE IF NOT EXISTS ${qualifiedName(schemas.reference, 'countries')} (
      alpha3_code VARCHAR(3) PRIMARY KEY,
      name TEXT NOT NULL,
      subregion_name TEXT
    )
  `);
  await db.query(`
    CREATE TABLE IF NOT EXISTS ${qualifiedName(schemas.reference, 'exchange_rates')} (
      country_code VARCHAR(3) NOT NULL,
      year INTEGER NOT NULL,
      exchange_rate DOUBLE PRECISION NOT NULL,
      PRIMARY KEY (country_code, year)
    )
  `);
  await db.query(`
    CREATE TABLE IF NOT EXISTS ${qualifiedName(schemas.reference, 'gdp_deflators')} (
      country_code VARCHAR(3) NOT NULL,
      year INTEGER NOT NULL,
      deflation_factor DOUBLE PRECISION NOT NULL,
      PRIMARY KEY (country_code, year)
    )
  `);

  console.log(`[db] schemas ready: ${schemas.raw}, ${schemas.stage}, ${schemas.reference}`);
}
