/**
 * Capital Projects ETL Framework
 *
 * Reusable pieces for staging raw project tables: database access,
 * configuration, the normalization transform and stage table operations.
 */

export * from './core/index.js';
export * from './normalization/index.js';
export * from './staging/index.js';
export * from './utils/index.js';
