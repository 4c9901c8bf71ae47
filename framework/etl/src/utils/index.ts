export * from './columnTypes.js';
export * from './dates.js';
export * from './identifiers.js';
export * from './queryBuilder.js';
