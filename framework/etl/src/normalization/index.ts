export * from './references.js';
export * from './transform.js';
export * from './types.js';
