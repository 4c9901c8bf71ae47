export * from './rawTable.js';
export * from './schemas.js';
export * from './stageTable.js';
export * from './tableReads.js';
