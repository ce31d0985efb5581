export * from './recovery.schema.js';
export * from './health-sample.schema.js';
export * from './nutrition.schema.js';
