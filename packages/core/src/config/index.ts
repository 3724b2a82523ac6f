export * from './defaults.js';
export * from './schema.js';
