export * from './branded.js';
export * from './enums.js';
