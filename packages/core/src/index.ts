/**
 * @fileoverview Shared building blocks for the wordseed packages
 *
 * - Structured error codes and the MnemonicError class
 * - Branded types and constant enumerations
 * - The level-filtered logger
 * - Configuration defaults and environment overrides
 */

export * from './errors/index.js';
export * from './types/index.js';
export * from './logging/index.js';
export * from './config/index.js';
