/**
 * @fileoverview Error handling for wordseed packages
 *
 * Structured error codes, categories and the MnemonicError class.
 */

export * from './codes.js';
export * from './mnemonic-error.js';
