/**
 * @fileoverview Error codes for the wordseed packages
 *
 * Error codes are organized by category using numeric ranges:
 * - 1000-1099: Validation errors (entropy, mnemonic and input format)
 * - 2000-2099: Crypto errors
 * - 3000-3099: Wordlist errors
 * - 4000-4099: Configuration errors
 * - 9000-9099: General errors
 */

/**
 * Error codes for all mnemonic operations
 * Using regular enum for compatibility with isolatedModules
 */
export enum MnemonicErrorCode {
  // Validation errors (1000-1099)
  InvalidEntropyLength = 1000,
  InvalidMnemonicLength = 1001,
  UnknownWord = 1002,
  ChecksumMismatch = 1003,
  InvalidHex = 1004,

  // Crypto errors (2000-2099)
  RandomSourceFailure = 2000,

  // Wordlist errors (3000-3099)
  InvalidWordlist = 3000,
  UnsupportedLanguage = 3001,

  // Configuration errors (4000-4099)
  InvalidConfig = 4000,

  // General errors (9000-9099)
  InvalidArgument = 9000,
}

/**
 * Error categories for grouping related errors
 */
export enum ErrorCategory {
  Validation = 'validation',
  Crypto = 'crypto',
  Wordlist = 'wordlist',
  Configuration = 'configuration',
  General = 'general',
}

/**
 * Mapping of error codes to categories
 */
export const ERROR_CATEGORIES: Record<MnemonicErrorCode, ErrorCategory> = {
  [MnemonicErrorCode.InvalidEntropyLength]: ErrorCategory.Validation,
  [MnemonicErrorCode.InvalidMnemonicLength]: ErrorCategory.Validation,
  [MnemonicErrorCode.UnknownWord]: ErrorCategory.Validation,
  [MnemonicErrorCode.ChecksumMismatch]: ErrorCategory.Validation,
  [MnemonicErrorCode.InvalidHex]: ErrorCategory.Validation,

  [MnemonicErrorCode.RandomSourceFailure]: ErrorCategory.Crypto,

  [MnemonicErrorCode.InvalidWordlist]: ErrorCategory.Wordlist,
  [MnemonicErrorCode.UnsupportedLanguage]: ErrorCategory.Wordlist,

  [MnemonicErrorCode.InvalidConfig]: ErrorCategory.Configuration,

  [MnemonicErrorCode.InvalidArgument]: ErrorCategory.General,
};

/**
 * Get the category for an error code
 */
export function getErrorCategory(code: MnemonicErrorCode): ErrorCategory {
  return ERROR_CATEGORIES[code] ?? ErrorCategory.General;
}

/**
 * Check if an error code belongs to a specific category
 */
export function isErrorInCategory(code: MnemonicErrorCode, category: ErrorCategory): boolean {
  return getErrorCategory(code) === category;
}

/**
 * Get all error codes in a specific category
 */
export function getErrorCodesInCategory(category: ErrorCategory): MnemonicErrorCode[] {
  return Object.values(MnemonicErrorCode)
    .filter((code): code is MnemonicErrorCode => typeof code === 'number')
    .filter(code => ERROR_CATEGORIES[code] === category);
}
