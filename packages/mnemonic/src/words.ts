/**
 * @fileoverview Splitting and normalizing mnemonic input
 */

/**
 * Split a mnemonic on any run of whitespace, ignoring leading and trailing space
 */
export function splitWords(mnemonic: string): string[] {
  return mnemonic.split(/\s+/).filter(word => word.length > 0);
}

/**
 * Lowercase the words and join them with single spaces.
 *
 * Seed derivation uses the mnemonic exactly as given, so callers who accept
 * user input should normalize it before deriving a seed.
 */
export function normalizeMnemonic(mnemonic: string): string {
  return splitWords(mnemonic)
    .map(word => word.toLowerCase())
    .join(' ');
}
