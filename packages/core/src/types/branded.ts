/**
 * @fileoverview Branded types for the wordseed packages
 *
 * Implements type-safe branded types using unique symbols to prevent
 * mixing of logically different values that share the same primitive type.
 */

// Base brand infrastructure using unique symbols
declare const __brand: unique symbol;
export type Brand<T, B> = T & { readonly [__brand]: B };

// Utility type for creating branded types
export type Branded<T, B extends string> = Brand<T, B>;

/** Space-joined words produced by marshalling entropy */
export type MnemonicPhrase = Branded<string, 'MnemonicPhrase'>;

/** Entropy with its checksum bits appended at the low-order end */
export type ChecksummedEntropy = Branded<Buffer, 'ChecksummedEntropy'>;

/** 64-byte PBKDF2 output */
export type SeedBytes = Branded<Buffer, 'SeedBytes'>;

export function createMnemonicPhrase(words: readonly string[]): MnemonicPhrase {
  return words.join(' ') as MnemonicPhrase;
}

export function createChecksummedEntropy(bytes: Buffer): ChecksummedEntropy {
  return bytes as ChecksummedEntropy;
}

export function createSeedBytes(bytes: Buffer): SeedBytes {
  if (bytes.length !== 64) {
    throw new TypeError(`Seed must be 64 bytes, got ${bytes.length}`);
  }
  return bytes as SeedBytes;
}
