/**
 * @fileoverview Mnemonic encoding, decoding and seed derivation
 *
 * Converts entropy to checksummed word sequences drawn from a 2048-word
 * table, verifies and decodes them, and derives 64-byte seeds.
 */

export { MnemonicCodec, newWordlistCodec, type MnemonicValidationResult } from './codec.js';
export { marshalEntropy, unmarshalEntropy } from './encoding.js';
export { deriveSeed, deriveSeedAsync, createSeedHash, SEED_ITERATIONS, SEED_LENGTH } from './seed.js';
export {
  generateEntropy,
  validateEntropyBitSize,
  wordCountForEntropyBits,
  entropyBitsForWordCount,
  type RandomSource
} from './entropy.js';
export { addChecksum, checksumOf, stripChecksum, type Checksum } from './checksum.js';
export {
  BITS_PER_WORD,
  WORDLIST_SIZE,
  bytesToBigInt,
  bigIntToBytes,
  padBytes,
  splitIntoIndices,
  joinIndices
} from './packing.js';
export { splitWords, normalizeMnemonic } from './words.js';
export { Wordlist, getWordlist, getAvailableLanguages, isLanguageAvailable } from './wordlist/index.js';

export { isEntropyBitSize } from '@wordseed/core';
export type { EntropyBitSize, MnemonicWordCount, MnemonicPhrase, ChecksummedEntropy, SeedBytes } from '@wordseed/core';
