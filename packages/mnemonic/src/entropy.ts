/**
 * @fileoverview Entropy size rules and secure entropy generation
 */

import { randomBytes } from 'node:crypto';
import {
  MnemonicError,
  MnemonicErrorCode,
  createLogger,
  isEntropyBitSize,
  wrapError,
  type EntropyBitSize,
  type MnemonicWordCount
} from '@wordseed/core';

const log = createLogger('entropy');

/** Capability that produces `size` cryptographically random bytes */
export type RandomSource = (size: number) => Uint8Array;

const WORD_COUNTS: Record<EntropyBitSize, MnemonicWordCount> = {
  128: 12,
  160: 15,
  192: 18,
  224: 21,
  256: 24,
};

const ENTROPY_BITS: Record<MnemonicWordCount, EntropyBitSize> = {
  12: 128,
  15: 160,
  18: 192,
  21: 224,
  24: 256,
};

/**
 * Ensure a bit length is a multiple of 32 within [128, 256]
 */
export function validateEntropyBitSize(bitSize: number): asserts bitSize is EntropyBitSize {
  if (!isEntropyBitSize(bitSize)) {
    throw new MnemonicError(
      MnemonicErrorCode.InvalidEntropyLength,
      `Entropy must be 128, 160, 192, 224 or 256 bits, got ${bitSize}`,
      { context: { operation: 'validateEntropyBitSize' } }
    );
  }
}

/**
 * Number of words produced for entropy of the given size
 */
export function wordCountForEntropyBits(bitSize: EntropyBitSize): MnemonicWordCount {
  return WORD_COUNTS[bitSize];
}

/**
 * Entropy size encoded by a mnemonic of the given length
 */
export function entropyBitsForWordCount(wordCount: MnemonicWordCount): EntropyBitSize {
  return ENTROPY_BITS[wordCount];
}

/**
 * Generate `bitSize / 8` bytes of entropy from a secure random source
 */
export function generateEntropy(bitSize: number, source: RandomSource = randomBytes): Buffer {
  validateEntropyBitSize(bitSize);
  const size = bitSize / 8;

  let bytes: Uint8Array;
  try {
    bytes = source(size);
  } catch (error: unknown) {
    throw wrapError(
      error,
      MnemonicErrorCode.RandomSourceFailure,
      `Failed to read ${size} random bytes`,
      { operation: 'generateEntropy' }
    );
  }

  if (bytes.length !== size) {
    throw new MnemonicError(
      MnemonicErrorCode.RandomSourceFailure,
      `Random source returned ${bytes.length} bytes, expected ${size}`,
      { context: { operation: 'generateEntropy' } }
    );
  }

  log.debug(`Generated ${bitSize}-bit entropy`);
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes);
}
