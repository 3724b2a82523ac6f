/**
 * @fileoverview SHA-256 derived checksum bits appended to entropy
 */

import { createHash } from 'node:crypto';
import { MnemonicError, MnemonicErrorCode } from '@wordseed/core';
import { validateEntropyBitSize } from './entropy.js';
import { bigIntToBytes, bytesToBigInt, padBytes } from './packing.js';

export interface Checksum {
  /** Checksum bits as an unsigned integer */
  value: number;
  /** Number of checksum bits (entropy bits / 32) */
  bits: number;
}

/**
 * Compute the checksum of entropy: the first `entropyBits / 32` bits of
 * sha256(entropy). Entropy must be 16, 20, 24, 28 or 32 bytes.
 */
export function checksumOf(entropy: Uint8Array): Checksum {
  validateEntropyBitSize(entropy.length * 8);
  const firstHashByte = createHash('sha256').update(entropy).digest()[0];
  const bits = Math.floor(entropy.length / 4);

  return {
    value: firstHashByte >> (8 - bits),
    bits,
  };
}

/**
 * Append the checksum to entropy at the low-order end.
 *
 * Returns the minimal big-endian bytes of the combined integer, so leading
 * zero bytes are not preserved; callers pad to the width they need.
 */
export function addChecksum(entropy: Uint8Array): Buffer {
  validateEntropyBitSize(entropy.length * 8);
  const firstHashByte = createHash('sha256').update(entropy).digest()[0];
  const checksumBitLength = Math.floor(entropy.length / 4);

  // Shift left one bit at a time, setting the new low bit from the
  // checksum byte, most significant bit first
  let value = bytesToBigInt(entropy);
  for (let i = 0; i < checksumBitLength; i++) {
    value <<= 1n;
    if ((firstHashByte & (1 << (7 - i))) !== 0) {
      value |= 1n;
    }
  }

  return bigIntToBytes(value);
}

/**
 * Remove the checksum bits from checksummed entropy as returned by
 * unmarshalEntropy, recovering the original entropy bytes.
 *
 * Checksummed entropy is always one byte longer than its entropy, which
 * fixes both the entropy size and the checksum width.
 */
export function stripChecksum(checksummed: Uint8Array): Buffer {
  const entropyBytes = checksummed.length - 1;

  if (entropyBytes < 16 || entropyBytes > 32 || entropyBytes % 4 !== 0) {
    throw new MnemonicError(
      MnemonicErrorCode.InvalidArgument,
      `Checksummed entropy must be 17, 21, 25, 29 or 33 bytes, got ${checksummed.length}`,
      { context: { operation: 'stripChecksum' } }
    );
  }

  const checksumBits = BigInt(entropyBytes / 4);
  const value = bytesToBigInt(checksummed);

  if (value >> (BigInt(entropyBytes * 8) + checksumBits) !== 0n) {
    throw new MnemonicError(
      MnemonicErrorCode.InvalidArgument,
      'Checksummed entropy has bits set above the entropy and checksum width',
      { context: { operation: 'stripChecksum' } }
    );
  }

  return padBytes(bigIntToBytes(value >> checksumBits), entropyBytes);
}
