/**
 * @fileoverview Big-endian byte/integer conversion and 11-bit word index packing
 *
 * Checksummed entropy is handled as a single unsigned integer so that word
 * boundaries never have to be tracked across byte boundaries.
 */

import { MnemonicError, MnemonicErrorCode } from '@wordseed/core';

/** Number of bits encoded by one word */
export const BITS_PER_WORD = 11;

/** Number of distinct word indices (2^11) */
export const WORDLIST_SIZE = 2048;

const WORD_MASK = BigInt(WORDLIST_SIZE - 1);
const WORD_SHIFT = BigInt(BITS_PER_WORD);
const RADIX = BigInt(WORDLIST_SIZE);

/**
 * Read bytes as a big-endian unsigned integer
 */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

/**
 * Minimal big-endian representation of a non-negative integer.
 * Zero yields an empty buffer.
 */
export function bigIntToBytes(value: bigint): Buffer {
  if (value < 0n) {
    throw new MnemonicError(
      MnemonicErrorCode.InvalidArgument,
      'Cannot encode a negative integer as bytes'
    );
  }

  const bytes: number[] = [];
  let remaining = value;
  while (remaining > 0n) {
    bytes.unshift(Number(remaining & 0xffn));
    remaining >>= 8n;
  }
  return Buffer.from(bytes);
}

/**
 * Left-pad with zero bytes up to `length`. Longer input is returned unchanged.
 */
export function padBytes(bytes: Uint8Array, length: number): Buffer {
  if (bytes.length >= length) {
    return Buffer.from(bytes);
  }
  const padded = Buffer.alloc(length);
  padded.set(bytes, length - bytes.length);
  return padded;
}

/**
 * Split an integer into `count` 11-bit word indices, most significant first.
 *
 * The low 11 bits are taken repeatedly and written from the last slot
 * backwards, so the result is already in reading order.
 */
export function splitIntoIndices(value: bigint, count: number): number[] {
  const indices = new Array<number>(count);
  let remaining = value;

  for (let i = count - 1; i >= 0; i--) {
    indices[i] = Number(remaining & WORD_MASK);
    remaining >>= WORD_SHIFT;
  }

  return indices;
}

/**
 * Rebuild the integer encoded by a sequence of 11-bit word indices
 */
export function joinIndices(indices: readonly number[]): bigint {
  let value = 0n;

  for (const index of indices) {
    if (!Number.isInteger(index) || index < 0 || index >= WORDLIST_SIZE) {
      throw new MnemonicError(
        MnemonicErrorCode.InvalidArgument,
        `Word index ${index} is outside [0, ${WORDLIST_SIZE - 1}]`
      );
    }
    value = value * RADIX + BigInt(index);
  }

  return value;
}
