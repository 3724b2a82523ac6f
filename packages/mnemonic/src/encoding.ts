/**
 * @fileoverview Marshalling entropy to mnemonics and back
 */

import { timingSafeEqual } from 'node:crypto';
import {
  MnemonicError,
  MnemonicErrorCode,
  createChecksummedEntropy,
  createMnemonicPhrase,
  type ChecksummedEntropy,
  type MnemonicPhrase
} from '@wordseed/core';
import { addChecksum } from './checksum.js';
import { validateEntropyBitSize } from './entropy.js';
import {
  BITS_PER_WORD,
  bigIntToBytes,
  bytesToBigInt,
  joinIndices,
  padBytes,
  splitIntoIndices
} from './packing.js';
import { splitWords } from './words.js';
import type { Wordlist } from './wordlist/index.js';

/**
 * Encode entropy as a mnemonic phrase
 */
export function marshalEntropy(entropy: Uint8Array, wordlist: Wordlist): MnemonicPhrase {
  const entropyBitLength = entropy.length * 8;
  validateEntropyBitSize(entropyBitLength);

  const checksumBitLength = entropyBitLength / 32;
  const sentenceLength = (entropyBitLength + checksumBitLength) / BITS_PER_WORD;

  const checksummed = bytesToBigInt(addChecksum(entropy));
  const indices = splitIntoIndices(checksummed, sentenceLength);

  return createMnemonicPhrase(indices.map(index => wordlist.wordAt(index)));
}

/**
 * Decode a mnemonic phrase and verify its checksum.
 *
 * The result is the checksummed entropy (entropy followed by its checksum
 * bits), not the bare entropy. Use stripChecksum to drop the checksum.
 */
export function unmarshalEntropy(mnemonic: string, wordlist: Wordlist): ChecksummedEntropy {
  const words = splitWords(mnemonic);
  const wordCount = words.length;

  if (wordCount % 3 !== 0 || wordCount < 12 || wordCount > 24) {
    throw new MnemonicError(
      MnemonicErrorCode.InvalidMnemonicLength,
      `Expected 12, 15, 18, 21 or 24 words, got ${wordCount}`,
      { context: { operation: 'unmarshalEntropy', language: wordlist.language } }
    );
  }

  const bitSize = wordCount * BITS_PER_WORD;
  const checksumBitSize = bitSize % 32;
  const fullByteSize = (bitSize - checksumBitSize) / 8 + 1;
  const checksumByteSize = fullByteSize - (fullByteSize % 4);

  const indices = words.map((word, position) => {
    const index = wordlist.indexOf(word);
    if (index === undefined) {
      throw new MnemonicError(
        MnemonicErrorCode.UnknownWord,
        `"${word}" at position ${position + 1}`,
        {
          context: {
            operation: 'unmarshalEntropy',
            language: wordlist.language,
            word,
            position: position + 1,
          },
        }
      );
    }
    return index;
  });

  const checksummedEntropy = joinIndices(indices);
  const rawEntropy = checksummedEntropy >> BigInt(checksumBitSize);

  const rawEntropyBytes = padBytes(bigIntToBytes(rawEntropy), checksumByteSize);
  const checksummedEntropyBytes = padBytes(bigIntToBytes(checksummedEntropy), fullByteSize);
  const expectedBytes = padBytes(addChecksum(rawEntropyBytes), fullByteSize);

  if (
    checksummedEntropyBytes.length !== expectedBytes.length ||
    !timingSafeEqual(checksummedEntropyBytes, expectedBytes)
  ) {
    throw new MnemonicError(
      MnemonicErrorCode.ChecksumMismatch,
      'The words do not form a valid mnemonic',
      { context: { operation: 'unmarshalEntropy', language: wordlist.language } }
    );
  }

  return createChecksummedEntropy(checksummedEntropyBytes);
}
