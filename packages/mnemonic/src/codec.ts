/**
 * @fileoverview Mnemonic codec bound to one wordlist
 *
 * Callers create or look up a codec explicitly; there is no process-wide
 * default instance.
 */

import {
  DEFAULT_CONFIG,
  MnemonicErrorCode,
  isMnemonicError,
  type ChecksummedEntropy,
  type MnemonicPhrase,
  type SeedBytes
} from '@wordseed/core';
import { stripChecksum } from './checksum.js';
import { marshalEntropy, unmarshalEntropy } from './encoding.js';
import { generateEntropy, type RandomSource } from './entropy.js';
import { deriveSeed, deriveSeedAsync } from './seed.js';
import { Wordlist, getWordlist } from './wordlist/index.js';

/**
 * Outcome of a non-throwing mnemonic check
 */
export interface MnemonicValidationResult {
  isValid: boolean;
  errors: string[];
  /** Code of the first failure, when invalid */
  code?: MnemonicErrorCode;
}

export class MnemonicCodec {
  constructor(readonly wordlist: Wordlist) {}

  /**
   * Codec over one of the bundled wordlists
   */
  static forLanguage(language: string): MnemonicCodec {
    return new MnemonicCodec(getWordlist(language));
  }

  get language(): string {
    return this.wordlist.language;
  }

  marshalEntropy(entropy: Uint8Array): MnemonicPhrase {
    return marshalEntropy(entropy, this.wordlist);
  }

  /**
   * Decode and verify a mnemonic, returning entropy with its checksum bits
   */
  unmarshalEntropy(mnemonic: string): ChecksummedEntropy {
    return unmarshalEntropy(mnemonic, this.wordlist);
  }

  /**
   * Decode and verify a mnemonic, returning the bare entropy
   */
  entropyFromMnemonic(mnemonic: string): Buffer {
    return stripChecksum(this.unmarshalEntropy(mnemonic));
  }

  deriveSeed(mnemonic: string, passphrase: string = ''): SeedBytes {
    return deriveSeed(mnemonic, passphrase, this.wordlist);
  }

  deriveSeedAsync(mnemonic: string, passphrase: string = ''): Promise<SeedBytes> {
    return deriveSeedAsync(mnemonic, passphrase, this.wordlist);
  }

  /**
   * Generate fresh entropy and encode it. The entropy buffer is zeroed
   * once the phrase has been built.
   */
  generateMnemonic(
    bitSize: number = DEFAULT_CONFIG.entropyBits,
    source?: RandomSource
  ): MnemonicPhrase {
    const entropy = generateEntropy(bitSize, source);
    try {
      return this.marshalEntropy(entropy);
    } finally {
      entropy.fill(0);
    }
  }

  /**
   * Check a mnemonic without throwing on validation failures
   */
  validate(mnemonic: string): MnemonicValidationResult {
    try {
      this.unmarshalEntropy(mnemonic);
      return { isValid: true, errors: [] };
    } catch (error: unknown) {
      if (isMnemonicError(error)) {
        return { isValid: false, errors: [error.message], code: error.code };
      }
      throw error;
    }
  }

  isValid(mnemonic: string): boolean {
    return this.validate(mnemonic).isValid;
  }
}

/**
 * Build a codec over a caller-supplied table of 2048 unique words
 */
export function newWordlistCodec(words: readonly string[], language?: string): MnemonicCodec {
  return new MnemonicCodec(new Wordlist(words, language));
}
