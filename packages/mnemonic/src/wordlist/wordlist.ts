/**
 * @fileoverview Immutable bidirectional wordlist table
 */

import { MnemonicError, MnemonicErrorCode } from '@wordseed/core';
import { WORDLIST_SIZE } from '../packing.js';

/**
 * An ordered table of exactly 2048 unique words and its inverse mapping.
 *
 * Both directions are built once from the same frozen array in the
 * constructor and never change afterwards.
 */
export class Wordlist {
  readonly language: string;
  private readonly words: readonly string[];
  private readonly indices: ReadonlyMap<string, number>;

  constructor(words: readonly string[], language: string = 'custom') {
    if (words.length !== WORDLIST_SIZE) {
      throw new MnemonicError(
        MnemonicErrorCode.InvalidWordlist,
        `Wordlist must contain exactly ${WORDLIST_SIZE} words, got ${words.length}`,
        { context: { language } }
      );
    }

    const indices = new Map<string, number>();
    words.forEach((word, index) => {
      if (word.length === 0 || /\s/.test(word)) {
        throw new MnemonicError(
          MnemonicErrorCode.InvalidWordlist,
          `Word at index ${index} is empty or contains whitespace`,
          { context: { language } }
        );
      }
      if (indices.has(word)) {
        throw new MnemonicError(
          MnemonicErrorCode.InvalidWordlist,
          `Duplicate word "${word}" at index ${index}`,
          { context: { language } }
        );
      }
      indices.set(word, index);
    });

    this.language = language;
    this.words = Object.freeze([...words]);
    this.indices = indices;
  }

  get size(): number {
    return this.words.length;
  }

  /**
   * Word at a given index in [0, 2047]
   */
  wordAt(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.words.length) {
      throw new MnemonicError(
        MnemonicErrorCode.InvalidArgument,
        `Word index ${index} is outside [0, ${this.words.length - 1}]`,
        { context: { language: this.language } }
      );
    }
    return this.words[index];
  }

  /**
   * Index of a word, or undefined when the word is not in the table
   */
  indexOf(word: string): number | undefined {
    return this.indices.get(word);
  }

  has(word: string): boolean {
    return this.indices.has(word);
  }

  /**
   * Words starting with a prefix, in table order
   */
  suggest(prefix: string, limit: number = 10): string[] {
    if (prefix.length === 0 || limit <= 0) {
      return [];
    }
    const matches: string[] = [];
    for (const word of this.words) {
      if (word.startsWith(prefix)) {
        matches.push(word);
        if (matches.length === limit) break;
      }
    }
    return matches;
  }

  toArray(): string[] {
    return [...this.words];
  }
}
