/**
 * @fileoverview Built-in wordlists by language
 *
 * English ships with the package. The other languages are the published
 * BIP-39 tables from @scure/bip39. Tables are constructed on first use and
 * cached for the life of the process; a cached table is never rebuilt or
 * mutated.
 */

import { wordlist as italian } from '@scure/bip39/wordlists/italian';
import { wordlist as japanese } from '@scure/bip39/wordlists/japanese';
import { wordlist as korean } from '@scure/bip39/wordlists/korean';
import { wordlist as chineseSimplified } from '@scure/bip39/wordlists/simplified-chinese';
import { wordlist as spanish } from '@scure/bip39/wordlists/spanish';
import { wordlist as chineseTraditional } from '@scure/bip39/wordlists/traditional-chinese';
import { MnemonicError, MnemonicErrorCode, createLogger } from '@wordseed/core';
import english from './english.json';
import { Wordlist } from './wordlist.js';

const log = createLogger('wordlist');

const SOURCES: Readonly<Record<string, readonly string[]>> = {
  'chinese-simplified': chineseSimplified,
  'chinese-traditional': chineseTraditional,
  english,
  italian,
  japanese,
  korean,
  spanish,
};

const tables = new Map<string, Wordlist>();

/**
 * Languages with a bundled wordlist
 */
export function getAvailableLanguages(): string[] {
  return Object.keys(SOURCES);
}

export function isLanguageAvailable(language: string): boolean {
  return Object.prototype.hasOwnProperty.call(SOURCES, language.toLowerCase());
}

/**
 * Get the table for a bundled language, building it on first use
 */
export function getWordlist(language: string): Wordlist {
  const key = language.toLowerCase();

  const cached = tables.get(key);
  if (cached) {
    return cached;
  }

  if (!isLanguageAvailable(key)) {
    throw new MnemonicError(
      MnemonicErrorCode.UnsupportedLanguage,
      `No wordlist for "${language}". Available: ${getAvailableLanguages().join(', ')}`,
      { context: { language } }
    );
  }

  const wordlist = new Wordlist(SOURCES[key], key);
  tables.set(key, wordlist);
  log.debug(`Built ${key} wordlist table`);

  return wordlist;
}
