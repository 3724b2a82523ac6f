/**
 * @fileoverview Seed derivation from a mnemonic and passphrase
 */

import { pbkdf2, pbkdf2Sync } from 'node:crypto';
import { promisify } from 'node:util';
import { createSeedBytes, type SeedBytes } from '@wordseed/core';
import { unmarshalEntropy } from './encoding.js';
import type { Wordlist } from './wordlist/index.js';

const pbkdf2Async = promisify(pbkdf2);

export const SEED_ITERATIONS = 2048;
export const SEED_LENGTH = 64;
export const SEED_SALT_PREFIX = 'mnemonic';

/**
 * PBKDF2-HMAC-SHA512 over an arbitrary string, without mnemonic validation
 */
export function createSeedHash(mnemonic: string, passphrase: string = ''): SeedBytes {
  return createSeedBytes(
    pbkdf2Sync(mnemonic, SEED_SALT_PREFIX + passphrase, SEED_ITERATIONS, SEED_LENGTH, 'sha512')
  );
}

/**
 * Derive the 64-byte seed for a mnemonic.
 *
 * The mnemonic is validated against the wordlist first. The password is the
 * mnemonic string exactly as given, not the decoded entropy.
 */
export function deriveSeed(mnemonic: string, passphrase: string, wordlist: Wordlist): SeedBytes {
  unmarshalEntropy(mnemonic, wordlist);
  return createSeedHash(mnemonic, passphrase);
}

/**
 * Same as deriveSeed, running the key derivation off the main thread
 */
export async function deriveSeedAsync(
  mnemonic: string,
  passphrase: string,
  wordlist: Wordlist
): Promise<SeedBytes> {
  unmarshalEntropy(mnemonic, wordlist);
  const seed = await pbkdf2Async(
    mnemonic,
    SEED_SALT_PREFIX + passphrase,
    SEED_ITERATIONS,
    SEED_LENGTH,
    'sha512'
  );
  return createSeedBytes(seed);
}
