import { randomBytes } from 'node:crypto';
import { describe, it, expect } from '@jest/globals';
import { MnemonicErrorCode } from '@wordseed/core';
import { MnemonicCodec, newWordlistCodec } from '../codec.js';
import type { RandomSource } from '../entropy.js';
import { getAvailableLanguages, getWordlist } from '../wordlist/index.js';
import {
  CASES,
  COUNTER_MNEMONIC,
  COUNTER_SEED_WITH_PASSPHRASE,
  TEST_PASSPHRASE,
  ZERO_MNEMONIC
} from './fixtures.js';

describe('MnemonicCodec', () => {
  const codec = MnemonicCodec.forLanguage('english');

  it('should share the cached english table', () => {
    expect(codec.wordlist).toBe(getWordlist('english'));
    expect(codec.language).toBe('english');
  });

  it.each(CASES)('should round-trip $name', ({ entropy, mnemonic }) => {
    const phrase = codec.marshalEntropy(Buffer.from(entropy, 'hex'));

    expect(phrase).toBe(mnemonic);
    expect(codec.entropyFromMnemonic(phrase).toString('hex')).toBe(entropy);
  });

  it('should keep the checksum in unmarshalEntropy output', () => {
    expect(codec.unmarshalEntropy(ZERO_MNEMONIC).toString('hex')).toBe(CASES[0].checksummed);
  });

  it('should derive seeds with an optional passphrase', async () => {
    expect(codec.deriveSeed(COUNTER_MNEMONIC, TEST_PASSPHRASE).toString('hex')).toBe(
      COUNTER_SEED_WITH_PASSPHRASE
    );
    expect(codec.deriveSeed(COUNTER_MNEMONIC).equals(codec.deriveSeed(COUNTER_MNEMONIC, ''))).toBe(
      true
    );
    expect((await codec.deriveSeedAsync(COUNTER_MNEMONIC, TEST_PASSPHRASE)).toString('hex')).toBe(
      COUNTER_SEED_WITH_PASSPHRASE
    );
  });

  describe('generateMnemonic', () => {
    it('should encode entropy from the random source', () => {
      const source: RandomSource = size => Buffer.alloc(size, 0xa5);
      expect(codec.generateMnemonic(160, source)).toBe(CASES[3].mnemonic);
    });

    it('should default to 24 words', () => {
      const phrase = codec.generateMnemonic();

      expect(phrase.split(' ')).toHaveLength(24);
      expect(codec.isValid(phrase)).toBe(true);
    });

    it('should zero the entropy buffer once encoded', () => {
      const issued: Buffer[] = [];
      const source: RandomSource = size => {
        const bytes = Buffer.alloc(size, 0xff);
        issued.push(bytes);
        return bytes;
      };

      expect(codec.generateMnemonic(128, source)).toBe(CASES[1].mnemonic);
      expect(issued).toHaveLength(1);
      expect(issued[0].every(byte => byte === 0)).toBe(true);
    });

    it('should reject unsupported sizes', () => {
      expect(() => codec.generateMnemonic(512)).toThrow(
        expect.objectContaining({ code: MnemonicErrorCode.InvalidEntropyLength })
      );
    });
  });

  describe('validate', () => {
    it('should accept a valid mnemonic', () => {
      expect(codec.validate(COUNTER_MNEMONIC)).toEqual({ isValid: true, errors: [] });
      expect(codec.isValid(COUNTER_MNEMONIC)).toBe(true);
    });

    it('should report the failure without throwing', () => {
      const allAbandon = Array.from({ length: 12 }, () => 'abandon').join(' ');

      expect(codec.validate(allAbandon)).toEqual({
        isValid: false,
        errors: ['Mnemonic checksum mismatch: The words do not form a valid mnemonic'],
        code: MnemonicErrorCode.ChecksumMismatch,
      });
      expect(codec.validate('').code).toBe(MnemonicErrorCode.InvalidMnemonicLength);
      expect(codec.isValid(`${COUNTER_MNEMONIC} extra`)).toBe(false);
    });
  });
});

describe('bundled languages', () => {
  it.each(getAvailableLanguages())('should encode zero entropy with the %s table', language => {
    const codec = MnemonicCodec.forLanguage(language);
    const table = codec.wordlist;
    const expected = [...Array.from({ length: 11 }, () => table.wordAt(0)), table.wordAt(3)];

    const phrase = codec.marshalEntropy(Buffer.alloc(16));

    expect(phrase.split(' ')).toEqual(expected);
    expect(codec.entropyFromMnemonic(phrase).toString('hex')).toBe('00'.repeat(16));
  });

  it.each(getAvailableLanguages())('should round-trip random entropy with the %s table', language => {
    const codec = MnemonicCodec.forLanguage(language);
    const entropy = randomBytes(32);

    expect(codec.entropyFromMnemonic(codec.marshalEntropy(entropy)).toString('hex')).toBe(
      entropy.toString('hex')
    );
  });

  it('should not accept English words under another language', () => {
    expect(MnemonicCodec.forLanguage('spanish').validate(ZERO_MNEMONIC)).toMatchObject({
      isValid: false,
      code: MnemonicErrorCode.UnknownWord,
    });
  });
});

describe('newWordlistCodec', () => {
  const reversed = getWordlist('english').toArray().reverse();
  const codec = newWordlistCodec(reversed, 'reversed');

  it('should encode against the supplied table', () => {
    expect(codec.language).toBe('reversed');
    expect(codec.marshalEntropy(Buffer.alloc(16))).toBe(
      'zoo zoo zoo zoo zoo zoo zoo zoo zoo zoo zoo zebra'
    );
    expect(codec.marshalEntropy(Buffer.from(CASES[2].entropy, 'hex'))).toBe(
      'zoo wave left wave question wise thank team visual panel round they'
    );
  });

  it('should not accept phrases from another table', () => {
    expect(codec.isValid(ZERO_MNEMONIC)).toBe(false);
    expect(codec.entropyFromMnemonic('zoo zoo zoo zoo zoo zoo zoo zoo zoo zoo zoo zebra')).toEqual(
      Buffer.alloc(16)
    );
  });

  it('should default the language name to custom', () => {
    expect(newWordlistCodec(reversed).language).toBe('custom');
  });
});
