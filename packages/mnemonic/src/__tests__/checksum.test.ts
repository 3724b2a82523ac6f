import { describe, it, expect } from '@jest/globals';
import { MnemonicErrorCode, isMnemonicError } from '@wordseed/core';
import { addChecksum, checksumOf, stripChecksum } from '../checksum.js';
import { CASES, captureError } from './fixtures.js';

describe('checksumOf', () => {
  it('should take entropy bits / 32 leading bits of the hash', () => {
    expect(checksumOf(Buffer.alloc(16))).toEqual({ value: 3, bits: 4 });
    expect(checksumOf(Buffer.alloc(20, 0xa5))).toEqual({ value: 4, bits: 5 });
    expect(checksumOf(Buffer.from(CASES[5].entropy, 'hex'))).toEqual({ value: 83, bits: 7 });
    expect(checksumOf(Buffer.from(CASES[6].entropy, 'hex'))).toEqual({ value: 99, bits: 8 });
  });

  it.each([0, 12, 15, 33, 36])('should reject %i bytes of entropy', bytes => {
    const error = captureError(() => checksumOf(Buffer.alloc(bytes)));

    expect(isMnemonicError(error) && error.code).toBe(MnemonicErrorCode.InvalidEntropyLength);
    expect(isMnemonicError(error) && error.details).toBe(
      `Entropy must be 128, 160, 192, 224 or 256 bits, got ${bytes * 8}`
    );
  });
});

describe('addChecksum', () => {
  it('should append checksum bits at the low-order end', () => {
    expect(addChecksum(Buffer.alloc(16, 0xff)).toString('hex')).toBe(
      '0ffffffffffffffffffffffffffffffff5'
    );
  });

  it('should reject entropy sizes without a defined checksum width', () => {
    expect(() => addChecksum(Buffer.alloc(36))).toThrow(
      expect.objectContaining({ code: MnemonicErrorCode.InvalidEntropyLength })
    );
  });

  it('should not preserve leading zero bytes', () => {
    expect(addChecksum(Buffer.alloc(16)).toString('hex')).toBe('03');
    expect(addChecksum(Buffer.from(CASES[2].entropy, 'hex')).toString('hex')).toBe(
      '102030405060708090a0b0c0d0e0fb'
    );
  });
});

describe('stripChecksum', () => {
  it.each(CASES)('should recover the entropy for $name', ({ entropy, checksummed }) => {
    expect(stripChecksum(Buffer.from(checksummed, 'hex')).toString('hex')).toBe(entropy);
  });

  it('should reject lengths that are not entropy plus one byte', () => {
    const error = captureError(() => stripChecksum(Buffer.alloc(16)));

    expect(isMnemonicError(error) && error.code).toBe(MnemonicErrorCode.InvalidArgument);
    expect(isMnemonicError(error) && error.details).toBe(
      'Checksummed entropy must be 17, 21, 25, 29 or 33 bytes, got 16'
    );
  });

  it('should reject bits set above the checksum width', () => {
    const tooWide = Buffer.alloc(17);
    tooWide[0] = 0x10;

    expect(() => stripChecksum(tooWide)).toThrow(
      'Checksummed entropy has bits set above the entropy and checksum width'
    );

    tooWide[0] = 0x0f;
    expect(stripChecksum(tooWide).toString('hex')).toBe('f0000000000000000000000000000000');
  });
});
