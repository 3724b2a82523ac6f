/**
 * @fileoverview Constant enumerations shared across packages
 */

// Entropy sizes accepted by the codec, in bits
export const EntropyBitSize = {
  Bits128: 128,
  Bits160: 160,
  Bits192: 192,
  Bits224: 224,
  Bits256: 256
} as const;

export type EntropyBitSize = typeof EntropyBitSize[keyof typeof EntropyBitSize];

// Mnemonic word count for seed phrases
export const MnemonicWordCount = {
  Twelve: 12,
  Fifteen: 15,
  Eighteen: 18,
  TwentyOne: 21,
  TwentyFour: 24
} as const;

export type MnemonicWordCount = typeof MnemonicWordCount[keyof typeof MnemonicWordCount];

export enum LogLevel {
  Error = 'error',
  Warn = 'warn',
  Info = 'info',
  Debug = 'debug',
  Trace = 'trace'
}

export const AllEntropyBitSizes: readonly EntropyBitSize[] = Object.values(EntropyBitSize);
export const AllMnemonicWordCounts: readonly MnemonicWordCount[] = Object.values(MnemonicWordCount);
export const AllLogLevels: readonly LogLevel[] = Object.values(LogLevel);

export function isEntropyBitSize(value: number): value is EntropyBitSize {
  return AllEntropyBitSizes.some(size => size === value);
}

export function isMnemonicWordCount(value: number): value is MnemonicWordCount {
  return AllMnemonicWordCounts.some(count => count === value);
}

export function isLogLevel(value: string): value is LogLevel {
  return AllLogLevels.some(level => level === value);
}
