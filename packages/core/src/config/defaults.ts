/**
 * @fileoverview Default configuration values and environment overrides
 */

import { MnemonicError, MnemonicErrorCode } from '../errors/index.js';
import { LogLevel } from '../types/enums.js';
import { formatConfigIssues, mnemonicConfigSchema, type MnemonicConfig } from './schema.js';

/**
 * Default values for mnemonic configuration
 */
export const DEFAULT_CONFIG: Readonly<MnemonicConfig> = {
  language: 'english',
  entropyBits: 256,
  logLevel: LogLevel.Info,
};

/** Environment variables read by configFromEnv */
export const ENV_KEYS = {
  language: 'WORDSEED_LANGUAGE',
  entropyBits: 'WORDSEED_ENTROPY_BITS',
  logLevel: 'WORDSEED_LOG_LEVEL',
} as const;

function parseConfig(
  input: Record<string, unknown>,
  operation: string,
  labels?: Partial<Record<keyof MnemonicConfig, string>>
): MnemonicConfig {
  const result = mnemonicConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...input });

  if (!result.success) {
    throw new MnemonicError(
      MnemonicErrorCode.InvalidConfig,
      formatConfigIssues(result.error, labels),
      { cause: result.error, context: { operation } }
    );
  }

  return result.data;
}

/**
 * Merge user configuration with defaults
 */
export function mergeConfig(overrides: Partial<MnemonicConfig> = {}): MnemonicConfig {
  return parseConfig(overrides, 'mergeConfig');
}

/**
 * Build a configuration from WORDSEED_* environment variables.
 * Empty variables are treated as unset.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): MnemonicConfig {
  const overrides: Record<string, unknown> = {};

  const language = env[ENV_KEYS.language];
  if (language) {
    overrides.language = language;
  }

  const bits = env[ENV_KEYS.entropyBits];
  if (bits) {
    overrides.entropyBits = Number(bits);
  }

  const level = env[ENV_KEYS.logLevel];
  if (level) {
    overrides.logLevel = level.toLowerCase();
  }

  return parseConfig(overrides, 'configFromEnv', ENV_KEYS);
}
