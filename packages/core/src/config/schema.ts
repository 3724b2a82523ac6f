/**
 * @fileoverview Runtime validation schema for mnemonic configuration
 */

import { z } from 'zod';
import {
  AllEntropyBitSizes,
  AllLogLevels,
  LogLevel,
  isEntropyBitSize
} from '../types/enums.js';

const ENTROPY_BITS_MESSAGE = `Entropy bits must be one of ${AllEntropyBitSizes.join(', ')}`;

export const mnemonicConfigSchema = z.object({
  language: z.string({ errorMap: () => ({ message: 'Language must be a non-empty string' }) })
    .trim()
    .min(1, 'Language must be a non-empty string')
    .transform(language => language.toLowerCase()),

  entropyBits: z.number({ errorMap: () => ({ message: ENTROPY_BITS_MESSAGE }) })
    .refine(isEntropyBitSize, ENTROPY_BITS_MESSAGE),

  logLevel: z.nativeEnum(LogLevel, {
    errorMap: () => ({ message: `Log level must be one of ${AllLogLevels.join(', ')}` })
  })
});

export type MnemonicConfig = z.infer<typeof mnemonicConfigSchema>;

/**
 * Join the issue messages of a failed parse, naming each field by its label
 * when one is given
 */
export function formatConfigIssues(
  error: z.ZodError,
  labels: Partial<Record<keyof MnemonicConfig, string>> = {}
): string {
  return error.issues
    .map(issue => {
      const field = issue.path[0];
      const label = typeof field === 'string' && isConfigKey(field) ? labels[field] : undefined;
      return label ? `${label}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

function isConfigKey(key: string): key is keyof MnemonicConfig {
  return key in mnemonicConfigSchema.shape;
}
