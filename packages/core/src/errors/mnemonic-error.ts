/**
 * @fileoverview Mnemonic error class with structured error information
 *
 * Every failure raised by the wordseed packages is a MnemonicError carrying
 * a numeric code, its category, and optional context for reporting.
 */

import { MnemonicErrorCode, ErrorCategory, getErrorCategory } from './codes.js';

/**
 * Structured context information for debugging and reporting
 */
export interface ErrorContext {
  /** Operation being performed when error occurred */
  operation?: string;
  /** Wordlist language in use */
  language?: string;
  /** Component or module where error originated */
  component?: string;
  /** Additional contextual data */
  metadata?: Record<string, unknown>;
  /** Allow additional properties for extensibility */
  [key: string]: unknown;
}

export interface MnemonicErrorOptions {
  cause?: unknown;
  context?: ErrorContext;
}

const MESSAGES: Record<MnemonicErrorCode, string> = {
  [MnemonicErrorCode.InvalidEntropyLength]: 'Invalid entropy length',
  [MnemonicErrorCode.InvalidMnemonicLength]: 'Invalid mnemonic length',
  [MnemonicErrorCode.UnknownWord]: 'Word not found in wordlist',
  [MnemonicErrorCode.ChecksumMismatch]: 'Mnemonic checksum mismatch',
  [MnemonicErrorCode.InvalidHex]: 'Invalid hexadecimal format',
  [MnemonicErrorCode.RandomSourceFailure]: 'Secure random source failed',
  [MnemonicErrorCode.InvalidWordlist]: 'Invalid wordlist',
  [MnemonicErrorCode.UnsupportedLanguage]: 'Unsupported wordlist language',
  [MnemonicErrorCode.InvalidConfig]: 'Invalid configuration',
  [MnemonicErrorCode.InvalidArgument]: 'Invalid argument',
};

const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passphrase/i,
  /secret/i,
  /seed/i,
  /mnemonic/i,
  /entropy/i,
  /private/i,
];

/**
 * Structured error for all mnemonic operations
 *
 * Extends the standard Error class with a stable code and category so callers
 * can branch on the failure kind without parsing messages.
 */
export class MnemonicError extends Error {
  public readonly name = 'MnemonicError';
  public readonly code: MnemonicErrorCode;
  public readonly category: ErrorCategory;
  public readonly details: string;
  public readonly context?: ErrorContext;

  constructor(code: MnemonicErrorCode, details: string, options: MnemonicErrorOptions = {}) {
    super(MnemonicError.formatMessage(code, details));

    this.code = code;
    this.category = getErrorCategory(code);
    this.details = details;
    this.context = options.context;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    // Maintain prototype chain
    Object.setPrototypeOf(this, MnemonicError.prototype);
  }

  private static formatMessage(code: MnemonicErrorCode, details: string): string {
    const baseMessage = MnemonicError.getMessageForCode(code);
    return details ? `${baseMessage}: ${details}` : baseMessage;
  }

  /**
   * Get human-readable message for error code
   */
  static getMessageForCode(code: MnemonicErrorCode): string {
    return MESSAGES[code] ?? 'Unknown error';
  }

  /**
   * Create a new error with additional context
   */
  withContext(context: Partial<ErrorContext>): MnemonicError {
    return new MnemonicError(this.code, this.details, {
      cause: this.cause,
      context: { ...this.context, ...context },
    });
  }

  /**
   * Serialize error to JSON for logging/reporting
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      details: this.details,
      context: this.getSanitizedContext(),
      cause: this.cause instanceof Error
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };
  }

  /**
   * Get sanitized context (removes secret-looking fields for logging)
   */
  getSanitizedContext(): ErrorContext | undefined {
    if (!this.context) return undefined;

    const { metadata, ...rest } = this.context;
    const sanitized: ErrorContext = {};

    for (const [key, value] of Object.entries(rest)) {
      if (!isSensitiveField(key)) {
        sanitized[key] = value;
      }
    }

    if (metadata) {
      const sanitizedMetadata: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(metadata)) {
        if (!isSensitiveField(key)) {
          sanitizedMetadata[key] = value;
        }
      }
      if (Object.keys(sanitizedMetadata).length > 0) {
        sanitized.metadata = sanitizedMetadata;
      }
    }

    return sanitized;
  }

  /**
   * Get a developer-friendly error description
   */
  getDescription(): string {
    let description = `[${this.code}] ${this.category}: ${this.message}`;

    if (this.context?.operation) {
      description += ` | Operation: ${this.context.operation}`;
    }

    return description;
  }
}

function isSensitiveField(fieldName: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some(pattern => pattern.test(fieldName));
}

/**
 * Helper function to create a MnemonicError with context
 */
export function createMnemonicError(
  code: MnemonicErrorCode,
  details: string,
  context?: ErrorContext
): MnemonicError {
  return new MnemonicError(code, details, { context });
}

/**
 * Helper function to wrap an existing error as a MnemonicError
 */
export function wrapError(
  cause: unknown,
  code: MnemonicErrorCode,
  details?: string,
  context?: ErrorContext
): MnemonicError {
  const fallback = cause instanceof Error ? cause.message : String(cause);
  return new MnemonicError(code, details ?? fallback, { cause, context });
}

/**
 * Type guard to check if an error is a MnemonicError
 */
export function isMnemonicError(error: unknown): error is MnemonicError {
  return error instanceof MnemonicError;
}

/**
 * Type guard narrowing to a MnemonicError with the given code
 */
export function hasErrorCode(error: unknown, code: MnemonicErrorCode): error is MnemonicError {
  return isMnemonicError(error) && error.code === code;
}
