/**
 * Command line interface for encoding, decoding and checking mnemonics
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import {
  Logger,
  LogLevel,
  MnemonicError,
  MnemonicErrorCode,
  configFromEnv,
  configureLogger,
  isMnemonicError,
  type LogSink
} from '@wordseed/core';
import { MnemonicCodec, generateEntropy, stripChecksum, type RandomSource } from '@wordseed/mnemonic';

const VERSION = '0.1.0';

/** Streams and environment the CLI runs against */
export interface CliIO {
  stdout: LogSink;
  stderr: LogSink;
  env?: NodeJS.ProcessEnv;
  /** Random source for generated entropy; defaults to node:crypto */
  random?: RandomSource;
}

type GlobalOptions = {
  language?: string;
};

function parseBits(value: string): number {
  const bits = Number(value);
  if (!Number.isInteger(bits)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return bits;
}

/**
 * Parse hex into bytes, rejecting odd lengths and non-hex characters
 */
export function parseHex(value: string): Buffer {
  const hex = value.startsWith('0x') ? value.slice(2) : value;
  if (hex.length === 0 || hex.length % 2 !== 0 || !/^[0-9a-fA-F]+$/.test(hex)) {
    throw new MnemonicError(
      MnemonicErrorCode.InvalidHex,
      `"${value}" is not an even-length hexadecimal string`,
      { context: { operation: 'parseHex' } }
    );
  }
  return Buffer.from(hex, 'hex');
}

/**
 * Run the CLI with user arguments (without the node and script paths).
 * Resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const logger = new Logger(
    { output: io.stderr, colors: false, timestamps: false, level: LogLevel.Info },
    'wordseed'
  );

  const print = (line: string): void => {
    io.stdout.write(line + '\n');
  };

  let exitCode = 0;

  try {
    const config = configFromEnv(io.env ?? process.env);
    logger.setLevel(config.logLevel);
    configureLogger({ level: config.logLevel });

    const program = new Command();

    program
      .name('wordseed')
      .description('Encode entropy as mnemonic phrases and derive seeds')
      .version(VERSION)
      .option('-l, --language <language>', 'Wordlist language', config.language)
      .exitOverride()
      .configureOutput({
        writeOut: str => io.stdout.write(str),
        writeErr: str => io.stderr.write(str)
      });

    const codec = (): MnemonicCodec =>
      MnemonicCodec.forLanguage(program.opts<GlobalOptions>().language ?? config.language);

    program
      .command('entropy')
      .description('Print fresh random entropy as hex')
      .option('-b, --bits <bits>', 'Entropy size in bits', parseBits, config.entropyBits)
      .action((options: { bits: number }) => {
        print(generateEntropy(options.bits, io.random).toString('hex'));
      });

    program
      .command('generate')
      .description('Generate a new mnemonic')
      .option('-b, --bits <bits>', 'Entropy size in bits', parseBits, config.entropyBits)
      .action((options: { bits: number }) => {
        print(codec().generateMnemonic(options.bits, io.random));
      });

    program
      .command('encode')
      .description('Encode hex entropy as a mnemonic')
      .argument('<hex>', 'Entropy as hex (16, 20, 24, 28 or 32 bytes)')
      .action((hex: string) => {
        print(codec().marshalEntropy(parseHex(hex)));
      });

    program
      .command('decode')
      .description('Decode a mnemonic to hex, verifying its checksum')
      .argument('<words...>', 'Mnemonic words')
      .option('-s, --strip', 'Drop the checksum bits and print the bare entropy')
      .action((words: string[], options: { strip?: boolean }) => {
        const checksummed = codec().unmarshalEntropy(words.join(' '));
        const bytes = options.strip ? stripChecksum(checksummed) : checksummed;
        print(bytes.toString('hex'));
      });

    program
      .command('seed')
      .description('Derive the 64-byte seed of a mnemonic')
      .argument('<words...>', 'Mnemonic words')
      .option('-p, --passphrase <passphrase>', 'Optional passphrase', '')
      .action(async (words: string[], options: { passphrase: string }) => {
        const seed = await codec().deriveSeedAsync(words.join(' '), options.passphrase);
        print(seed.toString('hex'));
      });

    program
      .command('validate')
      .description('Check that a mnemonic is well formed')
      .argument('<words...>', 'Mnemonic words')
      .action((words: string[]) => {
        const result = codec().validate(words.join(' '));
        if (result.isValid) {
          print('valid');
        } else {
          result.errors.forEach(message => logger.failure(message));
          exitCode = 1;
        }
      });

    await program.parseAsync([...argv], { from: 'user' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (isMnemonicError(error)) {
      logger.failure(error.message);
      logger.debug(error.getDescription());
      return 1;
    }
    throw error;
  }

  return exitCode;
}
