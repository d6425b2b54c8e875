import { Command, CommanderError } from 'commander';
import createDebug from 'debug';
import { decode, encode } from './cipher/transform-engine';
import { FileTransformOptions, isCipherError } from './interfaces';
import { CipherDirection, decodeFile, encodeFile } from './processors';
import {
  DEFAULT_KEY2,
  DEMO_KEY,
  DEMO_PLAINTEXT,
  KEY2_ENV_VAR,
} from './utils/constants';
import { ErrorFactory } from './utils/error-factory';

const debug = createDebug('polycipher:cli');

const USAGE_HINT = 'For help enter "help"';

/**
 * Output sinks and environment the CLI runs against
 */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
}

interface CliOptions {
  stream?: boolean;
  output?: string;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  env: process.env,
};

function parseDirection(flag: string): CipherDirection {
  switch (flag.toLowerCase()) {
    case 'e':
      return 'encode';
    case 'd':
      return 'decode';
    default:
      throw ErrorFactory.INVALID_ARGUMENT(
        `Invalid encryption flag "${flag}". Use E for encryption or D for decryption`
      );
  }
}

function runDemo(io: CliIO): void {
  const cipherText = encode(DEMO_PLAINTEXT, DEMO_KEY);
  const plainText = decode(cipherText, DEMO_KEY);
  io.stdout(`Plain text: ${DEMO_PLAINTEXT}\n`);
  io.stdout(`Cipher text: ${JSON.stringify(cipherText)}\n`);
  io.stdout(`Decrypted text: ${plainText}\n`);
}

/**
 * Build the polycipher command.
 *
 * polycipher [options] [--] <subject> <s|f> <e|d> <key1> [key2]
 * polycipher help | demo
 *
 * Operands starting with "-" must follow "--", otherwise they are read
 * as options.
 */
export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('polycipher')
    .description('Obfuscate text or files with a two-key substitution and shuffle')
    .argument('<subject>', 'string to transform, file path, or "help" / "demo"')
    .argument('[mode]', 's for a string subject, f for a file path')
    .argument('[direction]', 'e to encode, d to decode')
    .argument('[key1]', 'first key')
    .argument('[key2]', `second key (default: $${KEY2_ENV_VAR} or a built-in constant)`)
    .option('--stream', 'transform files byte by byte, without the shuffle step')
    .option('-o, --output <path>', 'output file path (file mode only)')
    .usage('[options] [--] <subject> [mode] [direction] [key1] [key2]')
    .addHelpText(
      'after',
      '\nPut options first and end them with "--" when the subject or a key starts with "-":\n' +
        '  polycipher --stream -- -input.txt f e key1\n'
    )
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr })
    .action(
      async (
        subject: string,
        mode: string | undefined,
        direction: string | undefined,
        key1: string | undefined,
        key2: string | undefined,
        options: CliOptions
      ) => {
        if (mode === undefined) {
          const arg = subject.toLowerCase();
          if (arg === 'help' || arg === 'h') {
            program.outputHelp();
            return;
          }
          if (arg === 'demo' || arg === 'd') {
            runDemo(io);
            return;
          }
        }

        if (mode === undefined || direction === undefined || key1 === undefined) {
          throw ErrorFactory.INVALID_ARGUMENT(
            `Invalid arguments: expected <subject> <s|f> <e|d> <key1> [key2]. ${USAGE_HINT}`
          );
        }

        const cipherDirection = parseDirection(direction);
        const secondKey = key2 ?? io.env[KEY2_ENV_VAR] ?? DEFAULT_KEY2;
        debug('%s %s subject', cipherDirection, mode);

        switch (mode.toLowerCase()) {
          case 's': {
            const result =
              cipherDirection === 'encode'
                ? encode(subject, key1, secondKey)
                : decode(subject, key1, secondKey);
            io.stdout(`${result}\n`);
            return;
          }
          case 'f': {
            const fileOptions: FileTransformOptions = {
              key2: secondKey,
              outputPath: options.output,
              mode: options.stream ? 'stream' : 'buffered',
            };
            const result =
              cipherDirection === 'encode'
                ? await encodeFile(subject, key1, fileOptions)
                : await decodeFile(subject, key1, fileOptions);
            io.stdout(`Wrote ${result.bytesProcessed} bytes to ${result.outputPath}\n`);
            return;
          }
          default:
            throw ErrorFactory.INVALID_ARGUMENT(
              `Invalid mode "${mode}". Use S for a string or F for a file. ${USAGE_HINT}`
            );
        }
      }
    );

  return program;
}

/**
 * Parse argv and run the command.
 * @returns The process exit code
 */
export async function run(argv: string[], io: CliIO = defaultIO): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    if (isCipherError(err)) {
      io.stderr(`${err.type}: ${err.message}\n`);
      return 1;
    }
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }
}
