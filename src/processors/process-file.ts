import createDebug from 'debug';
import { createReadStream, createWriteStream } from 'fs';
import { access, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import { toKeyCodes } from '../cipher/key-stream';
import { decode, encode } from '../cipher/transform-engine';
import { FileTransformMode, FileTransformOptions, FileTransformResult } from '../interfaces';
import {
  DECODED_FILE_EXTENSION,
  DEFAULT_KEY2,
  ENCODED_FILE_EXTENSION,
} from '../utils/constants';
import { ErrorFactory, toError } from '../utils/error-factory';
import { CipherDirection, decodeStream, encodeStream } from './process-stream';

const debug = createDebug('polycipher:file');

export interface ResolvedFileOptions {
  key2: string;
  outputPath: string;
  mode: FileTransformMode;
}

/**
 * Default output path for a transformed file.
 * Encoding appends `.enc`; decoding strips it, or appends `.dec`.
 */
export function defaultOutputPath(inputPath: string, direction: CipherDirection): string {
  if (direction === 'encode') {
    return `${inputPath}${ENCODED_FILE_EXTENSION}`;
  }
  if (inputPath.endsWith(ENCODED_FILE_EXTENSION) && inputPath.length > ENCODED_FILE_EXTENSION.length) {
    return inputPath.slice(0, -ENCODED_FILE_EXTENSION.length);
  }
  return `${inputPath}${DECODED_FILE_EXTENSION}`;
}

export function resolveFileOptions(
  inputPath: string,
  direction: CipherDirection,
  options: FileTransformOptions = {}
): ResolvedFileOptions {
  const outputPath = options.outputPath ?? defaultOutputPath(inputPath, direction);
  if (path.resolve(outputPath) === path.resolve(inputPath)) {
    throw ErrorFactory.INVALID_ARGUMENT(
      `Output path ${outputPath} would overwrite the input file`
    );
  }
  return {
    key2: options.key2 ?? DEFAULT_KEY2,
    outputPath,
    mode: options.mode ?? 'buffered',
  };
}

async function ensureReadable(inputPath: string): Promise<void> {
  try {
    await access(inputPath);
  } catch (err) {
    throw ErrorFactory.STREAM_IO(`Could not open file ${inputPath}`, toError(err));
  }
}

async function transformBuffered(
  direction: CipherDirection,
  inputPath: string,
  key1: string,
  resolved: ResolvedFileOptions
): Promise<number> {
  let input: Buffer;
  try {
    input = await readFile(inputPath);
  } catch (err) {
    throw ErrorFactory.STREAM_IO(`Could not read file ${inputPath}`, toError(err));
  }

  const output =
    direction === 'encode'
      ? encode(input, key1, resolved.key2)
      : decode(input, key1, resolved.key2);

  try {
    await writeFile(resolved.outputPath, output);
  } catch (err) {
    throw ErrorFactory.STREAM_IO(
      `Could not write file ${resolved.outputPath}`,
      toError(err)
    );
  }
  return output.length;
}

async function transformStreamed(
  direction: CipherDirection,
  inputPath: string,
  key1: string,
  resolved: ResolvedFileOptions
): Promise<number> {
  const run = direction === 'encode' ? encodeStream : decodeStream;
  const result = await run(
    createReadStream(inputPath),
    createWriteStream(resolved.outputPath),
    key1,
    resolved.key2
  );
  return result.bytesProcessed;
}

async function transformFile(
  direction: CipherDirection,
  inputPath: string,
  key1: string,
  options: FileTransformOptions
): Promise<FileTransformResult> {
  const resolved = resolveFileOptions(inputPath, direction, options);
  // Reject bad keys before any file is opened or created
  toKeyCodes(key1, 'key1');
  toKeyCodes(resolved.key2, 'key2');
  await ensureReadable(inputPath);

  const bytesProcessed =
    resolved.mode === 'stream'
      ? await transformStreamed(direction, inputPath, key1, resolved)
      : await transformBuffered(direction, inputPath, key1, resolved);

  debug(
    '%s %s -> %s (%s, %d bytes)',
    direction,
    inputPath,
    resolved.outputPath,
    resolved.mode,
    bytesProcessed
  );
  return {
    inputPath,
    outputPath: resolved.outputPath,
    bytesProcessed,
    mode: resolved.mode,
  };
}

/**
 * Encode the contents of a file into a new file.
 *
 * In 'buffered' mode (default) the output equals encode() over the whole
 * file; in 'stream' mode only the substitution stage is applied.
 */
export function encodeFile(
  inputPath: string,
  key1: string,
  options: FileTransformOptions = {}
): Promise<FileTransformResult> {
  return transformFile('encode', inputPath, key1, options);
}

/**
 * Decode a file written by encodeFile. Use the same keys and mode.
 */
export function decodeFile(
  inputPath: string,
  key1: string,
  options: FileTransformOptions = {}
): Promise<FileTransformResult> {
  return transformFile('decode', inputPath, key1, options);
}
