import createDebug from 'debug';
import { Readable, Transform, TransformCallback, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import { assertInAlphabet } from '../cipher/transform-engine';
import { SubstitutionCipher } from '../cipher/substitution';
import {
  ByteSource,
  CipherError,
  isCipherError,
  StreamProcessorOptions,
  StreamTransformResult,
} from '../interfaces';
import { DEFAULT_KEY2, DEFAULT_STREAM_HIGH_WATER_MARK } from '../utils/constants';
import { ErrorFactory, toError } from '../utils/error-factory';

const debug = createDebug('polycipher:stream');

export type CipherDirection = 'encode' | 'decode';

/**
 * Resolved stream processing options with defaults applied
 */
export interface ResolvedStreamOptions {
  highWaterMark: number;
  onError?: (error: CipherError) => void;
}

export function resolveStreamOptions(
  options: StreamProcessorOptions = {}
): ResolvedStreamOptions {
  return {
    highWaterMark: options.highWaterMark ?? DEFAULT_STREAM_HIGH_WATER_MARK,
    onError: options.onError,
  };
}

/**
 * Transform that substitutes every byte with the rotating key streams.
 * Key positions carry across chunk boundaries; no shuffle is applied.
 */
export class SubstitutionTransform extends Transform {
  private readonly cipher: SubstitutionCipher;
  private readonly direction: CipherDirection;
  private processed: number = 0;

  constructor(
    key1: string,
    key2: string = DEFAULT_KEY2,
    direction: CipherDirection = 'encode',
    highWaterMark: number = DEFAULT_STREAM_HIGH_WATER_MARK
  ) {
    super({ highWaterMark });
    // Throws INVALID_KEY before any data flows
    this.cipher = new SubstitutionCipher(key1, key2);
    this.direction = direction;
  }

  /** Number of bytes transformed so far */
  get bytesProcessed(): number {
    return this.processed;
  }

  _transform(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    const out = Buffer.alloc(chunk.length);
    try {
      for (let i = 0; i < chunk.length; i += 1) {
        assertInAlphabet(chunk[i], this.processed);
        out[i] =
          this.direction === 'encode'
            ? this.cipher.encrypt(chunk[i])
            : this.cipher.decrypt(chunk[i]);
        this.processed += 1;
      }
    } catch (err) {
      callback(toError(err));
      return;
    }
    callback(null, out);
  }
}

export function createEncodeTransform(
  key1: string,
  key2: string = DEFAULT_KEY2
): SubstitutionTransform {
  return new SubstitutionTransform(key1, key2, 'encode');
}

export function createDecodeTransform(
  key1: string,
  key2: string = DEFAULT_KEY2
): SubstitutionTransform {
  return new SubstitutionTransform(key1, key2, 'decode');
}

/**
 * Map a pipeline failure onto a CipherError. Engine errors keep their
 * type; anything else came from the reader or writer.
 */
function toStreamError(err: unknown): CipherError {
  if (isCipherError(err)) {
    return err;
  }
  const cause = toError(err);
  return ErrorFactory.STREAM_IO(`Stream transform aborted: ${cause.message}`, cause);
}

/**
 * Close the caller's streams when the transform fails before the
 * pipeline takes ownership of them
 */
function releaseStreams(reader: ByteSource, writer: Writable): void {
  if (reader instanceof Readable) {
    reader.destroy();
  }
  writer.destroy();
}

async function runStream(
  direction: CipherDirection,
  reader: ByteSource,
  writer: Writable,
  key1: string,
  key2: string,
  options: StreamProcessorOptions
): Promise<StreamTransformResult> {
  const resolved = resolveStreamOptions(options);

  let piped = false;
  try {
    const transform = new SubstitutionTransform(
      key1,
      key2,
      direction,
      resolved.highWaterMark
    );
    piped = true;
    await pipeline(reader, transform, writer);
    debug('%s stream finished after %d bytes', direction, transform.bytesProcessed);
    return { bytesProcessed: transform.bytesProcessed };
  } catch (err) {
    if (!piped) {
      releaseStreams(reader, writer);
    }
    const error = toStreamError(err);
    debug('%s stream failed (%s): %s', direction, error.type, error.message);
    resolved.onError?.(error);
    throw error;
  }
}

/**
 * Encode a byte stream with the substitution stage only.
 * Output written so far stays in place if the stream fails.
 *
 * @param reader Source of plaintext bytes
 * @param writer Destination for ciphertext bytes
 * @param key1 First key
 * @param key2 Second key, DEFAULT_KEY2 when omitted
 * @param options Stream processing options
 */
export function encodeStream(
  reader: ByteSource,
  writer: Writable,
  key1: string,
  key2: string = DEFAULT_KEY2,
  options: StreamProcessorOptions = {}
): Promise<StreamTransformResult> {
  return runStream('encode', reader, writer, key1, key2, options);
}

/**
 * Decode a byte stream produced by encodeStream with the same keys.
 */
export function decodeStream(
  reader: ByteSource,
  writer: Writable,
  key1: string,
  key2: string = DEFAULT_KEY2,
  options: StreamProcessorOptions = {}
): Promise<StreamTransformResult> {
  return runStream('decode', reader, writer, key1, key2, options);
}
