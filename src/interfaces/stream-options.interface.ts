import { CipherError } from './cipher-error.interface';

/**
 * Anything the stream processors can read bytes from.
 * Node `Readable` streams satisfy this, as do async generators.
 */
export type ByteSource = AsyncIterable<Uint8Array | string>;

/**
 * Options shared by encodeStream and decodeStream
 */
export interface StreamProcessorOptions {
  /** Buffer size of the substitution Transform, in bytes */
  highWaterMark?: number;
  /** Called once with the failure before the returned promise rejects */
  onError?: (error: CipherError) => void;
}

/**
 * Outcome of a completed stream transform
 */
export interface StreamTransformResult {
  bytesProcessed: number;
}
