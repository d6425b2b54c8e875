import { Writable } from 'stream';
import { CipherError, isCipherError } from '../src';

/**
 * Run fn and return the CipherError it throws
 */
export function captureError(fn: () => unknown): CipherError {
  try {
    fn();
  } catch (err) {
    if (isCipherError(err)) {
      return err;
    }
    throw err;
  }
  throw new Error('expected a CipherError to be thrown');
}

/**
 * Await a promise and return the CipherError it rejects with
 */
export async function captureRejection(promise: Promise<unknown>): Promise<CipherError> {
  try {
    await promise;
  } catch (err) {
    if (isCipherError(err)) {
      return err;
    }
    throw err;
  }
  throw new Error('expected a CipherError rejection');
}

/**
 * Writable that keeps every chunk written to it
 */
export function createCollector(): { writer: Writable; contents: () => Buffer } {
  const chunks: Buffer[] = [];
  const writer = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });
  return { writer, contents: () => Buffer.concat(chunks) };
}

/**
 * Deterministic 7-bit test data
 */
export function sampleCodes(length: number, seed: number): number[] {
  const codes: number[] = [];
  let state = seed;
  for (let i = 0; i < length; i += 1) {
    state = (state * 75 + 74) % 65537;
    codes.push(state % 128);
  }
  return codes;
}
