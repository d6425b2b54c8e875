import createDebug from 'debug';
import { DEFAULT_KEY2, MODULUS } from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';
import { shuffle, unshuffle } from './shuffle';
import { SubstitutionCipher } from './substitution';

const debug = createDebug('polycipher:engine');

// String.fromCharCode takes its codes as call arguments
const FROM_CHAR_CODE_CHUNK = 8192;

/**
 * Input accepted by encode/decode. Strings are processed per UTF-16 code
 * unit, byte arrays per byte; the result has the same shape as the input.
 */
export type CipherInput = string | Uint8Array;

/**
 * Check that a code lies in [0, MODULUS)
 */
export function assertInAlphabet(code: number, position: number): void {
  if (!Number.isInteger(code) || code < 0 || code >= MODULUS) {
    throw ErrorFactory.OUT_OF_RANGE(
      `Character code ${code} at position ${position} is outside [0, ${MODULUS})`
    );
  }
}

/**
 * Convert input to validated character codes
 */
export function toCodes(data: CipherInput): number[] {
  const codes: number[] = [];
  for (let i = 0; i < data.length; i += 1) {
    const code = typeof data === 'string' ? data.charCodeAt(i) : data[i];
    assertInAlphabet(code, i);
    codes.push(code);
  }
  return codes;
}

function codesToString(codes: number[]): string {
  let out = '';
  for (let i = 0; i < codes.length; i += FROM_CHAR_CODE_CHUNK) {
    out += String.fromCharCode(...codes.slice(i, i + FROM_CHAR_CODE_CHUNK));
  }
  return out;
}

function fromCodes(codes: number[], like: CipherInput): string | Buffer {
  return typeof like === 'string' ? codesToString(codes) : Buffer.from(codes);
}

/**
 * Encode data: two-key substitution followed by the interleave shuffle.
 *
 * Keys are validated before the data, so an empty key is reported as
 * INVALID_KEY whatever the input holds.
 *
 * @param data Plaintext, every code in [0, 128)
 * @param key1 Required first key
 * @param key2 Second key, DEFAULT_KEY2 when omitted
 * @returns Ciphertext of the same length and type as `data`
 */
export function encode(data: string, key1: string, key2?: string): string;
export function encode(data: Uint8Array, key1: string, key2?: string): Buffer;
export function encode(data: CipherInput, key1: string, key2?: string): string | Buffer;
export function encode(
  data: CipherInput,
  key1: string,
  key2: string = DEFAULT_KEY2
): string | Buffer {
  const cipher = new SubstitutionCipher(key1, key2);
  const codes = toCodes(data);
  debug('encode %d codes', codes.length);
  return fromCodes(shuffle(cipher.encryptAll(codes)), data);
}

/**
 * Decode data produced by encode() with the same keys.
 *
 * @param data Ciphertext, every code in [0, 128)
 * @param key1 First key used for encoding
 * @param key2 Second key used for encoding, DEFAULT_KEY2 when omitted
 * @returns Plaintext of the same length and type as `data`
 */
export function decode(data: string, key1: string, key2?: string): string;
export function decode(data: Uint8Array, key1: string, key2?: string): Buffer;
export function decode(data: CipherInput, key1: string, key2?: string): string | Buffer;
export function decode(
  data: CipherInput,
  key1: string,
  key2: string = DEFAULT_KEY2
): string | Buffer {
  const cipher = new SubstitutionCipher(key1, key2);
  const codes = toCodes(data);
  debug('decode %d codes', codes.length);
  return fromCodes(cipher.decryptAll(unshuffle(codes)), data);
}
