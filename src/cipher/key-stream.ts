import { MODULUS } from '../utils/constants';
import { ErrorFactory } from '../utils/error-factory';

/**
 * Validate a key and convert it to character codes.
 * Rejects empty keys and keys holding codes outside [0, MODULUS).
 */
export function toKeyCodes(key: string, name: string = 'key'): number[] {
  if (typeof key !== 'string' || key.length === 0) {
    throw ErrorFactory.INVALID_KEY(`${name} must be a non-empty string`);
  }

  const codes: number[] = [];
  for (let i = 0; i < key.length; i += 1) {
    const code = key.charCodeAt(i);
    if (code >= MODULUS) {
      throw ErrorFactory.INVALID_KEY(
        `${name} has character code ${code} at position ${i}; ` +
          `key codes must be below ${MODULUS}`
      );
    }
    codes.push(code);
  }
  return codes;
}

/**
 * Rotating index over a key. Each call to next() returns the current key
 * code and advances, wrapping modulo the key length.
 *
 * One instance per key per top-level call; never shared.
 */
export class KeyStream {
  private readonly codes: number[];
  private index: number = 0;

  constructor(key: string, name?: string) {
    this.codes = toKeyCodes(key, name);
  }

  get length(): number {
    return this.codes.length;
  }

  get position(): number {
    return this.index;
  }

  next(): number {
    const code = this.codes[this.index];
    this.index = (this.index + 1) % this.codes.length;
    return code;
  }
}
