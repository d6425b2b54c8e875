import { MODULUS } from '../utils/constants';
import { KeyStream } from './key-stream';

/**
 * Apply both key shifts to a single code.
 * ((c + k1) mod MODULUS + k2) mod MODULUS
 */
export function encryptChar(c: number, k1: number, k2: number): number {
  return (((c + k1) % MODULUS) + k2) % MODULUS;
}

/**
 * Inverse of encryptChar: remove k2, then k1, wrapping negatives back
 * into the alphabet after each step.
 */
export function decryptChar(c: number, k1: number, k2: number): number {
  let x = c - k2;
  if (x < 0) x += MODULUS;
  let y = x - k1;
  if (y < 0) y += MODULUS;
  return y;
}

/**
 * Pair of independently rotating key streams driving the substitution
 */
export class SubstitutionCipher {
  private readonly key1: KeyStream;
  private readonly key2: KeyStream;

  constructor(key1: string, key2: string) {
    this.key1 = new KeyStream(key1, 'key1');
    this.key2 = new KeyStream(key2, 'key2');
  }

  encrypt(c: number): number {
    return encryptChar(c, this.key1.next(), this.key2.next());
  }

  decrypt(c: number): number {
    return decryptChar(c, this.key1.next(), this.key2.next());
  }

  encryptAll(codes: ArrayLike<number>): number[] {
    return Array.from(codes, (c) => this.encrypt(c));
  }

  decryptAll(codes: ArrayLike<number>): number[] {
    return Array.from(codes, (c) => this.decrypt(c));
  }
}

/**
 * Substitute every code left to right with fresh key indices
 */
export function substitute(codes: ArrayLike<number>, key1: string, key2: string): number[] {
  return new SubstitutionCipher(key1, key2).encryptAll(codes);
}

/**
 * Undo substitute() with fresh key indices
 */
export function unsubstitute(codes: ArrayLike<number>, key1: string, key2: string): number[] {
  return new SubstitutionCipher(key1, key2).decryptAll(codes);
}
