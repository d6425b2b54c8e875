/**
 * Error types raised by the cipher engine and its stream processors
 */
export enum CipherErrorType {
  INVALID_KEY = 'INVALID_KEY',                       // Empty key or key code outside the alphabet
  OUT_OF_RANGE_CHARACTER = 'OUT_OF_RANGE_CHARACTER', // Input code outside [0, MODULUS)
  STREAM_IO = 'STREAM_IO',                           // Read/write failure while streaming
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',             // Bad command-line arguments
}

/**
 * Error thrown by every polycipher operation
 */
export class CipherError extends Error {
  readonly type: CipherErrorType;
  cause?: Error;

  constructor(type: CipherErrorType, message: string, cause?: Error) {
    super(message);
    this.name = 'CipherError';
    this.type = type;
    this.cause = cause;
  }
}

/**
 * Type guard for errors raised by polycipher
 */
export function isCipherError(err: unknown): err is CipherError {
  return err instanceof CipherError;
}
