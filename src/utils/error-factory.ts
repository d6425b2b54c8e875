import { CipherError, CipherErrorType } from '../interfaces';

/**
 * Factory for creating standardized CipherError objects
 */
export class ErrorFactory {
  /**
   * Create an invalid key error
   */
  static INVALID_KEY(message: string, cause?: Error): CipherError {
    return new CipherError(CipherErrorType.INVALID_KEY, message, cause);
  }

  /**
   * Create an out-of-range character error
   */
  static OUT_OF_RANGE(message: string, cause?: Error): CipherError {
    return new CipherError(
      CipherErrorType.OUT_OF_RANGE_CHARACTER,
      message,
      cause
    );
  }

  /**
   * Create a stream I/O error
   */
  static STREAM_IO(message: string, cause?: Error): CipherError {
    return new CipherError(CipherErrorType.STREAM_IO, message, cause);
  }

  /**
   * Create an invalid argument error
   */
  static INVALID_ARGUMENT(message: string, cause?: Error): CipherError {
    return new CipherError(CipherErrorType.INVALID_ARGUMENT, message, cause);
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
