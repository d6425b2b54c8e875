export * from './interfaces';
export * from './cipher';
export * from './processors';
export {
  DEFAULT_KEY2,
  DEFAULT_STREAM_HIGH_WATER_MARK,
  DECODED_FILE_EXTENSION,
  ENCODED_FILE_EXTENSION,
  MODULUS,
} from './utils/constants';
export { ErrorFactory } from './utils/error-factory';
export { createProgram, run, CliIO } from './cli';
