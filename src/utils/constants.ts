// Alphabet size: 7-bit ASCII
export const MODULUS = 128;

// Second key used when the caller supplies only one. Public, not a secret.
export const DEFAULT_KEY2 = ']09agvn cv8eA ino;av 478uyTR`~=( ADJ OD *^t';

// File adapter defaults
export const ENCODED_FILE_EXTENSION = '.enc';
export const DECODED_FILE_EXTENSION = '.dec';

// Environment variable the CLI reads for a default second key
export const KEY2_ENV_VAR = 'POLYCIPHER_KEY2';

// Sample text for the CLI demo command
export const DEMO_PLAINTEXT = 'Master of Puppets, The New Order, Rust In Peace';
export const DEMO_KEY = 'sayaka';

// Stream processor defaults
export const DEFAULT_STREAM_HIGH_WATER_MARK = 16 * 1024; // bytes
