export * from './cipher-error.interface';
export * from './file-options.interface';
export * from './stream-options.interface';
