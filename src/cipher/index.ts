export * from './key-stream';
export * from './shuffle';
export * from './substitution';
export * from './transform-engine';
