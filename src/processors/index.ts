export * from './process-file';
export * from './process-stream';
