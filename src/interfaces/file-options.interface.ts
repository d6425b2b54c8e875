/**
 * How a file is transformed:
 * - 'buffered': read fully, substitute and shuffle (same output as encode())
 * - 'stream': substitute byte by byte, no shuffle
 */
export type FileTransformMode = 'buffered' | 'stream';

export interface FileTransformOptions {
  key2?: string;
  outputPath?: string;
  mode?: FileTransformMode;
}

export interface FileTransformResult {
  inputPath: string;
  outputPath: string;
  bytesProcessed: number;
  mode: FileTransformMode;
}
