import { PassThrough, Readable, Writable } from 'stream';
import {
  CipherError,
  CipherErrorType,
  createDecodeTransform,
  createEncodeTransform,
  decodeStream,
  DEFAULT_KEY2,
  DEFAULT_STREAM_HIGH_WATER_MARK,
  encode,
  encodeStream,
  resolveStreamOptions,
  shuffle,
  substitute,
} from '../src';
import { captureError, captureRejection, createCollector } from './helpers';

describe('Stream processing', () => {
  describe('encodeStream', () => {
    test('substitutes without shuffling', async () => {
      const { writer, contents } = createCollector();
      const result = await encodeStream(Readable.from(['hello']), writer, 'key', 'pad');
      expect(result.bytesProcessed).toBe(5);
      expect(contents()).toEqual(Buffer.from([67, 43, 73, 71, 53]));
    });

    test('key positions carry across chunk boundaries', async () => {
      const { writer, contents } = createCollector();
      await encodeStream(Readable.from(['he', 'l', 'lo']), writer, 'key', 'pad');
      expect(contents().toString('latin1')).toBe('C+IG5');
    });

    test('uses DEFAULT_KEY2 when key2 is omitted', async () => {
      const plain = 'Master of Puppets';
      const { writer, contents } = createCollector();
      await encodeStream(Readable.from([plain]), writer, 'sayaka');
      const codes = Array.from(plain, (ch) => ch.charCodeAt(0));
      expect(Array.from(contents())).toEqual(substitute(codes, 'sayaka', DEFAULT_KEY2));
    });

    test('buffering the streamed output and shuffling it gives encode()', async () => {
      const plain = 'Master of Puppets';
      const { writer, contents } = createCollector();
      await encodeStream(Readable.from([plain]), writer, 'sayaka');
      const shuffled = String.fromCharCode(...shuffle(Array.from(contents())));
      expect(shuffled).toBe(encode(plain, 'sayaka'));
    });

    test('accepts async generators of Uint8Array chunks', async () => {
      async function* source(): AsyncGenerator<Uint8Array> {
        yield Uint8Array.from([104, 101]);
        yield Uint8Array.from([108, 108, 111]);
      }
      const { writer, contents } = createCollector();
      const result = await encodeStream(source(), writer, 'key', 'pad');
      expect(result.bytesProcessed).toBe(5);
      expect(contents().toString('latin1')).toBe('C+IG5');
    });

    test('empty input writes nothing', async () => {
      const { writer, contents } = createCollector();
      const result = await encodeStream(Readable.from([]), writer, 'k');
      expect(result.bytesProcessed).toBe(0);
      expect(contents()).toHaveLength(0);
    });
  });

  describe('decodeStream', () => {
    test('round trips with different chunking on each side', async () => {
      const encoded = createCollector();
      await encodeStream(Readable.from(['Master ', 'of Puppets']), encoded.writer, 'sayaka', 'pad');

      const bytes = encoded.contents();
      const decoded = createCollector();
      await decodeStream(
        Readable.from([bytes.subarray(0, 3), bytes.subarray(3)]),
        decoded.writer,
        'sayaka',
        'pad'
      );
      expect(decoded.contents().toString('latin1')).toBe('Master of Puppets');
    });
  });

  describe('errors', () => {
    test('rejects an empty key with INVALID_KEY', async () => {
      const { writer } = createCollector();
      const error = await captureRejection(encodeStream(Readable.from(['abc']), writer, ''));
      expect(error.type).toBe(CipherErrorType.INVALID_KEY);
      expect(error.message).toBe('key1 must be a non-empty string');
    });

    test('closes the reader and writer when a key is rejected', async () => {
      const reader = new PassThrough();
      const { writer } = createCollector();
      const error = await captureRejection(encodeStream(reader, writer, ''));
      expect(error.type).toBe(CipherErrorType.INVALID_KEY);
      expect(reader.destroyed).toBe(true);
      expect(writer.destroyed).toBe(true);
    });

    test('closes the writer when decodeStream gets an empty second key', async () => {
      const { writer } = createCollector();
      const error = await captureRejection(
        decodeStream(Readable.from(['abc']), writer, 'key', '')
      );
      expect(error.message).toBe('key2 must be a non-empty string');
      expect(writer.destroyed).toBe(true);
    });

    test('rejects out-of-range bytes with their stream position', async () => {
      const { writer } = createCollector();
      const error = await captureRejection(
        encodeStream(Readable.from([Buffer.from([65, 66]), Buffer.from([67, 200])]), writer, 'k')
      );
      expect(error.type).toBe(CipherErrorType.OUT_OF_RANGE_CHARACTER);
      expect(error.message).toBe('Character code 200 at position 3 is outside [0, 128)');
    });

    test('reports writer failures as STREAM_IO and keeps partial output', async () => {
      const written: Buffer[] = [];
      const writer = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          if (written.length === 0) {
            written.push(chunk);
            callback();
          } else {
            callback(new Error('disk full'));
          }
        },
      });
      const errors: CipherError[] = [];
      const error = await captureRejection(
        encodeStream(
          Readable.from([Buffer.from('ab'), Buffer.from('cd')]),
          writer,
          'key',
          'pad',
          { onError: (err) => errors.push(err) }
        )
      );
      expect(error.type).toBe(CipherErrorType.STREAM_IO);
      expect(error.message).toBe('Stream transform aborted: disk full');
      expect(error.cause?.message).toBe('disk full');
      expect(errors).toEqual([error]);
      expect(written).toHaveLength(1);
      expect(written[0]).toHaveLength(2);
    });

    test('reports reader failures as STREAM_IO', async () => {
      async function* failing(): AsyncGenerator<string> {
        yield 'ab';
        throw new Error('read failed');
      }
      const { writer } = createCollector();
      const error = await captureRejection(decodeStream(failing(), writer, 'key'));
      expect(error.type).toBe(CipherErrorType.STREAM_IO);
      expect(error.message).toBe('Stream transform aborted: read failed');
    });
  });

  describe('transforms and options', () => {
    test('createEncodeTransform and createDecodeTransform work in a manual pipe', async () => {
      const encoder = createEncodeTransform('key', 'pad');
      const decoder = createDecodeTransform('key', 'pad');
      const { writer, contents } = createCollector();

      await new Promise<void>((resolve, reject) => {
        writer.on('finish', resolve);
        writer.on('error', reject);
        Readable.from(['hello world']).pipe(encoder).pipe(decoder).pipe(writer);
      });
      expect(contents().toString('latin1')).toBe('hello world');
      expect(encoder.bytesProcessed).toBe(11);
    });

    test('transform constructors reject empty keys immediately', () => {
      expect(captureError(() => createEncodeTransform('', 'pad')).type).toBe(
        CipherErrorType.INVALID_KEY
      );
    });

    test('resolveStreamOptions applies defaults', () => {
      const onError = jest.fn();
      expect(resolveStreamOptions()).toEqual({
        highWaterMark: DEFAULT_STREAM_HIGH_WATER_MARK,
        onError: undefined,
      });
      expect(resolveStreamOptions({ highWaterMark: 64, onError })).toEqual({
        highWaterMark: 64,
        onError,
      });
    });
  });
});
