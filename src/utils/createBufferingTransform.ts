import { Transform } from 'extract-base-iterator';
import type { Transform as TransformType } from 'stream';

type CodecFn = (input: Buffer) => Buffer;

/**
 * Helper to create a Transform stream from a synchronous codec
 *
 * This buffers all input and applies the codec when the stream ends. The
 * encoder needs two passes over its input, so neither direction streams.
 */
export default function createBufferingTransform(codecFn: CodecFn): InstanceType<typeof TransformType> {
  const chunks: Buffer[] = [];

  return new Transform({
    transform: (chunk: Buffer, _encoding: string, callback: (err?: Error | null, data?: Buffer) => void) => {
      chunks.push(chunk);
      callback();
    },
    flush: function (this: InstanceType<typeof TransformType>, callback: (err?: Error | null) => void) {
      let output: Buffer;
      try {
        output = codecFn(Buffer.concat(chunks));
      } catch (err) {
        callback(err instanceof Error ? err : new Error(String(err)));
        return;
      }
      chunks.length = 0;
      this.push(output);
      callback();
    },
  });
}
