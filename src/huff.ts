/**
 * High-Level Huffman APIs
 *
 * Callback or Promise wrappers around the synchronous codec. The work runs
 * on the next macrotask and the callback fires exactly once.
 */

import { BitReader } from './bits/BitReader.ts';
import { compressSync } from './huffman/Encoder.ts';
import { decompressSync } from './huffman/Decoder.ts';
import { BITS_PER_INT, HUFF_MAGIC, type HuffOptions } from './types.ts';
import { type CodecCallback, runCodec, runSync } from './utils/runCodec.ts';

/** Callback invoked when an async compress/decompress completes */
export type HuffCallback = CodecCallback<Buffer>;

export function compress(input: Buffer | Uint8Array, callback: HuffCallback): void;
export function compress(input: Buffer | Uint8Array, options: HuffOptions, callback: HuffCallback): void;
export function compress(input: Buffer | Uint8Array, options?: HuffOptions): Promise<Buffer>;
/**
 * Compress a buffer
 */
export function compress(input: Buffer | Uint8Array, options?: HuffOptions | HuffCallback, callback?: HuffCallback): Promise<Buffer> | void {
  if (typeof options === 'function') return compress(input, {}, options);
  return runCodec<Buffer>((cb) => runSync(() => compressSync(input, options), cb), callback);
}

export function decompress(input: Buffer | Uint8Array, callback: HuffCallback): void;
export function decompress(input: Buffer | Uint8Array, options: HuffOptions, callback: HuffCallback): void;
export function decompress(input: Buffer | Uint8Array, options?: HuffOptions): Promise<Buffer>;
/**
 * Decompress a buffer produced by compress(). Failures are HuffError instances
 * whose `code` names the kind: BadMagic, MalformedHeader or TruncatedStream.
 */
export function decompress(input: Buffer | Uint8Array, options?: HuffOptions | HuffCallback, callback?: HuffCallback): Promise<Buffer> | void {
  if (typeof options === 'function') return decompress(input, {}, options);
  return runCodec<Buffer>((cb) => runSync(() => decompressSync(input, options), cb), callback);
}

/**
 * Check whether data starts with the Huffman magic value
 */
export function isHuffCompressed(data: Buffer | Uint8Array): boolean {
  return new BitReader(data).readBits(BITS_PER_INT) === HUFF_MAGIC;
}
