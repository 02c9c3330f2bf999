/**
 * Huffman Transform Stream Wrappers
 *
 * Both streams collect their whole input and run the synchronous codec in
 * flush(). Decode errors surface as 'error' events carrying a HuffError.
 */

import type { Transform } from 'stream';
import { compressSync } from '../huffman/Encoder.ts';
import { decompressSync } from '../huffman/Decoder.ts';
import type { HuffOptions } from '../types.ts';
import createBufferingTransform from '../utils/createBufferingTransform.ts';

/**
 * Create a Transform stream that compresses everything written to it
 */
export function createHuffEncoder(options?: HuffOptions): Transform {
  return createBufferingTransform((input) => compressSync(input, options));
}

/**
 * Create a Transform stream that decompresses a Huffman stream
 */
export function createHuffDecoder(options?: HuffOptions): Transform {
  return createBufferingTransform((input) => decompressSync(input, options));
}
