/**
 * Huffman Decoder
 *
 * Reads the magic value and tree header, then walks the tree one bit at a
 * time until the EOF_SYMBOL leaf. Running out of bits first is an error:
 * valid streams always end with the terminator code.
 */

import { BitReader, END_OF_STREAM } from '../bits/BitReader.ts';
import { BitWriter } from '../bits/BitWriter.ts';
import { BITS_PER_INT, BITS_PER_WORD, DEBUG_LOW, EOF_SYMBOL, failure, HUFF_MAGIC, type HuffOptions, type HuffResult, unwrap } from '../types.ts';
import { debugLog, resolveDebugLevel } from '../utils/debug.ts';
import { readTreeHeader } from './TreeHeader.ts';

/**
 * Decode a compressed stream from `reader` into `writer`
 * @returns number of bytes written, or the reason the stream was rejected
 */
export function decodeHuffman(reader: BitReader, writer: BitWriter, options?: HuffOptions): HuffResult<number> {
  const level = resolveDebugLevel(options);

  const magic = reader.readBits(BITS_PER_INT);
  if (magic === END_OF_STREAM) {
    return failure('BadMagic', 'Input too short for a Huffman header');
  }
  if (magic !== HUFF_MAGIC) {
    return failure('BadMagic', `Illegal header starts with 0x${magic.toString(16)}`);
  }

  const tree = readTreeHeader(reader);
  if (!tree.ok) return tree;
  const root = tree.value;

  let written = 0;
  if (root.type === 'leaf') {
    // Zero-length code: only a lone EOF_SYMBOL can terminate
    if (root.symbol !== EOF_SYMBOL) {
      return failure('MalformedHeader', `Single-leaf tree holds symbol ${root.symbol} instead of EOF`);
    }
  } else {
    let current = root;
    for (;;) {
      const bit = reader.readBits(1);
      if (bit === END_OF_STREAM) {
        return failure('TruncatedStream', 'Bad input, no EOF code before end of stream');
      }
      const next = bit === 0 ? current.left : current.right;
      if (next.type === 'internal') {
        current = next;
        continue;
      }
      if (next.symbol === EOF_SYMBOL) break;
      writer.writeBits(BITS_PER_WORD, next.symbol);
      written++;
      current = root;
    }
  }
  writer.close();

  debugLog(level, DEBUG_LOW, `decompressed: ${reader.bitsRead} bits read, ${written} bytes written`);
  return { ok: true, value: written };
}

/**
 * Decompress a buffer synchronously
 * @throws HuffError when the input is not a valid compressed stream
 */
export function decompressSync(input: Buffer | Uint8Array, options?: HuffOptions): Buffer {
  const writer = new BitWriter();
  unwrap(decodeHuffman(new BitReader(input), writer, options));
  return writer.toBuffer();
}
