/**
 * Huffman Encoder
 *
 * Two passes over a restartable reader: the first counts symbols, the second
 * emits codes after the magic value and tree header.
 */

import { BitReader, END_OF_STREAM } from '../bits/BitReader.ts';
import { BitWriter } from '../bits/BitWriter.ts';
import { BITS_PER_INT, BITS_PER_WORD, type CodeTable, DEBUG_HIGH, DEBUG_LOW, EOF_SYMBOL, HUFF_MAGIC, type HuffOptions } from '../types.ts';
import { debugLog, resolveDebugLevel } from '../utils/debug.ts';
import { codeToString, makeCodings, writeCode } from './CodeTable.ts';
import { buildCodeTree, countLeaves } from './CodeTree.ts';
import { collectCounts } from './FrequencyTable.ts';
import { writeTreeHeader } from './TreeHeader.ts';

function writeSymbol(codings: CodeTable, symbol: number, writer: BitWriter): void {
  const code = codings[symbol];
  if (!code) throw new Error(`No code for symbol ${symbol}`);
  writeCode(code, writer);
}

/**
 * Encode everything `reader` holds into `writer`, then close the writer
 */
export function encodeHuffman(reader: BitReader, writer: BitWriter, options?: HuffOptions): void {
  const level = resolveDebugLevel(options);

  const counts = collectCounts(reader);
  const root = buildCodeTree(counts);
  const codings = makeCodings(root);

  if (level >= DEBUG_HIGH) {
    for (let symbol = 0; symbol <= EOF_SYMBOL; symbol++) {
      const code = codings[symbol];
      if (code) debugLog(level, DEBUG_HIGH, `${symbol}\t${counts[symbol]}\t${codeToString(code)}`);
    }
  }

  writer.writeBits(BITS_PER_INT, HUFF_MAGIC);
  writeTreeHeader(root, writer);
  debugLog(level, DEBUG_HIGH, `tree header: ${countLeaves(root)} leaves, ${writer.bitsWritten - BITS_PER_INT} bits`);

  reader.reset();
  for (;;) {
    const value = reader.readBits(BITS_PER_WORD);
    if (value === END_OF_STREAM) break;
    writeSymbol(codings, value, writer);
  }
  writeSymbol(codings, EOF_SYMBOL, writer);
  writer.close();

  debugLog(level, DEBUG_LOW, `compressed: ${reader.bitsRead} bits read, ${writer.bitsWritten} bits written`);
}

/**
 * Compress a buffer synchronously
 */
export function compressSync(input: Buffer | Uint8Array, options?: HuffOptions): Buffer {
  const writer = new BitWriter();
  encodeHuffman(new BitReader(input), writer, options);
  return writer.toBuffer();
}
