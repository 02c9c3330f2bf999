/**
 * Huff-Compat: Huffman Compression Library
 *
 * Pure TypeScript Huffman coder with a self-describing stream format:
 * 32-bit magic, preorder tree header, coded body, EOF terminator.
 */

// ============================================================================
// High-Level APIs (Recommended)
// ============================================================================

export { compress, decompress, type HuffCallback, isHuffCompressed } from './huff.ts';
export { compressSync } from './huffman/Encoder.ts';
export { decompressSync } from './huffman/Decoder.ts';
// Transform streams - buffer input, emit the whole result on end
export { createHuffDecoder, createHuffEncoder } from './stream/transforms.ts';

// ============================================================================
// Low-Level APIs
// ============================================================================

export { BitReader, END_OF_STREAM } from './bits/BitReader.ts';
export { BitWriter } from './bits/BitWriter.ts';
export { codeToString, makeCodings, writeCode } from './huffman/CodeTable.ts';
export { buildCodeTree, countLeaves } from './huffman/CodeTree.ts';
export { decodeHuffman } from './huffman/Decoder.ts';
export { encodeHuffman } from './huffman/Encoder.ts';
export { collectCounts } from './huffman/FrequencyTable.ts';
export { PriorityQueue } from './huffman/PriorityQueue.ts';
export { readTreeHeader, writeTreeHeader } from './huffman/TreeHeader.ts';

// Type exports
export * from './types.ts';

// Callback type used by async APIs
export type { CodecCallback } from './utils/runCodec.ts';
