/**
 * Huffman Types and Constants
 *
 * Shared constants, the code tree model and the error kinds used by the
 * encoder and decoder.
 */

// Alphabet constants
export const BITS_PER_WORD = 8;
export const BITS_PER_INT = 32;
export const ALPH_SIZE = 1 << BITS_PER_WORD; // 256
export const EOF_SYMBOL = ALPH_SIZE; // 256
export const NUM_SYMBOLS = ALPH_SIZE + 1; // 257

// Leaf symbol field in the tree header (must hold EOF_SYMBOL)
export const SYMBOL_BITS = BITS_PER_WORD + 1; // 9

// Deepest possible tree: NUM_SYMBOLS leaves in a single chain
export const MAX_TREE_DEPTH = NUM_SYMBOLS - 1; // 256

// Magic value at the start of every compressed stream
export const HUFF_MAGIC = 0xface8201;

// Debug levels
export const DEBUG_LOW = 1;
export const DEBUG_HIGH = 4;

export interface HuffLeaf {
  readonly type: 'leaf';
  readonly symbol: number;
  readonly weight: number;
}

export interface HuffInternal {
  readonly type: 'internal';
  readonly weight: number;
  readonly left: HuffNode;
  readonly right: HuffNode;
}

/**
 * Code tree node: leaves hold symbols, internal nodes always have two children
 */
export type HuffNode = HuffLeaf | HuffInternal;

export function leaf(symbol: number, weight: number): HuffLeaf {
  return { type: 'leaf', symbol, weight };
}

export function internal(left: HuffNode, right: HuffNode, weight = left.weight + right.weight): HuffInternal {
  return { type: 'internal', weight, left, right };
}

export function isLeaf(node: HuffNode): node is HuffLeaf {
  return node.type === 'leaf';
}

/**
 * Code for one symbol, most significant bit first
 *
 * `words` holds the path in 32-bit pieces; every piece is full except the
 * last, which carries the remaining `length % 32` bits (or 32).
 */
export interface Code {
  words: number[];
  length: number;
}

export type CodeTable = (Code | undefined)[];

export type HuffErrorKind = 'BadMagic' | 'MalformedHeader' | 'TruncatedStream';

export type HuffResult<T> = { ok: true; value: T } | { ok: false; kind: HuffErrorKind; message: string };

export function failure<T>(kind: HuffErrorKind, message: string): HuffResult<T> {
  return { ok: false, kind, message };
}

/**
 * Error thrown (or passed to callbacks) when a compressed stream is rejected
 */
export class HuffError extends Error {
  readonly code: HuffErrorKind;

  constructor(code: HuffErrorKind, message: string) {
    super(message);
    this.name = 'HuffError';
    this.code = code;
  }
}

/**
 * Unwrap a result, throwing HuffError on failure
 */
export function unwrap<T>(result: HuffResult<T>): T {
  if (!result.ok) throw new HuffError(result.kind, result.message);
  return result.value;
}

export interface HuffOptions {
  /** Diagnostic level (0 = silent, DEBUG_LOW, DEBUG_HIGH). Defaults to HUFF_DEBUG */
  debug?: number;
}

/**
 * Output sink interface for streaming encode/decode
 * Can be a Buffer collector or a stream with write() method
 */
export interface OutputSink {
  write(buffer: Buffer): void;
}
