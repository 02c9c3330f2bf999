/**
 * Tree Header
 *
 * Preorder serialization of the code tree: an internal node is a single 0
 * bit followed by its left and right subtrees; a leaf is a 1 bit followed by
 * its symbol in SYMBOL_BITS bits. The encoding is self-delimiting.
 */

import { type BitReader, END_OF_STREAM } from '../bits/BitReader.ts';
import type { BitWriter } from '../bits/BitWriter.ts';
import { EOF_SYMBOL, failure, type HuffNode, type HuffResult, internal, leaf, MAX_TREE_DEPTH, SYMBOL_BITS } from '../types.ts';

export function writeTreeHeader(root: HuffNode, writer: BitWriter): void {
  if (root.type === 'internal') {
    writer.writeBits(1, 0);
    writeTreeHeader(root.left, writer);
    writeTreeHeader(root.right, writer);
  } else {
    writer.writeBits(1, 1);
    writer.writeBits(SYMBOL_BITS, root.symbol);
  }
}

/**
 * Rebuild a tree written by writeTreeHeader
 *
 * Weights are not transmitted, so every rebuilt node has weight 0. An
 * internal node below MAX_TREE_DEPTH cannot come from a valid tree.
 */
export function readTreeHeader(reader: BitReader, depth = 0): HuffResult<HuffNode> {
  const bit = reader.readBits(1);
  if (bit === END_OF_STREAM) {
    return failure('MalformedHeader', 'Tree header ends before the tree is complete');
  }

  if (bit === 0) {
    if (depth >= MAX_TREE_DEPTH) {
      return failure('MalformedHeader', `Tree header deeper than ${MAX_TREE_DEPTH} levels`);
    }
    const left = readTreeHeader(reader, depth + 1);
    if (!left.ok) return left;
    const right = readTreeHeader(reader, depth + 1);
    if (!right.ok) return right;
    return { ok: true, value: internal(left.value, right.value, 0) };
  }

  const symbol = reader.readBits(SYMBOL_BITS);
  if (symbol === END_OF_STREAM) {
    return failure('MalformedHeader', 'Tree header ends inside a leaf symbol');
  }
  if (symbol > EOF_SYMBOL) {
    return failure('MalformedHeader', `Invalid leaf symbol ${symbol} in tree header`);
  }
  return { ok: true, value: leaf(symbol, 0) };
}
