/**
 * Code Tree Builder
 *
 * Classic Huffman construction: merge the two lightest pending nodes until a
 * single root remains. The first node removed becomes the left child.
 */

import { type HuffNode, internal, isLeaf, leaf } from '../types.ts';
import { PriorityQueue } from './PriorityQueue.ts';

/**
 * Build a code tree from symbol counts
 *
 * Leaves enter the queue in ascending symbol order, which fixes the tie-break
 * for equal weights. A table with a single non-zero count yields a leaf root.
 */
export function buildCodeTree(counts: ArrayLike<number>): HuffNode {
  const queue = new PriorityQueue();
  for (let symbol = 0; symbol < counts.length; symbol++) {
    if (counts[symbol] > 0) queue.push(leaf(symbol, counts[symbol]));
  }

  while (queue.size() > 1) {
    const left = queue.pop();
    const right = queue.pop();
    if (!left || !right) break;
    queue.push(internal(left, right));
  }

  const root = queue.pop();
  if (!root) throw new Error('Cannot build a code tree without symbols');
  return root;
}

/**
 * Number of leaves under a node
 */
export function countLeaves(node: HuffNode): number {
  return isLeaf(node) ? 1 : countLeaves(node.left) + countLeaves(node.right);
}
