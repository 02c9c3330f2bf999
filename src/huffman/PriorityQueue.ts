/**
 * Binary min-heap of code tree nodes
 *
 * Ordered by weight, then by arrival: every push takes the next sequence
 * number and the lower one wins a tie. The order is deterministic for a
 * given push sequence.
 */

import type { HuffNode } from '../types.ts';

interface Entry {
  node: HuffNode;
  seq: number;
}

function less(a: Entry, b: Entry): boolean {
  return a.node.weight < b.node.weight || (a.node.weight === b.node.weight && a.seq < b.seq);
}

export class PriorityQueue {
  private heap: Entry[];
  private nextSeq: number;

  constructor() {
    this.heap = [];
    this.nextSeq = 0;
  }

  size(): number {
    return this.heap.length;
  }

  push(node: HuffNode): void {
    const heap = this.heap;
    heap.push({ node, seq: this.nextSeq++ });

    let i = heap.length - 1;
    while (i > 0) {
      const parent = (i - 1) >>> 1;
      if (!less(heap[i], heap[parent])) break;
      [heap[i], heap[parent]] = [heap[parent], heap[i]];
      i = parent;
    }
  }

  /**
   * Remove and return the lowest node, or undefined when empty
   */
  pop(): HuffNode | undefined {
    const heap = this.heap;
    const top = heap[0];
    const last = heap.pop();
    if (top === undefined || last === undefined) return undefined;
    if (heap.length === 0) return top.node;

    heap[0] = last;
    let i = 0;
    for (;;) {
      const left = 2 * i + 1;
      const right = left + 1;
      let smallest = i;
      if (left < heap.length && less(heap[left], heap[smallest])) smallest = left;
      if (right < heap.length && less(heap[right], heap[smallest])) smallest = right;
      if (smallest === i) break;
      [heap[i], heap[smallest]] = [heap[smallest], heap[i]];
      i = smallest;
    }
    return top.node;
  }
}
