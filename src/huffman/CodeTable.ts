import type { BitWriter } from '../bits/BitWriter.ts';
import { BITS_PER_INT, type Code, type CodeTable, type HuffNode, NUM_SYMBOLS } from '../types.ts';

function packPath(path: number[]): Code {
  const words: number[] = [];
  for (let start = 0; start < path.length; start += BITS_PER_INT) {
    const end = Math.min(start + BITS_PER_INT, path.length);
    let word = 0;
    for (let i = start; i < end; i++) word = word * 2 + path[i];
    words.push(word);
  }
  return { words, length: path.length };
}

/**
 * Derive each symbol's code from its root-to-leaf path (0 = left, 1 = right)
 *
 * A root that is itself a leaf gets the zero-length code.
 */
export function makeCodings(root: HuffNode): CodeTable {
  const codings: CodeTable = Array.from({ length: NUM_SYMBOLS }, (): Code | undefined => undefined);
  const path: number[] = [];

  const visit = (node: HuffNode): void => {
    if (node.type === 'leaf') {
      codings[node.symbol] = packPath(path);
      return;
    }
    path.push(0);
    visit(node.left);
    path[path.length - 1] = 1;
    visit(node.right);
    path.pop();
  };

  visit(root);
  return codings;
}

/**
 * Write a code of any length, at most 32 bits per call
 */
export function writeCode(code: Code, writer: BitWriter): void {
  let remaining = code.length;
  for (const word of code.words) {
    const count = Math.min(remaining, BITS_PER_INT);
    writer.writeBits(count, word);
    remaining -= count;
  }
}

/**
 * Render a code as a string of 0/1 characters (for diagnostics)
 */
export function codeToString(code: Code): string {
  let remaining = code.length;
  let out = '';
  for (const word of code.words) {
    const count = Math.min(remaining, BITS_PER_INT);
    out += word.toString(2).padStart(count, '0');
    remaining -= count;
  }
  return out;
}
