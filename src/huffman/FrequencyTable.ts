import { type BitReader, END_OF_STREAM } from '../bits/BitReader.ts';
import { BITS_PER_WORD, EOF_SYMBOL, NUM_SYMBOLS } from '../types.ts';

/**
 * Count every 8-bit word until the reader runs dry
 * @returns counts indexed by symbol; EOF_SYMBOL is always exactly 1
 */
export function collectCounts(reader: BitReader): Uint32Array {
  const counts = new Uint32Array(NUM_SYMBOLS);
  for (;;) {
    const value = reader.readBits(BITS_PER_WORD);
    if (value === END_OF_STREAM) break;
    counts[value]++;
  }
  counts[EOF_SYMBOL] = 1;
  return counts;
}

