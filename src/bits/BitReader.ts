/**
 * Bit Reader
 *
 * Reads MSB-first bit fields from a buffer. End of input is reported as -1
 * rather than thrown, so callers decide which error kind it maps to.
 */

import { BITS_PER_INT } from '../types.ts';

export const END_OF_STREAM = -1;

export class BitReader {
  private input: Buffer;
  private pos: number;
  private _bitsRead: number;

  constructor(input?: Buffer | Uint8Array) {
    this.input = Buffer.alloc(0); // Replaced by setInput()
    this.pos = 0;
    this._bitsRead = 0;
    if (input) this.setInput(input);
  }

  /**
   * Set input buffer and rewind to its first bit
   */
  setInput(input: Buffer | Uint8Array): void {
    this.input = Buffer.isBuffer(input) ? input : Buffer.from(input.buffer, input.byteOffset, input.byteLength);
    this.reset();
  }

  /**
   * Restart from the beginning of the input
   */
  reset(): void {
    this.pos = 0;
  }

  /** Total bits consumed, across resets */
  get bitsRead(): number {
    return this._bitsRead;
  }

  /**
   * Bits left before end of input
   */
  remaining(): number {
    return this.input.length * 8 - this.pos;
  }

  /**
   * Read `count` bits as an unsigned integer
   * @returns value, or END_OF_STREAM if fewer than `count` bits remain
   */
  readBits(count: number): number {
    if (count < 1 || count > BITS_PER_INT) {
      throw new RangeError(`Cannot read ${count} bits`);
    }
    if (this.remaining() < count) return END_OF_STREAM;

    let value = 0;
    for (let i = 0; i < count; i++) {
      const byte = this.input[this.pos >>> 3];
      const bit = (byte >>> (7 - (this.pos & 7))) & 1;
      value = value * 2 + bit;
      this.pos++;
    }
    this._bitsRead += count;
    return value;
  }
}
