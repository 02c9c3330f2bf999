/**
 * Bit Writer
 *
 * Packs MSB-first bit fields into bytes. Full blocks are handed to the sink
 * as they fill; without a sink they are kept for toBuffer().
 */

import { BITS_PER_INT, type OutputSink } from '../types.ts';

const BLOCK_SIZE = 1 << 16;

export class BitWriter {
  private sink: OutputSink | null;
  private chunks: Buffer[];
  private block: Buffer;
  private blockPos: number;
  private current: number;
  private currentBits: number;
  private closed: boolean;
  private _bitsWritten: number;

  constructor(sink?: OutputSink) {
    this.sink = sink ?? null;
    this.chunks = [];
    this.block = Buffer.alloc(BLOCK_SIZE);
    this.blockPos = 0;
    this.current = 0;
    this.currentBits = 0;
    this.closed = false;
    this._bitsWritten = 0;
  }

  /** Total bits written, excluding padding */
  get bitsWritten(): number {
    return this._bitsWritten;
  }

  /**
   * Write the low `count` bits of `value`, most significant first
   */
  writeBits(count: number, value: number): void {
    if (this.closed) throw new Error('BitWriter is closed');
    if (count < 0 || count > BITS_PER_INT) {
      throw new RangeError(`Cannot write ${count} bits`);
    }
    for (let i = count - 1; i >= 0; i--) {
      this.current = (this.current << 1) | ((value >>> i) & 1);
      if (++this.currentBits === 8) {
        this.pushByte(this.current);
        this.current = 0;
        this.currentBits = 0;
      }
    }
    this._bitsWritten += count;
  }

  /**
   * Pad the last byte with zero bits and flush everything to the sink
   */
  close(): void {
    if (this.closed) return;
    if (this.currentBits > 0) {
      this.pushByte(this.current << (8 - this.currentBits));
      this.current = 0;
      this.currentBits = 0;
    }
    this.flushBlock();
    this.closed = true;
  }

  /**
   * Everything written so far (only when no sink was given). An open writer
   * must be on a byte boundary; close() first to pad the last byte.
   */
  toBuffer(): Buffer {
    if (!this.closed) {
      if (this.currentBits > 0) throw new Error(`BitWriter has ${this.currentBits} pending bits; close() before toBuffer()`);
      this.flushBlock();
    }
    return this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks);
  }

  private pushByte(byte: number): void {
    this.block[this.blockPos++] = byte & 0xff;
    if (this.blockPos === BLOCK_SIZE) this.flushBlock();
  }

  private flushBlock(): void {
    if (this.blockPos === 0) return;
    const chunk = Buffer.from(this.block.subarray(0, this.blockPos));
    this.blockPos = 0;
    if (this.sink) this.sink.write(chunk);
    else this.chunks.push(chunk);
  }
}
