/**
 * Huffman codec tests
 */

import assert from 'assert';
import {
  BitReader,
  BitWriter,
  buildCodeTree,
  type CodeTable,
  compress,
  compressSync,
  createHuffDecoder,
  createHuffEncoder,
  DEBUG_LOW,
  decodeHuffman,
  EOF_SYMBOL,
  decompress,
  decompressSync,
  HUFF_MAGIC,
  HuffError,
  type HuffErrorKind,
  isHuffCompressed,
  makeCodings,
  NUM_SYMBOLS,
  readTreeHeader,
  writeCode,
  writeTreeHeader,
} from '../../src/index.ts';

const AAB_COMPRESSED = [0xfa, 0xce, 0x82, 0x01, 0x4c, 0x29, 0x8b, 0x00, 0x2c];
const EMPTY_COMPRESSED = [0xfa, 0xce, 0x82, 0x01, 0xc0, 0x00];

function pseudoRandomBytes(length: number, seed: number): Buffer {
  const out = Buffer.alloc(length);
  let state = seed;
  for (let i = 0; i < length; i++) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    out[i] = state >>> 24;
  }
  return out;
}

// Writes a stream by hand from a tree built from `counts`
function encodeWithCounts(counts: Uint32Array, symbols: number[]): Buffer {
  const root = buildCodeTree(counts);
  const codings: CodeTable = makeCodings(root);
  const writer = new BitWriter();
  writer.writeBits(32, HUFF_MAGIC);
  writeTreeHeader(root, writer);
  for (const symbol of [...symbols, EOF_SYMBOL]) {
    const code = codings[symbol];
    if (!code) throw new Error(`No code for ${symbol}`);
    writeCode(code, writer);
  }
  writer.close();
  return writer.toBuffer();
}

function isHuffError(kind: HuffErrorKind): (err: unknown) => boolean {
  return (err) => err instanceof HuffError && err.code === kind;
}

describe('Huffman codec', () => {
  describe('compressSync', () => {
    it('should emit magic, tree header and codes for "aab"', () => {
      assert.deepEqual([...compressSync(Buffer.from('aab'))], AAB_COMPRESSED);
    });

    it('should emit only magic and a single-leaf header for empty input', () => {
      assert.deepEqual([...compressSync(Buffer.from([]))], EMPTY_COMPRESSED);
    });

    it('should encode the body as concatenated codes ending with EOF', () => {
      const reader = new BitReader(Buffer.from(AAB_COMPRESSED));
      assert.equal(reader.readBits(32), HUFF_MAGIC);
      assert.equal(readTreeHeader(reader).ok, true);
      // 97 -> 0, 97 -> 0, 98 -> 10, EOF -> 11
      assert.equal(reader.readBits(6), 0b001011);
      assert.equal(reader.remaining(), 2);
    });

    it('should be deterministic', () => {
      const input = pseudoRandomBytes(2000, 7);
      assert.deepEqual(compressSync(input), compressSync(input));
    });

    it('should shrink skewed input', () => {
      const input = Buffer.from('a'.repeat(1000) + 'b'.repeat(10));
      assert.ok(compressSync(input).length < 200);
    });
  });

  describe('round trip', () => {
    const cases: Record<string, Buffer> = {
      empty: Buffer.from([]),
      'single byte': Buffer.from([0]),
      'one repeated symbol': Buffer.from('zzzzzzzzzz'),
      text: Buffer.from('she sells sea shells by the sea shore'),
      'every byte value': Buffer.from(Array.from({ length: 256 }, (_, i) => i)),
      'pseudo-random bytes': pseudoRandomBytes(5000, 42),
    };

    for (const name of Object.keys(cases)) {
      it(`should restore ${name}`, () => {
        const input = cases[name];
        assert.deepEqual(decompressSync(compressSync(input)), input);
      });
    }

    it('should decode codes longer than 32 bits', () => {
      // Fibonacci counts for symbols 0..32 give a 33-deep chain
      const counts = new Uint32Array(NUM_SYMBOLS);
      let a = 1;
      let b = 2;
      for (let i = 0; i < 33; i++) {
        counts[i] = a;
        [a, b] = [b, a + b];
      }
      counts[EOF_SYMBOL] = 1;
      const symbols = [0, 32, 1, 0, 16];
      assert.deepEqual([...decompressSync(encodeWithCounts(counts, symbols))], symbols);
    });

    it('should accept Uint8Array input', () => {
      const input = new Uint8Array([1, 2, 3, 3, 3]);
      assert.deepEqual([...decompressSync(compressSync(input))], [1, 2, 3, 3, 3]);
    });
  });

  describe('decodeHuffman', () => {
    it('should report the number of bytes written', () => {
      const writer = new BitWriter();
      const result = decodeHuffman(new BitReader(Buffer.from(AAB_COMPRESSED)), writer);
      assert.deepEqual(result, { ok: true, value: 3 });
      assert.equal(writer.toBuffer().toString(), 'aab');
    });

    it('should stop at EOF for empty content', () => {
      const writer = new BitWriter();
      const result = decodeHuffman(new BitReader(Buffer.from(EMPTY_COMPRESSED)), writer);
      assert.deepEqual(result, { ok: true, value: 0 });
      assert.equal(writer.toBuffer().length, 0);
    });

    it('should return the failure kind instead of throwing', () => {
      const result = decodeHuffman(new BitReader(Buffer.from('xx')), new BitWriter());
      assert.equal(result.ok, false);
      assert.equal(!result.ok && result.kind, 'BadMagic');
    });

    it('should ignore bits after the terminator', () => {
      const input = Buffer.from([...AAB_COMPRESSED, 0xff, 0xff]);
      assert.equal(decompressSync(input).toString(), 'aab');
    });
  });

  describe('corruption detection', () => {
    it('should reject a flipped magic value', () => {
      const input = Buffer.from(AAB_COMPRESSED);
      input[0] ^= 0xff;
      assert.throws(() => decompressSync(input), isHuffError('BadMagic'));
    });

    it('should reject input shorter than the magic value', () => {
      assert.throws(() => decompressSync(Buffer.from([0xfa, 0xce, 0x82])), isHuffError('BadMagic'));
    });

    it('should reject arbitrary data', () => {
      assert.throws(() => decompressSync(Buffer.from('not a huffman file')), /Illegal header starts with 0x6e6f7420/);
    });

    it('should reject a stream truncated after the magic value', () => {
      assert.throws(() => decompressSync(Buffer.from(AAB_COMPRESSED.slice(0, 4))), isHuffError('MalformedHeader'));
    });

    it('should reject a stream truncated mid-header', () => {
      assert.throws(() => decompressSync(Buffer.from(AAB_COMPRESSED.slice(0, 6))), isHuffError('MalformedHeader'));
    });

    it('should reject a header of only internal-node bits', () => {
      const input = Buffer.concat([Buffer.from([0xfa, 0xce, 0x82, 0x01]), Buffer.alloc(200000)]);
      assert.throws(() => decompressSync(input), isHuffError('MalformedHeader'));
    });

    it('should reject a single-leaf tree without EOF', () => {
      const writer = new BitWriter();
      writer.writeBits(32, HUFF_MAGIC);
      writer.writeBits(1, 1);
      writer.writeBits(9, 65);
      writer.close();
      assert.throws(() => decompressSync(writer.toBuffer()), isHuffError('MalformedHeader'));
    });

    it('should reject a stream truncated mid-body', () => {
      assert.throws(() => decompressSync(Buffer.from(AAB_COMPRESSED.slice(0, 8))), isHuffError('TruncatedStream'));
    });

    it('should reject a longer stream with its terminator cut off', () => {
      const compressed = compressSync(pseudoRandomBytes(1000, 3));
      assert.throws(() => decompressSync(compressed.subarray(0, compressed.length - 2)), isHuffError('TruncatedStream'));
    });
  });

  describe('isHuffCompressed', () => {
    it('should detect the magic value', () => {
      assert.equal(isHuffCompressed(Buffer.from(EMPTY_COMPRESSED)), true);
      assert.equal(isHuffCompressed(Buffer.from('plain text')), false);
      assert.equal(isHuffCompressed(Buffer.from([0xfa])), false);
    });
  });

  describe('async API', () => {
    it('should round trip with promises', async () => {
      const compressed = await compress(Buffer.from('hello, hello'));
      const restored = await decompress(compressed);
      assert.equal(restored.toString(), 'hello, hello');
    });

    it('should round trip with callbacks', (done) => {
      compress(Buffer.from('aab'), (err, compressed) => {
        if (err) return done(err);
        assert.deepEqual([...(compressed ?? [])], AAB_COMPRESSED);
        decompress(compressed ?? Buffer.from([]), { debug: 0 }, (err, restored) => {
          if (err) return done(err);
          assert.equal(restored?.toString(), 'aab');
          done();
        });
      });
    });

    it('should reject bad input with a HuffError', async () => {
      await assert.rejects(decompress(Buffer.from('garbage!')), isHuffError('BadMagic'));
    });

    it('should reject a runaway tree header with a HuffError', async () => {
      const input = Buffer.concat([Buffer.from([0xfa, 0xce, 0x82, 0x01]), Buffer.alloc(200000)]);
      await assert.rejects(decompress(input), isHuffError('MalformedHeader'));
    });

    it('should pass errors to the callback', (done) => {
      decompress(Buffer.from(AAB_COMPRESSED.slice(0, 8)), (err) => {
        if (!err) return done(new Error('Expected decompress to fail'));
        assert.ok(isHuffError('TruncatedStream')(err));
        done();
      });
    });
  });

  describe('Transform streams', () => {
    function collect(stream: NodeJS.ReadWriteStream, chunks: Buffer[], callback: (err: Error | null, output?: Buffer) => void): void {
      const output: Buffer[] = [];
      stream.on('data', (chunk: Buffer) => output.push(chunk));
      stream.on('error', (err: Error) => callback(err));
      stream.on('end', () => callback(null, Buffer.concat(output)));
      for (const chunk of chunks) stream.write(chunk);
      stream.end();
    }

    it('should compress and decompress across chunks', (done) => {
      collect(createHuffEncoder(), [Buffer.from('aa'), Buffer.from('b')], (err, compressed) => {
        if (err) return done(err);
        assert.deepEqual([...(compressed ?? [])], AAB_COMPRESSED);
        collect(createHuffDecoder(), [Buffer.from(AAB_COMPRESSED.slice(0, 5)), Buffer.from(AAB_COMPRESSED.slice(5))], (err, restored) => {
          if (err) return done(err);
          assert.equal(restored?.toString(), 'aab');
          done();
        });
      });
    });

    it('should emit an error for bad input', (done) => {
      collect(createHuffDecoder(), [Buffer.from('not huffman')], (err) => {
        if (!err) return done(new Error('Expected decoder to fail'));
        assert.ok(isHuffError('BadMagic')(err));
        done();
      });
    });
  });

  describe('debug logging', () => {
    it('should log a summary at DEBUG_LOW', () => {
      const lines: string[] = [];
      const original = console.log;
      console.log = (message: string) => lines.push(message);
      try {
        compressSync(Buffer.from('aab'), { debug: DEBUG_LOW });
        decompressSync(Buffer.from(AAB_COMPRESSED), { debug: 0 });
      } finally {
        console.log = original;
      }
      assert.deepEqual(lines, ['[huff] compressed: 48 bits read, 70 bits written']);
    });
  });
});
