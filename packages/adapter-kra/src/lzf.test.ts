import { describe, it, expect } from 'vitest';
import { LzfDecodeError } from './errors';
import { lzfDecompress } from './lzf';
import { lzfCompress } from './test-helpers';

function decodeError(fn: () => unknown): LzfDecodeError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LzfDecodeError) return err;
    throw err;
  }
  throw new Error('expected LzfDecodeError');
}

describe('lzfDecompress', () => {
  describe('literal runs', () => {
    it('should copy control + 1 bytes verbatim', () => {
      const out = lzfDecompress(new Uint8Array([2, 10, 20, 30]), 3);
      expect(Array.from(out)).toEqual([10, 20, 30]);
    });

    it('should decode a full 32-byte literal run', () => {
      const payload = Array.from({ length: 32 }, (_, i) => i * 3);
      const out = lzfDecompress(new Uint8Array([31, ...payload]), 32);
      expect(Array.from(out)).toEqual(payload);
    });

    it('should return fewer bytes than expected for a short stream', () => {
      const out = lzfDecompress(new Uint8Array([1, 9, 9]), 10);
      expect(out.length).toBe(2);
      expect(Array.from(out)).toEqual([9, 9]);
    });

    it('should return an empty buffer for empty input', () => {
      expect(lzfDecompress(new Uint8Array(0), 16).length).toBe(0);
    });
  });

  describe('back-references', () => {
    it('should repeat a byte through an overlapping reference', () => {
      // literal [7], then copy 3 bytes from distance 1
      const out = lzfDecompress(new Uint8Array([0, 7, 0x20, 0x00]), 4);
      expect(Array.from(out)).toEqual([7, 7, 7, 7]);
    });

    it('should add the extra length byte when the length field is saturated', () => {
      // 0xe0: length field 7 -> 6 + 3 extra = 9, copies 12 bytes
      const out = lzfDecompress(new Uint8Array([0, 5, 0xe0, 3, 0x00]), 13);
      expect(out.length).toBe(13);
      expect(out.every((b) => b === 5)).toBe(true);
    });

    it('should subtract the low offset byte from the reference position', () => {
      // literal [1, 2, 3], then copy 3 bytes starting 3 back
      const out = lzfDecompress(new Uint8Array([2, 1, 2, 3, 0x20, 0x02]), 6);
      expect(Array.from(out)).toEqual([1, 2, 3, 1, 2, 3]);
    });

    it('should replicate a two-byte pattern with overlap', () => {
      // literal [4, 9], then copy 4 bytes from distance 2
      const out = lzfDecompress(new Uint8Array([1, 4, 9, 0x40, 0x01]), 6);
      expect(Array.from(out)).toEqual([4, 9, 4, 9, 4, 9]);
    });
  });

  describe('end of input', () => {
    it('should stop after the bytes left in a literal run cut short', () => {
      const out = lzfDecompress(new Uint8Array([5, 1, 2]), 16);
      expect(Array.from(out)).toEqual([1, 2]);
    });

    it('should decode a 12-byte literal run given only 11 bytes', () => {
      const out = lzfDecompress(Uint8Array.from([11, ...new Array<number>(11).fill(0)]), 64 * 64 * 4);
      expect(out.length).toBe(11);
      expect(out.every((byte) => byte === 0)).toBe(true);
    });
  });

  describe('errors', () => {
    it('should reject a reference before the start of output', () => {
      const err = decodeError(() => lzfDecompress(new Uint8Array([0x20, 0x00]), 8));
      expect(err.code).toBe('invalid-reference');
      expect(err.inputOffset).toBe(0);
    });

    it('should reject a reference whose low byte reaches past the start', () => {
      const err = decodeError(() => lzfDecompress(new Uint8Array([0, 1, 0x20, 0x05]), 8));
      expect(err.code).toBe('invalid-reference');
      expect(err.inputOffset).toBe(2);
    });

    it('should reject a literal run that overflows the output', () => {
      const err = decodeError(() => lzfDecompress(new Uint8Array([2, 1, 2, 3]), 2));
      expect(err.code).toBe('overflow');
    });

    it('should reject a back-reference that overflows the output', () => {
      const err = decodeError(() => lzfDecompress(new Uint8Array([0, 7, 0x20, 0x00]), 3));
      expect(err.code).toBe('overflow');
    });

    it('should still check the output size of a literal run cut short by the end of input', () => {
      const err = decodeError(() => lzfDecompress(new Uint8Array([5, 1, 2, 3]), 2));
      expect(err.code).toBe('overflow');
    });

    it('should reject a back-reference missing its offset byte', () => {
      const err = decodeError(() => lzfDecompress(new Uint8Array([0, 7, 0x20]), 16));
      expect(err.code).toBe('truncated');
    });

    it('should reject a saturated back-reference missing its length byte', () => {
      const err = decodeError(() => lzfDecompress(new Uint8Array([0, 7, 0xe0]), 16));
      expect(err.code).toBe('truncated');
    });
  });

  describe('round trip with the reference compressor', () => {
    const samples: Record<string, Uint8Array> = {
      'all zeros': new Uint8Array(4096),
      'repeating pattern': Uint8Array.from({ length: 1000 }, (_, i) => i % 7),
      'ramp': Uint8Array.from({ length: 300 }, (_, i) => i & 0xff),
      'long run after noise': Uint8Array.from({ length: 2048 }, (_, i) =>
        i < 100 ? (i * 37) & 0xff : 200,
      ),
      'tiny': new Uint8Array([42, 42]),
    };

    for (const [name, original] of Object.entries(samples)) {
      it(`should reproduce ${name}`, () => {
        const compressed = lzfCompress(original);
        const out = lzfDecompress(compressed, original.length);
        expect(out.length).toBe(original.length);
        expect(Buffer.from(out).equals(Buffer.from(original))).toBe(true);
      });
    }

    it('should compress repetitive data', () => {
      expect(lzfCompress(new Uint8Array(4096)).length).toBeLessThan(100);
    });
  });
});
