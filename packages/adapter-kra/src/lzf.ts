/**
 * @module lzf
 * Decoder for the LZF variant Krita uses to compress tile data.
 *
 * Stream layout, one instruction per control byte `c`:
 * - `c < 32`: literal run, the next `c + 1` bytes are copied verbatim.
 * - otherwise: back-reference. Bits 7-5 hold `length - 2` (7 means an extra
 *   length byte follows and is added), bits 4-0 the high bits of
 *   `distance - 1` and the following byte its low byte.
 *
 * @see http://oldhome.schmorp.de/marc/liblzf.html
 */

import { LzfDecodeError } from './errors';

/**
 * Decompress an LZF stream.
 *
 * @param input - Compressed bytes. Every byte is consumed.
 * @param expectedLength - Capacity of the output; writing past it fails.
 * @returns The decoded bytes. May be shorter than `expectedLength`.
 * @throws {LzfDecodeError} On overflow, a reference before the start of the
 *   output, or a back-reference missing its length or offset byte.
 */
export function lzfDecompress(input: Uint8Array, expectedLength: number): Uint8Array {
  const output = new Uint8Array(expectedLength);
  const inputEnd = input.length;
  let ip = 0;
  let op = 0;

  while (ip < inputEnd) {
    const start = ip;
    const control = input[ip++];
    const ctrl = control + 1;

    if (ctrl < 33) {
      // A run cut short by the end of input copies what is left.
      const run = Math.min(ctrl, inputEnd - ip);
      if (op + run > expectedLength) {
        throw new LzfDecodeError(
          'overflow',
          `Literal run of ${run} bytes overflows output of ${expectedLength} bytes`,
          start,
        );
      }
      output.set(input.subarray(ip, ip + run), op);
      ip += run;
      op += run;
      continue;
    }

    let len = (control >> 5) - 1;
    let ref = op - ((control & 31) << 8) - 1;

    if (len === 6) {
      if (ip >= inputEnd) {
        throw new LzfDecodeError('truncated', `Missing length byte at input ${ip}`, start);
      }
      len += input[ip++];
    }
    if (ip >= inputEnd) {
      throw new LzfDecodeError('truncated', `Missing offset byte at input ${ip}`, start);
    }
    ref -= input[ip++];

    if (ref < 0) {
      throw new LzfDecodeError(
        'invalid-reference',
        `Back-reference to ${ref} at input ${start} points before the start of output`,
        start,
      );
    }
    if (op + len + 3 > expectedLength) {
      throw new LzfDecodeError(
        'overflow',
        `Back-reference of ${len + 3} bytes overflows output of ${expectedLength} bytes`,
        start,
      );
    }

    // Byte-by-byte: source and destination may overlap.
    for (let n = len + 3; n > 0; n--) {
      output[op++] = output[ref++];
    }
  }

  return output.subarray(0, op);
}
