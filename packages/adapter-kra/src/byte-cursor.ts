/**
 * @module byte-cursor
 * Bounds-checked forward cursor over a tile stream.
 *
 * Tile streams mix newline-terminated ASCII lines with raw byte runs.
 * Every read checks the remaining length and throws {@link KraFormatError}
 * at the end of the buffer instead of reading past it.
 */

import { KraFormatError } from './errors';

const NEWLINE = 0x0a;

/**
 * Forward-only reader over a byte array.
 * Tracks the current read position automatically.
 */
export class ByteCursor {
  private readonly bytes: Uint8Array;
  private _offset = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /** Current read position in the buffer. */
  get offset(): number {
    return this._offset;
  }

  /** Number of bytes remaining from current position. */
  get remaining(): number {
    return this.bytes.length - this._offset;
  }

  /**
   * Read `length` bytes as a view into the underlying buffer.
   * Callers that keep the bytes beyond the buffer's lifetime should copy.
   */
  readBytes(length: number): Uint8Array {
    this.require(length);
    const view = this.bytes.subarray(this._offset, this._offset + length);
    this._offset += length;
    return view;
  }

  /**
   * Read an ASCII line up to the next newline. The newline is consumed
   * but not returned.
   */
  readLine(): string {
    const end = this.bytes.indexOf(NEWLINE, this._offset);
    if (end === -1) {
      throw new KraFormatError('Unterminated line', this._offset);
    }
    let line = '';
    for (let i = this._offset; i < end; i++) {
      line += String.fromCharCode(this.bytes[i]);
    }
    this._offset = end + 1;
    return line;
  }

  private require(length: number): void {
    if (length < 0 || length > this.remaining) {
      throw new KraFormatError(
        `Need ${length} bytes but only ${this.remaining} remain`,
        this._offset,
      );
    }
  }
}
