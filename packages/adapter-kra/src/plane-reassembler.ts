/**
 * @module plane-reassembler
 * Turns a paint layer's planar tiles into one interleaved pixel buffer.
 *
 * Krita stores each tile channel by channel (all blue bytes, then all
 * green, ...). Output is interleaved per pixel in R, G, B, A order.
 */

import type { ColorMode, PaintLayer, Tile } from '@kra-decoder/types';
import { KraExtractError, LzfDecodeError } from './errors';
import { lzfDecompress } from './lzf';

/** Bytes per channel for each supported colour mode. */
const BYTES_PER_CHANNEL: Record<ColorMode, number> = {
  RGBA: 1,
  RGBA16: 2,
};

/** Largest composed buffer, in bytes, that extraction will allocate. */
export const MAX_COMPOSED_BYTES = 2 ** 31 - 1;

/** A composed (uncropped) layer buffer covering the layer's tile bounds. */
export interface ComposedBuffer {
  data: Uint8Array;
  /** Width in pixels (tileWidth x columns). */
  width: number;
  /** Height in pixels (tileHeight x rows). */
  height: number;
  pixelSize: number;
}

/** Bytes per channel for a colour mode. */
export function bytesPerChannel(colorMode: ColorMode): number {
  return BYTES_PER_CHANNEL[colorMode];
}

/**
 * Source byte index for each output byte of a pixel.
 *
 * Starts from the identity over `0..pixelSize` and swaps the first
 * `channelBytes` entries with those at `2 * channelBytes`, turning
 * B,G,R,A into R,G,B,A.
 *
 * @example
 * channelPermutation(4, 1); // [2, 1, 0, 3]
 * channelPermutation(8, 2); // [4, 5, 2, 3, 0, 1, 6, 7]
 */
export function channelPermutation(pixelSize: number, channelBytes: number): number[] {
  const permutation = Array.from({ length: pixelSize }, (_, i) => i);
  const swapStart = channelBytes * 2;
  const count = Math.min(channelBytes, pixelSize - swapStart);
  for (let i = 0; i < count; i++) {
    const tmp = permutation[i];
    permutation[i] = permutation[swapStart + i];
    permutation[swapStart + i] = tmp;
  }
  return permutation;
}

/**
 * Interleave one planar tile.
 * @param planar - `pixelSize` planes of `tileArea` bytes each.
 * @param permutation - Source plane for each output byte of a pixel.
 * @param tileArea - Pixels in the tile.
 * @returns `tileArea * permutation.length` interleaved bytes.
 */
export function interleaveTile(planar: Uint8Array, permutation: readonly number[], tileArea: number): Uint8Array {
  const pixelSize = permutation.length;
  const output = new Uint8Array(tileArea * pixelSize);
  for (let p = 0; p < tileArea; p++) {
    const base = p * pixelSize;
    for (let k = 0; k < pixelSize; k++) {
      output[base + k] = planar[permutation[k] * tileArea + p];
    }
  }
  return output;
}

/**
 * Decode a tile's stored bytes into a full planar buffer.
 * Short output (an LZF stream that ends early) is zero-padded.
 *
 * @throws {LzfDecodeError} If the LZF stream is corrupt.
 * @throws {KraExtractError} `corrupt-tile` if raw data is longer than a tile.
 */
export function decodeTile(tile: Tile, decodedLength: number): Uint8Array {
  if (tile.storage === 'raw' && tile.data.length > decodedLength) {
    throw new KraExtractError(
      'corrupt-tile',
      `Raw tile (${tile.left}, ${tile.top}) holds ${tile.data.length} bytes, expected at most ${decodedLength}`,
    );
  }
  const decoded =
    tile.storage === 'lzf'
      ? lzfDecompress(tile.data, decodedLength)
      : tile.data.subarray(0, decodedLength);
  if (decoded.length === decodedLength) return decoded;

  const padded = new Uint8Array(decodedLength);
  padded.set(decoded);
  return padded;
}

/**
 * Compose every tile of a paint layer into one buffer spanning its bounds.
 *
 * @param layer - A paint layer with tiles and non-empty bounds.
 * @returns The composed buffer. Zero-sized when the layer has no tiles.
 * @throws {KraExtractError} `pixel-size-mismatch` when the stream's pixel
 *   size does not match the layer's colour mode, `corrupt-tile` when a
 *   tile fails to decode, `layer-too-large` when the tile bounds exceed
 *   {@link MAX_COMPOSED_BYTES}.
 */
export function composeTiles(layer: PaintLayer): ComposedBuffer {
  const { tileWidth, tileHeight, pixelSize, bounds } = layer;
  const channelBytes = bytesPerChannel(layer.colorMode);

  if (pixelSize !== channelBytes * 4) {
    throw new KraExtractError(
      'pixel-size-mismatch',
      `Layer "${layer.name}" has pixel size ${pixelSize}, expected ${channelBytes * 4} for ${layer.colorMode}`,
    );
  }

  const columns = Math.ceil((bounds.right - bounds.left) / tileWidth);
  const rows = Math.ceil((bounds.bottom - bounds.top) / tileHeight);
  const width = columns * tileWidth;
  const height = rows * tileHeight;
  const byteLength = width * height * pixelSize;
  if (byteLength > MAX_COMPOSED_BYTES) {
    throw new KraExtractError(
      'layer-too-large',
      `Layer "${layer.name}" spans ${width}x${height} pixels, more than ${MAX_COMPOSED_BYTES} bytes`,
    );
  }
  const data = new Uint8Array(byteLength);

  const tileArea = tileWidth * tileHeight;
  const decodedLength = tileArea * pixelSize;
  const rowBytes = tileWidth * pixelSize;
  const stride = width * pixelSize;
  const permutation = channelPermutation(pixelSize, channelBytes);

  for (const tile of layer.tiles) {
    let planar: Uint8Array;
    try {
      planar = decodeTile(tile, decodedLength);
    } catch (err) {
      if (err instanceof LzfDecodeError) {
        throw new KraExtractError(
          'corrupt-tile',
          `Tile (${tile.left}, ${tile.top}) of layer "${layer.name}" is corrupt: ${err.message}`,
          { cause: err },
        );
      }
      throw err;
    }

    const pixels = interleaveTile(planar, permutation, tileArea);
    const destLeft = (tile.left - bounds.left) * pixelSize;
    const destTop = tile.top - bounds.top;

    for (let row = 0; row < tileHeight; row++) {
      const source = row * rowBytes;
      data.set(pixels.subarray(source, source + rowBytes), (destTop + row) * stride + destLeft);
    }
  }

  return { data, width, height, pixelSize };
}
