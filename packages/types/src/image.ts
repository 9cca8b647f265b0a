/**
 * @module image
 * Pixel buffers produced by layer extraction.
 */

import type { Bounds, ColorMode } from './common';

/**
 * Interleaved, row-major, tightly packed pixels.
 * RGBA: 4 bytes per pixel. RGBA16: 8 bytes per pixel, each channel two bytes
 * in the byte order Krita stores them.
 */
export interface RawImageBuffer {
  data: Uint8Array;
  /** Width in pixels. */
  width: number;
  /** Height in pixels. */
  height: number;
  colorMode: ColorMode;
  /** Placement on the canvas, including the layer's x/y offset. */
  bounds: Bounds;
}

/** Options for {@link RawImageBuffer} extraction. */
export interface ExtractOptions {
  /** Trim to the bounding box of pixels with non-zero alpha (default: true). */
  crop: boolean;
}
