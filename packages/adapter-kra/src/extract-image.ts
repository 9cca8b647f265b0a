/**
 * @module extract-image
 * Pixel extraction for paint layers.
 *
 * Extraction never mutates the layer: tiles are decoded afresh on every
 * call and the cropped bounds are returned with the image.
 */

import type { ExtractOptions, Layer, RawImageBuffer } from '@kra-decoder/types';
import { cropImage } from './crop';
import { KraExtractError } from './errors';
import { bytesPerChannel, composeTiles } from './plane-reassembler';

/** Default extraction options. */
const DEFAULT_OPTIONS: ExtractOptions = {
  crop: true,
};

/**
 * Decode a paint layer into an interleaved RGBA / RGBA16 buffer.
 *
 * @param layer - The layer to extract. Only paint layers own tiles.
 * @param options - Extraction options (partial, merged with defaults).
 * @returns Pixels plus their canvas bounds, offset by the layer's x/y.
 * @throws {KraExtractError} `not-raster` for layers without tiles,
 *   `corrupt-tile` when a tile fails to decode, `pixel-size-mismatch` when
 *   the tile stream disagrees with the layer's colour mode, `layer-too-large`
 *   when the tile bounds are too big to compose.
 */
export function extractLayerImage(layer: Layer, options?: Partial<ExtractOptions>): RawImageBuffer {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  if (layer.type !== 'paint') {
    throw new KraExtractError(
      'not-raster',
      `Layer "${layer.name}" is a ${layer.type} layer and has no pixel data`,
    );
  }

  const composed = composeTiles(layer);
  const left = layer.bounds.left + layer.x;
  const top = layer.bounds.top + layer.y;

  if (!opts.crop) {
    return {
      data: composed.data,
      width: composed.width,
      height: composed.height,
      colorMode: layer.colorMode,
      bounds: { left, top, right: left + composed.width, bottom: top + composed.height },
    };
  }

  const cropped = cropImage(composed, bytesPerChannel(layer.colorMode));
  const croppedLeft = left + cropped.offsetX;
  const croppedTop = top + cropped.offsetY;
  return {
    data: cropped.data,
    width: cropped.width,
    height: cropped.height,
    colorMode: layer.colorMode,
    bounds: {
      left: croppedLeft,
      top: croppedTop,
      right: croppedLeft + cropped.width,
      bottom: croppedTop + cropped.height,
    },
  };
}
