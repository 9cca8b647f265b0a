/**
 * @module crop
 * Trims a composed layer buffer to the pixels that carry any alpha.
 */

/** Interleaved pixels with their geometry. */
export interface PixelBuffer {
  data: Uint8Array;
  width: number;
  height: number;
  /** Bytes per pixel. */
  pixelSize: number;
}

/** Region of a buffer in pixel coordinates. */
export interface PixelRegion {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** A cropped buffer and where it sat in the source. */
export interface CroppedBuffer extends PixelBuffer {
  /** Offset of the crop within the source buffer. */
  offsetX: number;
  offsetY: number;
}

/**
 * Find the smallest region holding every pixel with alpha > 0.
 *
 * Alpha is the fourth channel, `channelBytes` wide; a pixel counts when any
 * of those bytes is non-zero.
 *
 * @returns The region, or null when no pixel has alpha.
 */
export function findOpaqueBounds(image: PixelBuffer, channelBytes: number): PixelRegion | null {
  const { data, width, height, pixelSize } = image;
  const alphaOffset = channelBytes * 3;

  let minX = width;
  let minY = height;
  let maxX = -1;
  let maxY = -1;

  for (let y = 0; y < height; y++) {
    const rowStart = y * width * pixelSize;
    for (let x = 0; x < width; x++) {
      const alpha = rowStart + x * pixelSize + alphaOffset;
      let painted = false;
      for (let b = 0; b < channelBytes; b++) {
        if (data[alpha + b] > 0) {
          painted = true;
          break;
        }
      }
      if (!painted) continue;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }

  if (maxX < 0) return null;
  return { x: minX, y: minY, width: maxX + 1 - minX, height: maxY + 1 - minY };
}

/**
 * Crop to the pixels with alpha > 0.
 * A buffer without any such pixel yields a 0x0 result at offset (0, 0).
 */
export function cropImage(image: PixelBuffer, channelBytes: number): CroppedBuffer {
  const region = findOpaqueBounds(image, channelBytes);
  if (!region) {
    return { data: new Uint8Array(0), width: 0, height: 0, pixelSize: image.pixelSize, offsetX: 0, offsetY: 0 };
  }

  const { pixelSize } = image;
  const rowBytes = region.width * pixelSize;
  const output = new Uint8Array(rowBytes * region.height);

  for (let row = 0; row < region.height; row++) {
    const source = ((region.y + row) * image.width + region.x) * pixelSize;
    output.set(image.data.subarray(source, source + rowBytes), row * rowBytes);
  }

  return {
    data: output,
    width: region.width,
    height: region.height,
    pixelSize,
    offsetX: region.x,
    offsetY: region.y,
  };
}
