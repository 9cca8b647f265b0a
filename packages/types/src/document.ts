/**
 * @module document
 * The decoded Krita document.
 */

import type { ColorMode } from './common';
import type { NodeLayer } from './layer';

/** A document with its full layer forest. Clone layers are already resolved. */
export interface KraDocument {
  /** Image name from `maindoc.xml`, or the file name when the image has none. */
  name: string;
  /** Canvas width in pixels. */
  width: number;
  /** Canvas height in pixels. */
  height: number;
  colorMode: ColorMode;
  /** Top-level layers in document order. */
  layers: NodeLayer[];
}
