/**
 * @kra-decoder/adapter-kra
 *
 * Krita (.kra / .krz) document import.
 * Reads the layer tree from `maindoc.xml`, decodes paint-layer tile streams
 * and extracts layers as interleaved RGBA pixel buffers.
 *
 * @packageDocumentation
 */

// Import
export { importKra, openKra, KRA_MIMETYPE } from './import-kra';

// Extraction
export { extractLayerImage } from './extract-image';
export { cropImage, findOpaqueBounds } from './crop';
export type { CroppedBuffer, PixelBuffer, PixelRegion } from './crop';
export { MAX_COMPOSED_BYTES, channelPermutation, composeTiles, interleaveTile } from './plane-reassembler';
export type { ComposedBuffer } from './plane-reassembler';

// Layer tree queries
export {
  countLayers,
  findLayer,
  isLayerUseful,
  isMaskLayer,
  layerCenter,
  layerHeight,
  layerWidth,
  traverseLayers,
} from './layer-tree';

// Low-level readers
export { lzfDecompress } from './lzf';
export { parseTileStream, tileBounds } from './tile-stream';
export type { TileStream } from './tile-stream';
export { createZipContainer } from './container';
export type { ContainerReader } from './container';
export { parseXml } from './xml';
export type { XmlElement } from './xml';

// Errors
export { KraDocumentError, KraExtractError, KraFormatError, LzfDecodeError } from './errors';
export type { KraDocumentErrorCode, KraExtractErrorCode, LzfDecodeErrorCode } from './errors';
