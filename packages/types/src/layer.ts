/**
 * @module layer
 * Layer type definitions for a decoded Krita document.
 * Layers form a tree with GroupLayer as branch nodes; masks hang off
 * the layer that owns them.
 */

import type { Bounds, ColorMode, KritaBlendMode } from './common';

/** Discriminator for layer variants. */
export type LayerType =
  | 'paint'
  | 'group'
  | 'clone'
  | 'vector'
  | 'fill'
  | 'file'
  | 'filter'
  | 'transform-mask'
  | 'filter-mask'
  | 'transparency-mask'
  | 'colorize-mask'
  | 'selection-mask';

/** Properties shared by every layer and mask. */
export interface BaseLayer {
  /** Layer variant discriminator. */
  type: LayerType;
  /** Display name. */
  name: string;
  /** UUID from the document, braces included as Krita writes them. */
  uuid: string;
  /** Whether the layer is visible. */
  visible: boolean;
  /** Placement offset applied on extraction. */
  x: number;
  y: number;
  /** Tile-space extents of the pixel content. Zero-area for layers without tiles. */
  bounds: Bounds;
}

/** Properties of layers that composite with a blend mode. */
export interface CompositeLayer extends BaseLayer {
  /** Opacity from 0 (transparent) to 255 (opaque). */
  opacity: number;
  /** Whether the layer is collapsed in the layer docker. */
  collapsed: boolean;
  /** Colour label index (0 = none). */
  colorLabel: number;
  blendMode: KritaBlendMode;
  /** Masks attached to this layer, in document order. */
  masks: MaskLayer[];
}

/** A single compressed tile of a paint layer. */
export interface Tile {
  /** Left edge on the tile grid, in pixels. */
  readonly left: number;
  /** Top edge on the tile grid, in pixels. */
  readonly top: number;
  /** Stored bytes: an LZF stream or raw planar pixels. */
  readonly data: Uint8Array;
  readonly storage: 'lzf' | 'raw';
}

/** A raster layer backed by a tile stream. */
export interface PaintLayer extends CompositeLayer {
  type: 'paint';
  colorMode: ColorMode;
  /** Entry name under `<image>/layers/` holding the tile stream. */
  fileName: string;
  tileStreamVersion: number;
  tileWidth: number;
  tileHeight: number;
  /** Bytes per pixel (4 for RGBA, 8 for RGBA16). */
  pixelSize: number;
  tiles: Tile[];
}

/** A group that contains child layers. */
export interface GroupLayer extends CompositeLayer {
  type: 'group';
  /** Ordered child layers, as listed in the document. */
  children: Layer[];
  /** Whether children blend with layers outside the group. */
  passThrough: boolean;
}

/** A layer that renders another layer's content. */
export interface CloneLayer extends CompositeLayer {
  type: 'clone';
  /** UUID the clone was declared against. */
  cloneFromUuid: string;
  /** The resolved target layer. */
  target: Layer;
}

export interface VectorLayer extends CompositeLayer {
  type: 'vector';
}

/** Generated fill (pattern, gradient, colour). */
export interface FillLayer extends CompositeLayer {
  type: 'fill';
  generatorName: string;
}

/** Layer referencing an external image file. */
export interface FileLayer extends CompositeLayer {
  type: 'file';
  /** Path of the referenced file. */
  source: string;
  /** Colour space of the referenced file (not restricted to RGBA). */
  colorSpaceName: string;
}

/** Adjustment layer applying a filter to the layers below. */
export interface FilterLayer extends CompositeLayer {
  type: 'filter';
  filterName: string;
}

export interface TransformMask extends BaseLayer {
  type: 'transform-mask';
}

export interface FilterMask extends BaseLayer {
  type: 'filter-mask';
  filterName: string;
}

export interface TransparencyMask extends BaseLayer {
  type: 'transparency-mask';
}

export interface ColorizeMask extends BaseLayer {
  type: 'colorize-mask';
}

/** Local selection. Never contributes renderable content. */
export interface SelectionMask extends BaseLayer {
  type: 'selection-mask';
}

/** Union of all mask variants. */
export type MaskLayer = TransformMask | FilterMask | TransparencyMask | ColorizeMask | SelectionMask;

/** Union of all non-mask layer variants. */
export type NodeLayer =
  | PaintLayer
  | GroupLayer
  | CloneLayer
  | VectorLayer
  | FillLayer
  | FileLayer
  | FilterLayer;

/** Union type for every layer and mask variant. */
export type Layer = NodeLayer | MaskLayer;
