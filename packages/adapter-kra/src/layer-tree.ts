/**
 * @module layer-tree
 * Pure functions for querying a decoded layer tree.
 */

import type { KraDocument, Layer, NodeLayer, Point } from '@kra-decoder/types';

/** Width derived from the layer's bounds. */
export function layerWidth(layer: Layer): number {
  return layer.bounds.right - layer.bounds.left;
}

/** Height derived from the layer's bounds. */
export function layerHeight(layer: Layer): number {
  return layer.bounds.bottom - layer.bounds.top;
}

/** Centre of the layer's bounds, rounded down to whole pixels. */
export function layerCenter(layer: Layer): Point {
  return {
    x: layer.bounds.left + Math.floor(layerWidth(layer) / 2),
    y: layer.bounds.top + Math.floor(layerHeight(layer) / 2),
  };
}

/**
 * Whether a layer contributes renderable content.
 *
 * Groups always do and selection masks never do. A clone is useful when
 * its target is. Every other layer needs a non-empty extent.
 *
 * @param layer - The layer to inspect.
 */
export function isLayerUseful(layer: Layer): boolean {
  const seen = new Set<Layer>();
  let current = layer;
  while (current.type === 'clone') {
    // Resolution rejects cycles; the guard only protects hand-built trees.
    if (seen.has(current)) return false;
    seen.add(current);
    current = current.target;
  }

  switch (current.type) {
    case 'group':
      return true;
    case 'selection-mask':
      return false;
    default:
      return layerWidth(current) !== 0 && layerHeight(current) !== 0;
  }
}

/**
 * Depth-first, pre-order walk over layers, their masks and group children.
 * Clone targets are not followed.
 *
 * @param layers - Layers to walk.
 * @param callback - Called with each layer and its depth (0 for `layers`).
 */
export function traverseLayers(
  layers: readonly Layer[],
  callback: (layer: Layer, depth: number) => void,
  depth = 0,
): void {
  for (const layer of layers) {
    callback(layer, depth);
    if (isMaskLayer(layer)) continue;
    traverseLayers(layer.masks, callback, depth + 1);
    if (layer.type === 'group') {
      traverseLayers(layer.children, callback, depth + 1);
    }
  }
}

/**
 * Find a layer or mask anywhere in the document by UUID.
 * @returns The first match in depth-first order, or undefined.
 */
export function findLayer(document: KraDocument, uuid: string): Layer | undefined {
  return findInLayers(document.layers, uuid);
}

/** Recursively count layers and masks. */
export function countLayers(layers: readonly Layer[]): number {
  let count = 0;
  traverseLayers(layers, () => {
    count++;
  });
  return count;
}

/** Whether a layer is one of the mask variants. */
export function isMaskLayer(layer: Layer): layer is Exclude<Layer, NodeLayer> {
  return layer.type.endsWith('-mask');
}

function findInLayers(layers: readonly Layer[], uuid: string): Layer | undefined {
  for (const layer of layers) {
    if (layer.uuid === uuid) return layer;
    if (isMaskLayer(layer)) continue;
    const mask = layer.masks.find((m) => m.uuid === uuid);
    if (mask) return mask;
    if (layer.type === 'group') {
      const found = findInLayers(layer.children, uuid);
      if (found) return found;
    }
  }
  return undefined;
}
