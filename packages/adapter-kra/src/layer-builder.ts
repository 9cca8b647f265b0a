/**
 * @module layer-builder
 * Builds the layer tree from the `<layers>` element of `maindoc.xml`.
 *
 * Clone layers are emitted as placeholders holding the target UUID; the
 * target may appear later in the document, so they are only resolved once
 * the whole tree exists (see {@link resolveClones}).
 */

import type {
  Bounds,
  CloneLayer,
  ColorMode,
  CompositeLayer,
  GroupLayer,
  ImportIssue,
  LayerType,
  MaskLayer,
  NodeLayer,
  PaintLayer,
} from '@kra-decoder/types';
import { KritaBlendMode } from '@kra-decoder/types';
import { parseBlendMode } from './blend-mode';
import type { ContainerReader } from './container';
import { KraDocumentError, KraFormatError } from './errors';
import type { TileStream } from './tile-stream';
import { parseTileStream } from './tile-stream';
import type { XmlElement } from './xml';
import { findChild, readAttribute, readBool, readInt, readString } from './xml';

/** A clone layer whose target has not been looked up yet. */
export interface CloneLayerPlaceholder extends Omit<CloneLayer, 'type' | 'target'> {
  type: 'clone-placeholder';
}

/** A group whose children may still contain placeholders. */
export interface DraftGroup extends Omit<GroupLayer, 'children'> {
  children: DraftLayer[];
}

/** A layer as built, before clone resolution. */
export type DraftLayer =
  | Exclude<NodeLayer, GroupLayer | CloneLayer>
  | DraftGroup
  | CloneLayerPlaceholder;

/** Shared state for one tree build. */
export interface BuildContext {
  container: ContainerReader;
  /** Image name; layer data lives under `<imageName>/layers/`. */
  imageName: string;
  /** Accumulated import issues. */
  issues: ImportIssue[];
  /** Number of layer elements left out of the tree. */
  skippedLayerCount: number;
}

type CompositeFields = Omit<CompositeLayer, 'type'>;

/** `nodetype` values for layers. Krita's own names are accepted as aliases. */
const LAYER_NODE_TYPES: Record<string, LayerType> = {
  paintlayer: 'paint',
  grouplayer: 'group',
  clonelayer: 'clone',
  vectorlayer: 'vector',
  shapelayer: 'vector',
  filllayer: 'fill',
  generatorlayer: 'fill',
  filelayer: 'file',
  filterlayer: 'filter',
  adjustmentlayer: 'filter',
};

/** `nodetype` values for masks. */
const MASK_NODE_TYPES: Record<string, MaskLayer['type']> = {
  transformmask: 'transform-mask',
  filtermask: 'filter-mask',
  transparencymask: 'transparency-mask',
  colorizemask: 'colorize-mask',
  selectionmask: 'selection-mask',
};

function emptyBounds(): Bounds {
  return { left: 0, top: 0, right: 0, bottom: 0 };
}

/**
 * Build the layers listed under a `<layers>` element, recursing into groups.
 * Elements that cannot be turned into a layer are skipped and reported.
 *
 * @param layersElement - A `<layers>` element.
 * @param context - Build state shared across the recursion.
 * @returns Draft layers in document order.
 * @throws {KraDocumentError} On an unsupported colour space or a malformed tile stream.
 */
export function buildLayerForest(layersElement: XmlElement, context: BuildContext): DraftLayer[] {
  const layers: DraftLayer[] = [];
  for (const element of layersElement.children) {
    const layer = buildLayer(element, context);
    if (layer) {
      layers.push(layer);
    } else {
      context.skippedLayerCount++;
    }
  }
  return layers;
}

function buildLayer(element: XmlElement, context: BuildContext): DraftLayer | null {
  const nodeType = readString(element, 'nodetype', '');
  const name = readString(element, 'name', '');
  const type = LAYER_NODE_TYPES[nodeType];

  if (type === undefined) {
    const isMask = MASK_NODE_TYPES[nodeType] !== undefined;
    context.issues.push({
      severity: isMask ? 'warning' : 'info',
      message: isMask
        ? `Mask "${nodeType}" outside a <masks> element skipped`
        : `Unknown node type "${nodeType}" skipped`,
      layerName: name,
      feature: 'node-type',
    });
    return null;
  }

  const fields = readCompositeFields(element, context);

  switch (type) {
    case 'paint':
      return buildPaintLayer(element, fields, context);
    case 'group': {
      const childList = findChild(element, 'layers');
      const children = childList ? buildLayerForest(childList, context) : [];
      return {
        ...fields,
        type: 'group',
        children,
        passThrough: readBool(element, 'passthrough', false),
      };
    }
    case 'clone':
      return {
        ...fields,
        type: 'clone-placeholder',
        cloneFromUuid: readString(element, 'clonefromuuid', ''),
      };
    case 'vector':
      return { ...fields, type: 'vector' };
    case 'fill':
      return { ...fields, type: 'fill', generatorName: readString(element, 'generatorname', '') };
    case 'file':
      return {
        ...fields,
        type: 'file',
        source: readString(element, 'source', ''),
        colorSpaceName: readString(element, 'colorspacename', ''),
      };
    case 'filter':
      return { ...fields, type: 'filter', filterName: readString(element, 'filtername', '') };
    default:
      return null;
  }
}

function buildPaintLayer(
  element: XmlElement,
  fields: CompositeFields,
  context: BuildContext,
): PaintLayer | null {
  const colorSpaceName = readString(element, 'colorspacename', 'RGBA');
  if (!isSupportedColorMode(colorSpaceName)) {
    throw new KraDocumentError(
      'unsupported-color-mode',
      `Layer "${fields.name}" uses unsupported colour space "${colorSpaceName}"`,
    );
  }

  const fileName = readAttribute(element, 'filename');
  if (!fileName) {
    context.issues.push({
      severity: 'warning',
      message: 'Paint layer has no filename attribute',
      layerName: fields.name,
      feature: 'layer-data',
    });
    return null;
  }

  const path = `${context.imageName}/layers/${fileName}`;
  if (!context.container.hasEntry(path)) {
    context.issues.push({
      severity: 'warning',
      message: `Layer data "${path}" not found in archive`,
      layerName: fields.name,
      feature: 'layer-data',
    });
    return null;
  }

  let stream: TileStream;
  try {
    stream = parseTileStream(context.container.readEntry(path));
  } catch (err) {
    if (err instanceof KraFormatError) {
      throw new KraDocumentError(
        'malformed-tile-stream',
        `Layer "${fields.name}" has a malformed tile stream: ${err.message}`,
        { cause: err },
      );
    }
    throw err;
  }

  if (!stream.bounds) {
    context.issues.push({
      severity: 'info',
      message: 'Paint layer has no tiles and was dropped',
      layerName: fields.name,
      feature: 'empty-layer',
    });
    return null;
  }

  return {
    ...fields,
    type: 'paint',
    bounds: stream.bounds,
    colorMode: colorSpaceName,
    fileName,
    tileStreamVersion: stream.version,
    tileWidth: stream.tileWidth,
    tileHeight: stream.tileHeight,
    pixelSize: stream.pixelSize,
    tiles: stream.tiles,
  };
}

function readCompositeFields(element: XmlElement, context: BuildContext): CompositeFields {
  const name = readString(element, 'name', '');
  const compositeOp = readString(element, 'compositeop', KritaBlendMode.Normal);
  let blendMode = parseBlendMode(compositeOp);
  if (blendMode === undefined) {
    context.issues.push({
      severity: 'warning',
      message: `Blend mode "${compositeOp}" not recognised, using normal`,
      layerName: name,
      feature: 'blend-mode',
    });
    blendMode = KritaBlendMode.Normal;
  }

  return {
    name,
    uuid: readString(element, 'uuid', ''),
    visible: readBool(element, 'visible', true),
    x: readInt(element, 'x', 0),
    y: readInt(element, 'y', 0),
    bounds: emptyBounds(),
    opacity: readInt(element, 'opacity', 255),
    collapsed: readBool(element, 'collapsed', false),
    colorLabel: readInt(element, 'colorlabel', 0),
    blendMode,
    masks: buildMasks(element, context),
  };
}

function buildMasks(element: XmlElement, context: BuildContext): MaskLayer[] {
  const list = findChild(element, 'masks');
  if (!list) return [];

  const masks: MaskLayer[] = [];
  for (const child of list.children) {
    const mask = buildMask(child, context);
    if (mask) {
      masks.push(mask);
    } else {
      context.skippedLayerCount++;
    }
  }
  return masks;
}

function buildMask(element: XmlElement, context: BuildContext): MaskLayer | null {
  const nodeType = readString(element, 'nodetype', '');
  const type = MASK_NODE_TYPES[nodeType];
  const base = {
    name: readString(element, 'name', ''),
    uuid: readString(element, 'uuid', ''),
    visible: readBool(element, 'visible', true),
    x: readInt(element, 'x', 0),
    y: readInt(element, 'y', 0),
    bounds: emptyBounds(),
  };

  switch (type) {
    case 'filter-mask':
      return { ...base, type, filterName: readString(element, 'filtername', '') };
    case 'transform-mask':
    case 'transparency-mask':
    case 'colorize-mask':
    case 'selection-mask':
      return { ...base, type };
    default:
      context.issues.push({
        severity: 'info',
        message: `Unknown mask type "${nodeType}" skipped`,
        layerName: base.name,
        feature: 'node-type',
      });
      return null;
  }
}

/** Whether a `colorspacename` is one of the supported colour modes. */
export function isSupportedColorMode(value: string): value is ColorMode {
  return value === 'RGBA' || value === 'RGBA16';
}
