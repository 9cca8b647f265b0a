import { describe, it, expect } from 'vitest';
import { KritaBlendMode } from '@kra-decoder/types';
import { KraDocumentError } from './errors';
import type { BuildContext, DraftLayer } from './layer-builder';
import { buildLayerForest } from './layer-builder';
import { memoryContainer, writeTileStream, xmlElement } from './test-helpers';
import { parseXml } from './xml';

/** A 2x2 tile stream with one tile at (2, 4). */
const SMALL_STREAM = writeTileStream({
  tileWidth: 2,
  tileHeight: 2,
  pixelSize: 4,
  tiles: [{ left: 2, top: 4, flag: 'LZF', payload: [0, ...new Array<number>(16).fill(255)] }],
});

function build(layersXml: string, entries: Record<string, Uint8Array> = {}) {
  const context: BuildContext = {
    container: memoryContainer(entries),
    imageName: 'Picture',
    issues: [],
    skippedLayerCount: 0,
  };
  const layers = buildLayerForest(parseXml(`<layers>${layersXml}</layers>`), context);
  return { layers, context };
}

function first(layers: DraftLayer[]): DraftLayer {
  expect(layers).toHaveLength(1);
  return layers[0];
}

describe('buildLayerForest', () => {
  it('should read a paint layer and its tile stream', () => {
    const { layers, context } = build(
      xmlElement('layer', {
        nodetype: 'paintlayer',
        name: 'Ink',
        uuid: '{a}',
        filename: 'layer2',
        x: 5,
        y: 6,
        opacity: 128,
        visible: 0,
        compositeop: 'multiply',
        colorlabel: 3,
      }),
      { 'Picture/layers/layer2': SMALL_STREAM },
    );

    const layer = first(layers);
    expect(context.issues).toEqual([]);
    expect(layer.type).toBe('paint');
    if (layer.type !== 'paint') return;
    expect(layer.name).toBe('Ink');
    expect(layer.uuid).toBe('{a}');
    expect(layer.x).toBe(5);
    expect(layer.y).toBe(6);
    expect(layer.opacity).toBe(128);
    expect(layer.visible).toBe(false);
    expect(layer.blendMode).toBe(KritaBlendMode.Multiply);
    expect(layer.colorLabel).toBe(3);
    expect(layer.colorMode).toBe('RGBA');
    expect(layer.fileName).toBe('layer2');
    expect(layer.tileWidth).toBe(2);
    expect(layer.pixelSize).toBe(4);
    expect(layer.bounds).toEqual({ left: 2, top: 4, right: 4, bottom: 6 });
    expect(layer.tiles).toHaveLength(1);
    expect(layer.tiles[0].storage).toBe('raw');
  });

  it('should apply defaults for missing attributes', () => {
    const { layers } = build(xmlElement('layer', { nodetype: 'vectorlayer' }));
    const layer = first(layers);
    expect(layer.type).toBe('vector');
    expect(layer.name).toBe('');
    expect(layer.visible).toBe(true);
    if (layer.type !== 'vector') return;
    expect(layer.opacity).toBe(255);
    expect(layer.blendMode).toBe(KritaBlendMode.Normal);
    expect(layer.masks).toEqual([]);
  });

  it('should nest group children in document order', () => {
    const inner = [
      xmlElement('layer', { nodetype: 'vectorlayer', name: 'First' }),
      xmlElement('layer', { nodetype: 'filterlayer', name: 'Second', filtername: 'blur' }),
    ].join('');
    const { layers } = build(
      xmlElement('layer', { nodetype: 'grouplayer', name: 'Folder', passthrough: 1 }, `<layers>${inner}</layers>`),
    );

    const group = first(layers);
    expect(group.type).toBe('group');
    if (group.type !== 'group') return;
    expect(group.passThrough).toBe(true);
    expect(group.children.map((child) => child.name)).toEqual(['First', 'Second']);
    const filter = group.children[1];
    expect(filter.type === 'filter' && filter.filterName).toBe('blur');
  });

  it('should accept Krita node type aliases', () => {
    const { layers } = build(
      [
        xmlElement('layer', { nodetype: 'shapelayer' }),
        xmlElement('layer', { nodetype: 'generatorlayer', generatorname: 'pattern' }),
        xmlElement('layer', { nodetype: 'adjustmentlayer' }),
      ].join(''),
    );
    expect(layers.map((layer) => layer.type)).toEqual(['vector', 'fill', 'filter']);
  });

  it('should read file layer attributes', () => {
    const { layers } = build(
      xmlElement('layer', { nodetype: 'filelayer', source: 'ref.png', colorspacename: 'GRAYA' }),
    );
    const layer = first(layers);
    expect(layer.type).toBe('file');
    if (layer.type !== 'file') return;
    expect(layer.source).toBe('ref.png');
    expect(layer.colorSpaceName).toBe('GRAYA');
  });

  it('should emit a placeholder for clone layers', () => {
    const { layers } = build(xmlElement('layer', { nodetype: 'clonelayer', clonefromuuid: '{later}' }));
    const layer = first(layers);
    expect(layer.type).toBe('clone-placeholder');
    if (layer.type !== 'clone-placeholder') return;
    expect(layer.cloneFromUuid).toBe('{later}');
  });

  it('should attach masks to their layer', () => {
    const masks = [
      xmlElement('mask', { nodetype: 'transparencymask', name: 'Alpha', uuid: '{m1}' }),
      xmlElement('mask', { nodetype: 'filtermask', name: 'Levels', filtername: 'levels' }),
      xmlElement('mask', { nodetype: 'selectionmask', name: 'Sel' }),
    ].join('');
    const { layers, context } = build(
      xmlElement('layer', { nodetype: 'vectorlayer', name: 'Shapes' }, `<masks>${masks}</masks>`),
    );

    const layer = first(layers);
    if (layer.type !== 'vector') throw new Error('expected a vector layer');
    expect(layer.masks.map((mask) => mask.type)).toEqual(['transparency-mask', 'filter-mask', 'selection-mask']);
    expect(layer.masks[0].uuid).toBe('{m1}');
    const filterMask = layer.masks[1];
    expect(filterMask.type === 'filter-mask' && filterMask.filterName).toBe('levels');
    expect(context.skippedLayerCount).toBe(0);
  });

  it('should skip unknown node types with an info issue', () => {
    const { layers, context } = build(xmlElement('layer', { nodetype: 'referenceimageslayer', name: 'Refs' }));
    expect(layers).toEqual([]);
    expect(context.skippedLayerCount).toBe(1);
    expect(context.issues).toEqual([
      {
        severity: 'info',
        message: 'Unknown node type "referenceimageslayer" skipped',
        layerName: 'Refs',
        feature: 'node-type',
      },
    ]);
  });

  it('should skip unknown mask types with an info issue', () => {
    const { layers, context } = build(
      xmlElement('layer', { nodetype: 'vectorlayer' }, `<masks>${xmlElement('mask', { nodetype: 'lazymask' })}</masks>`),
    );
    const layer = first(layers);
    expect(layer.type === 'vector' && layer.masks).toEqual([]);
    expect(context.skippedLayerCount).toBe(1);
    expect(context.issues[0].message).toBe('Unknown mask type "lazymask" skipped');
  });

  it('should warn about a mask listed as a layer', () => {
    const { layers, context } = build(xmlElement('layer', { nodetype: 'transparencymask', name: 'Loose' }));
    expect(layers).toEqual([]);
    expect(context.issues[0].severity).toBe('warning');
    expect(context.issues[0].message).toBe('Mask "transparencymask" outside a <masks> element skipped');
  });

  it('should skip a paint layer without a filename', () => {
    const { layers, context } = build(xmlElement('layer', { nodetype: 'paintlayer', name: 'Lost' }));
    expect(layers).toEqual([]);
    expect(context.skippedLayerCount).toBe(1);
    expect(context.issues).toEqual([
      {
        severity: 'warning',
        message: 'Paint layer has no filename attribute',
        layerName: 'Lost',
        feature: 'layer-data',
      },
    ]);
  });

  it('should skip a paint layer whose data is missing from the archive', () => {
    const { layers, context } = build(xmlElement('layer', { nodetype: 'paintlayer', name: 'Gone', filename: 'layer9' }));
    expect(layers).toEqual([]);
    expect(context.issues[0].message).toBe('Layer data "Picture/layers/layer9" not found in archive');
  });

  it('should drop a paint layer without tiles', () => {
    const empty = writeTileStream({ tileWidth: 64, tileHeight: 64, pixelSize: 4, tiles: [] });
    const { layers, context } = build(
      xmlElement('layer', { nodetype: 'paintlayer', name: 'Blank', filename: 'layer3' }),
      { 'Picture/layers/layer3': empty },
    );
    expect(layers).toEqual([]);
    expect(context.skippedLayerCount).toBe(1);
    expect(context.issues).toEqual([
      {
        severity: 'info',
        message: 'Paint layer has no tiles and was dropped',
        layerName: 'Blank',
        feature: 'empty-layer',
      },
    ]);
  });

  it('should drop a paint layer whose only tiles are empty records', () => {
    const stream = writeTileStream({
      tileWidth: 64,
      tileHeight: 64,
      pixelSize: 4,
      tiles: [{ left: 0, top: 0, payload: [] }],
    });
    const { layers, context } = build(
      xmlElement('layer', { nodetype: 'paintlayer', name: 'Hollow', filename: 'layer4' }),
      { 'Picture/layers/layer4': stream },
    );
    expect(layers).toEqual([]);
    expect(context.skippedLayerCount).toBe(1);
  });

  it('should fall back to normal for an unknown blend mode', () => {
    const { layers, context } = build(xmlElement('layer', { nodetype: 'vectorlayer', compositeop: 'sparkle' }));
    const layer = first(layers);
    expect(layer.type === 'vector' && layer.blendMode).toBe(KritaBlendMode.Normal);
    expect(context.issues[0].message).toBe('Blend mode "sparkle" not recognised, using normal');
  });

  it('should reject an unsupported paint layer colour space', () => {
    const buildGray = () =>
      build(xmlElement('layer', { nodetype: 'paintlayer', name: 'Gray', filename: 'layer1', colorspacename: 'GRAYA' }), {
        'Picture/layers/layer1': SMALL_STREAM,
      });
    expect(buildGray).toThrow(KraDocumentError);
    expect(buildGray).toThrow('Layer "Gray" uses unsupported colour space "GRAYA"');
  });

  it('should report a malformed tile stream with its cause', () => {
    let caught: unknown;
    try {
      build(xmlElement('layer', { nodetype: 'paintlayer', name: 'Bad', filename: 'layer1' }), {
        'Picture/layers/layer1': new TextEncoder().encode('VERSION 2\n'),
      });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(KraDocumentError);
    if (caught instanceof KraDocumentError) {
      expect(caught.code).toBe('malformed-tile-stream');
      expect(caught.message).toMatch(/^Layer "Bad" has a malformed tile stream: /);
    }
  });
});
