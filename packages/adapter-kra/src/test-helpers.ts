/**
 * @module test-helpers
 * Builders for tile streams, LZF payloads and .kra archives used in tests.
 */

import { zipSync } from 'fflate';
import type { PaintLayer, Tile } from '@kra-decoder/types';
import { KritaBlendMode } from '@kra-decoder/types';
import type { ContainerReader } from './container';

/**
 * Simple writer for constructing tile streams: ASCII lines mixed with raw bytes.
 */
export class TileStreamWriter {
  private chunks: Uint8Array[] = [];

  /** Write a line followed by a newline. */
  writeLine(line: string): void {
    this.writeString(`${line}\n`);
  }

  writeString(str: string): void {
    const buf = new Uint8Array(str.length);
    for (let i = 0; i < str.length; i++) {
      buf[i] = str.charCodeAt(i);
    }
    this.chunks.push(buf);
  }

  writeBytes(data: Uint8Array | number[]): void {
    this.chunks.push(Uint8Array.from(data));
  }

  toUint8Array(): Uint8Array {
    const totalLength = this.chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    const result = new Uint8Array(totalLength);
    let offset = 0;
    for (const chunk of this.chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  }
}

/** A tile record for {@link writeTileStream}. */
export interface TileRecord {
  left: number;
  top: number;
  /** Third record field. Defaults to `0`. */
  flag?: string;
  payload: Uint8Array | number[];
}

/** Serialize a complete tile stream. */
export function writeTileStream(options: {
  version?: number;
  tileWidth: number;
  tileHeight: number;
  pixelSize: number;
  tiles: TileRecord[];
}): Uint8Array {
  const writer = new TileStreamWriter();
  writer.writeLine(`VERSION ${options.version ?? 2}`);
  writer.writeLine(`TILEWIDTH ${options.tileWidth}`);
  writer.writeLine(`TILEHEIGHT ${options.tileHeight}`);
  writer.writeLine(`PIXELSIZE ${options.pixelSize}`);
  writer.writeLine(`DATA ${options.tiles.length}`);
  for (const tile of options.tiles) {
    writer.writeLine(`${tile.left},${tile.top},${tile.flag ?? '0'},${tile.payload.length}`);
    writer.writeBytes(tile.payload);
  }
  return writer.toUint8Array();
}

/**
 * Reference LZF compressor (greedy, 3-byte hash) producing streams
 * {@link lzfDecompress} accepts.
 */
export function lzfCompress(input: Uint8Array): Uint8Array {
  const MAX_OFFSET = 1 << 13;
  const MAX_MATCH = 264;
  const out: number[] = [];
  const lastSeen = new Map<number, number>();

  let literalStart = 0;
  let literalCount = 0;
  out.push(0);

  const pushLiteral = (byte: number): void => {
    out.push(byte);
    literalCount++;
    if (literalCount === 32) {
      out[literalStart] = 31;
      literalStart = out.length;
      out.push(0);
      literalCount = 0;
    }
  };

  let ip = 0;
  while (ip < input.length) {
    if (ip + 2 < input.length) {
      const key = (input[ip] << 16) | (input[ip + 1] << 8) | input[ip + 2];
      const ref = lastSeen.get(key);
      lastSeen.set(key, ip);

      if (ref !== undefined && ip - ref - 1 < MAX_OFFSET) {
        const offset = ip - ref - 1;
        const limit = Math.min(MAX_MATCH, input.length - ip);
        let matched = 3;
        while (matched < limit && input[ref + matched] === input[ip + matched]) matched++;

        if (literalCount > 0) {
          out[literalStart] = literalCount - 1;
        } else {
          out.pop();
        }

        const lengthCode = matched - 2;
        if (lengthCode < 7) {
          out.push((offset >> 8) + (lengthCode << 5));
        } else {
          out.push((offset >> 8) + (7 << 5));
          out.push(lengthCode - 7);
        }
        out.push(offset & 0xff);
        ip += matched;

        literalStart = out.length;
        out.push(0);
        literalCount = 0;
        continue;
      }
    }
    pushLiteral(input[ip++]);
  }

  if (literalCount > 0) {
    out[literalStart] = literalCount - 1;
  } else {
    out.pop();
  }
  return Uint8Array.from(out);
}

/** In-memory container for builder tests. */
export function memoryContainer(entries: Record<string, Uint8Array>): ContainerReader {
  return {
    hasEntry: (path) => Object.hasOwn(entries, path),
    readEntry: (path) => {
      if (!Object.hasOwn(entries, path)) throw new Error(`No entry "${path}"`);
      return entries[path];
    },
  };
}

/** Render an XML element with attributes and optional inner XML. */
export function xmlElement(tag: string, attributes: Record<string, string | number>, inner = ''): string {
  const attrs = Object.entries(attributes)
    .map(([key, value]) => ` ${key}="${value}"`)
    .join('');
  return inner ? `<${tag}${attrs}>${inner}</${tag}>` : `<${tag}${attrs}/>`;
}

/** Render a `maindoc.xml` document. */
export function maindocXml(image: {
  name: string;
  width?: number;
  height?: number;
  colorspacename?: string;
  layers: string;
}): string {
  const attrs = {
    name: image.name,
    width: image.width ?? 64,
    height: image.height ?? 64,
    colorspacename: image.colorspacename ?? 'RGBA',
    mime: 'application/x-kra',
  };
  return (
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
    `<DOC syntaxVersion="2">${xmlElement('IMAGE', attrs, `<layers>${image.layers}</layers>`)}</DOC>`
  );
}

/** Build a .kra archive. Pass `mimetype: null` to leave the entry out. */
export function buildKraArchive(options: {
  maindoc?: string | null;
  mimetype?: string | null;
  /** Extra entries keyed by full path. */
  entries?: Record<string, Uint8Array>;
}): Uint8Array {
  const encoder = new TextEncoder();
  const files: Record<string, Uint8Array> = {};
  const mimetype = options.mimetype === undefined ? 'application/x-krita' : options.mimetype;
  if (mimetype !== null) files.mimetype = encoder.encode(mimetype);
  if (options.maindoc !== null && options.maindoc !== undefined) {
    files['maindoc.xml'] = encoder.encode(options.maindoc);
  }
  Object.assign(files, options.entries ?? {});
  return zipSync(files);
}

/** A paint layer with defaults for reassembly tests. */
export function makePaintLayer(overrides: Partial<PaintLayer> & { tiles: Tile[] }): PaintLayer {
  return {
    type: 'paint',
    name: 'Paint',
    uuid: '{paint}',
    visible: true,
    x: 0,
    y: 0,
    bounds: { left: 0, top: 0, right: 0, bottom: 0 },
    opacity: 255,
    collapsed: false,
    colorLabel: 0,
    blendMode: KritaBlendMode.Normal,
    masks: [],
    colorMode: 'RGBA',
    fileName: 'layer1',
    tileStreamVersion: 2,
    tileWidth: 2,
    tileHeight: 2,
    pixelSize: 4,
    ...overrides,
  };
}
