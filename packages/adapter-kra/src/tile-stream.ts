/**
 * @module tile-stream
 * Parser for a paint layer's tile stream (the files under `<image>/layers/`).
 *
 * Layout:
 * ```
 * VERSION 2
 * TILEWIDTH 64
 * TILEHEIGHT 64
 * PIXELSIZE 4
 * DATA <tile count>
 * <left>,<top>,<flag>,<length>\n<length bytes>
 * ...
 * ```
 * Tiles are not decompressed here; see {@link composeTiles}.
 */

import type { Bounds, Tile } from '@kra-decoder/types';
import { ByteCursor } from './byte-cursor';
import { KraFormatError } from './errors';

/** Header keys in the order Krita writes them. All five are required. */
const HEADER_KEYS = ['VERSION', 'TILEWIDTH', 'TILEHEIGHT', 'PIXELSIZE', 'DATA'] as const;

type HeaderKey = (typeof HEADER_KEYS)[number];

const HEADER_KEY_SET: ReadonlySet<string> = new Set(HEADER_KEYS);

/** Flag value Krita writes in tile records; its payload carries a storage byte. */
const LZF_FLAG = 'LZF';

/** Storage byte values that prefix `LZF`-flagged payloads. */
const STORAGE_RAW = 0;
const STORAGE_LZF = 1;

/** A parsed tile stream. */
export interface TileStream {
  version: number;
  tileWidth: number;
  tileHeight: number;
  pixelSize: number;
  /** Non-empty tiles in stream order. */
  tiles: Tile[];
  /** Union of the tile rectangles, or null when there are no tiles. */
  bounds: Bounds | null;
}

/**
 * Parse a tile stream.
 * @param bytes - The raw entry contents.
 * @returns Header values, tile descriptors and their bounding box.
 * @throws {KraFormatError} On a malformed header, record or truncated payload.
 */
export function parseTileStream(bytes: Uint8Array): TileStream {
  const cursor = new ByteCursor(bytes);
  const header = readHeader(cursor);

  if (header.TILEWIDTH <= 0 || header.TILEHEIGHT <= 0 || header.PIXELSIZE <= 0) {
    throw new KraFormatError(
      `Invalid tile geometry ${header.TILEWIDTH}x${header.TILEHEIGHT}x${header.PIXELSIZE}`,
      cursor.offset,
    );
  }

  const tiles: Tile[] = [];
  for (let i = 0; i < header.DATA; i++) {
    const tile = readTile(cursor);
    if (tile) tiles.push(tile);
  }

  return {
    version: header.VERSION,
    tileWidth: header.TILEWIDTH,
    tileHeight: header.TILEHEIGHT,
    pixelSize: header.PIXELSIZE,
    tiles,
    bounds: tileBounds(tiles, header.TILEWIDTH, header.TILEHEIGHT),
  };
}

/**
 * Union of `[left, left + tileWidth) x [top, top + tileHeight)` over all tiles.
 * @returns The bounds, or null for an empty list.
 */
export function tileBounds(tiles: readonly Tile[], tileWidth: number, tileHeight: number): Bounds | null {
  if (tiles.length === 0) return null;

  let left = Infinity;
  let top = Infinity;
  let right = -Infinity;
  let bottom = -Infinity;
  for (const tile of tiles) {
    left = Math.min(left, tile.left);
    top = Math.min(top, tile.top);
    right = Math.max(right, tile.left + tileWidth);
    bottom = Math.max(bottom, tile.top + tileHeight);
  }
  return { left, top, right, bottom };
}

function readHeader(cursor: ByteCursor): Record<HeaderKey, number> {
  const values = new Map<HeaderKey, number>();

  for (let i = 0; i < HEADER_KEYS.length; i++) {
    const lineStart = cursor.offset;
    const line = cursor.readLine();
    const separator = line.indexOf(' ');
    if (separator === -1) {
      throw new KraFormatError(`Header line "${line}" is not "KEY VALUE"`, lineStart);
    }
    const key = line.slice(0, separator);
    if (!isHeaderKey(key)) {
      throw new KraFormatError(`Unknown header key "${key}"`, lineStart);
    }
    if (values.has(key)) {
      throw new KraFormatError(`Duplicate header key "${key}"`, lineStart);
    }
    values.set(key, parseInteger(line.slice(separator + 1), key, lineStart));
  }

  const headerValue = (key: HeaderKey): number => {
    const value = values.get(key);
    if (value === undefined) {
      throw new KraFormatError(`Missing header key "${key}"`, cursor.offset);
    }
    return value;
  };
  return {
    VERSION: headerValue('VERSION'),
    TILEWIDTH: headerValue('TILEWIDTH'),
    TILEHEIGHT: headerValue('TILEHEIGHT'),
    PIXELSIZE: headerValue('PIXELSIZE'),
    DATA: headerValue('DATA'),
  };
}

function readTile(cursor: ByteCursor): Tile | null {
  const lineStart = cursor.offset;
  const line = cursor.readLine();
  const fields = line.split(',');
  if (fields.length !== 4) {
    throw new KraFormatError(`Tile record "${line}" does not have 4 fields`, lineStart);
  }

  const left = parseInteger(fields[0], 'left', lineStart);
  const top = parseInteger(fields[1], 'top', lineStart);
  const flag = fields[2].trim();
  const length = parseInteger(fields[3], 'length', lineStart);
  if (length < 0) {
    throw new KraFormatError(`Negative tile length ${length}`, lineStart);
  }

  const payloadStart = cursor.offset;
  // Copy so a tile does not pin the whole entry buffer.
  const payload = cursor.readBytes(length).slice();
  if (length === 0) return null;

  if (flag !== LZF_FLAG) {
    return { left, top, data: payload, storage: 'lzf' };
  }

  const storageByte = payload[0];
  if (storageByte === STORAGE_LZF) {
    return { left, top, data: payload.subarray(1), storage: 'lzf' };
  }
  if (storageByte === STORAGE_RAW) {
    return { left, top, data: payload.subarray(1), storage: 'raw' };
  }
  throw new KraFormatError(`Unknown tile storage byte ${storageByte}`, payloadStart);
}

function isHeaderKey(key: string): key is HeaderKey {
  return HEADER_KEY_SET.has(key);
}

function parseInteger(text: string, field: string, offset: number): number {
  const trimmed = text.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new KraFormatError(`Field ${field} "${text}" is not an integer`, offset);
  }
  return Number.parseInt(trimmed, 10);
}
