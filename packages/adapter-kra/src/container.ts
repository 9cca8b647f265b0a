/**
 * @module container
 * Read access to the ZIP archive a Krita document is stored in.
 *
 * Dependencies:
 * - fflate: ZIP decompression (sync API)
 */

import { unzipSync } from 'fflate';
import { KraDocumentError } from './errors';

/** Read-only view of the archive entries. */
export interface ContainerReader {
  /** Whether an entry with this exact path exists. */
  hasEntry(path: string): boolean;
  /**
   * Bytes of an entry.
   * @throws If the entry does not exist; check with {@link hasEntry} first.
   */
  readEntry(path: string): Uint8Array;
}

/**
 * Open a ZIP archive held in memory.
 * All entries are inflated up front.
 *
 * @param data - ZIP file data.
 * @throws {KraDocumentError} `invalid-archive` if the data is not a ZIP file.
 */
export function createZipContainer(data: Uint8Array): ContainerReader {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(data);
  } catch (err) {
    throw new KraDocumentError('invalid-archive', 'Not a readable ZIP archive', { cause: err });
  }

  return {
    hasEntry: (path) => Object.hasOwn(entries, path),
    readEntry: (path) => {
      if (!Object.hasOwn(entries, path)) {
        throw new Error(`Archive has no entry "${path}"`);
      }
      return entries[path];
    },
  };
}
