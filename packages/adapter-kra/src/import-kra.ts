/**
 * @module import-kra
 * Krita document import.
 *
 * Converts a .kra / .krz archive into a {@link KraDocument}: validates the
 * container, reads the image attributes from `maindoc.xml`, builds the layer
 * tree and resolves clone layers.
 *
 * @see https://docs.krita.org/en/general_concepts/file_formats/file_kra.html
 */

import { readFileSync } from 'node:fs';
import { basename } from 'node:path';
import type {
  ImportIssue,
  KraDocument,
  KraImportOptions,
  KraImportReport,
  KraImportResult,
} from '@kra-decoder/types';
import { resolveClones } from './clone-resolver';
import type { ContainerReader } from './container';
import { createZipContainer } from './container';
import { KraDocumentError } from './errors';
import type { BuildContext, DraftLayer } from './layer-builder';
import { buildLayerForest, isSupportedColorMode } from './layer-builder';
import { countLayers } from './layer-tree';
import type { XmlElement } from './xml';
import { findChild, parseXml, readInt, readString } from './xml';

/** Mimetype a Krita archive must declare. */
export const KRA_MIMETYPE = 'application/x-krita';

/** Default import options. */
const DEFAULT_OPTIONS: KraImportOptions = {
  debug: false,
  maxDimension: 0,
};

/**
 * Import a Krita document held in memory.
 * @param buffer - Raw archive data.
 * @param fileName - Original file name, used when the image has no name.
 * @param options - Import options (partial, merged with defaults).
 * @returns Imported document and import report.
 * @throws {KraDocumentError} When the archive, `maindoc.xml`, colour mode or
 *   clone references make the document unreadable.
 */
export function importKra(
  buffer: ArrayBuffer | Uint8Array,
  fileName = 'Untitled.kra',
  options?: Partial<KraImportOptions>,
): KraImportResult {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const startedAt = performance.now();

  const data = buffer instanceof Uint8Array ? buffer : new Uint8Array(buffer);
  const container = createZipContainer(data);
  validateContainer(container);

  const root = parseXml(new TextDecoder().decode(container.readEntry('maindoc.xml')));
  const image = root.tagName === 'IMAGE' ? root : findChild(root, 'IMAGE');
  if (!image) {
    throw new KraDocumentError('invalid-xml', 'maindoc.xml has no IMAGE element');
  }

  const colorMode = readString(image, 'colorspacename', '');
  if (!isSupportedColorMode(colorMode)) {
    throw new KraDocumentError(
      'unsupported-color-mode',
      `Colour space "${colorMode}" is not supported (only RGBA and RGBA16)`,
    );
  }

  const issues: ImportIssue[] = [];
  const width = readInt(image, 'width', 0);
  const height = readInt(image, 'height', 0);
  if (opts.maxDimension > 0 && (width > opts.maxDimension || height > opts.maxDimension)) {
    issues.push({
      severity: 'warning',
      message: `Document dimensions (${width}x${height}) exceed max dimension (${opts.maxDimension})`,
      feature: 'max-dimension',
    });
  }

  const imageName = readString(image, 'name', '');
  const name = imageName || stripExtension(fileName);
  const context: BuildContext = {
    container,
    imageName,
    issues,
    skippedLayerCount: 0,
  };
  const layers = resolveClones(buildRootLayers(image, context));

  const document: KraDocument = { name, width, height, colorMode, layers };
  const report: KraImportReport = {
    issues,
    canProceed: !issues.some((i) => i.severity === 'error'),
    layerCount: countLayers(layers),
    skippedLayerCount: context.skippedLayerCount,
  };

  if (opts.debug) {
    // eslint-disable-next-line no-console
    console.debug(
      `[kra] ${name}: ${report.layerCount} layers, ${issues.length} issues in ${(performance.now() - startedAt).toFixed(2)}ms`,
    );
  }

  return { document, report };
}

/**
 * Read and import a Krita document from disk.
 * @param path - Path to a .kra or .krz file.
 * @param options - Import options (partial, merged with defaults).
 */
export function openKra(path: string, options?: Partial<KraImportOptions>): KraImportResult {
  return importKra(readFileSync(path), basename(path), options);
}

function validateContainer(container: ContainerReader): void {
  if (!container.hasEntry('mimetype')) {
    throw new KraDocumentError('missing-mimetype', 'Archive has no mimetype entry');
  }
  const mimetype = new TextDecoder().decode(container.readEntry('mimetype'));
  if (mimetype !== KRA_MIMETYPE) {
    throw new KraDocumentError(
      'wrong-mimetype',
      `Mimetype is "${mimetype}", expected "${KRA_MIMETYPE}"`,
    );
  }
  if (!container.hasEntry('maindoc.xml')) {
    throw new KraDocumentError('missing-maindoc', 'Archive has no maindoc.xml entry');
  }
}

function buildRootLayers(image: XmlElement, context: BuildContext): DraftLayer[] {
  const layersElement = findChild(image, 'layers');
  return layersElement ? buildLayerForest(layersElement, context) : [];
}

function stripExtension(fileName: string): string {
  return fileName.replace(/\.kr[az]$/i, '');
}
