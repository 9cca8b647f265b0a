/**
 * @module blend-mode
 * Maps Krita `compositeop` ids to {@link KritaBlendMode}.
 */

import { KritaBlendMode } from '@kra-decoder/types';

const KNOWN_MODES: ReadonlySet<string> = new Set(Object.values(KritaBlendMode));

/** Whether a `compositeop` value is a known blend mode. */
export function isKritaBlendMode(value: string): value is KritaBlendMode {
  return KNOWN_MODES.has(value);
}

/**
 * Map a `compositeop` attribute value.
 * @returns The blend mode, or undefined for ids outside the known vocabulary.
 */
export function parseBlendMode(value: string): KritaBlendMode | undefined {
  return isKritaBlendMode(value) ? value : undefined;
}
