/**
 * @module import
 * Options and diagnostics for Krita document import.
 */

import type { KraDocument } from './document';

/** Options for importing a Krita document. */
export interface KraImportOptions {
  /** Log import timing through `console.debug` (default: false). */
  debug: boolean;
  /** Maximum canvas dimension before a warning is issued (0 = no limit). */
  maxDimension: number;
}

/** Severity level for import issues. */
export type ImportSeverity = 'info' | 'warning' | 'error';

/** A single issue found during import. */
export interface ImportIssue {
  /** Severity of the issue. */
  severity: ImportSeverity;
  /** Human-readable description of the issue. */
  message: string;
  /** Name of the affected layer, if applicable. */
  layerName?: string;
  /** The feature that caused the issue. */
  feature: string;
}

/** Report of issues found during import. */
export interface KraImportReport {
  /** List of issues found. */
  issues: ImportIssue[];
  /** Whether the document is usable despite issues. */
  canProceed: boolean;
  /** Total number of layers and masks in the imported tree. */
  layerCount: number;
  /** Number of layer elements left out of the tree. */
  skippedLayerCount: number;
}

/** Result of a Krita import. */
export interface KraImportResult {
  /** The imported document. */
  document: KraDocument;
  /** Issues found while building the layer tree. */
  report: KraImportReport;
}
