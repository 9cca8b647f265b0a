/**
 * @kra-decoder/types
 *
 * Shared type definitions for the Krita decoder.
 * This package contains no runtime code beyond enums: only TypeScript
 * interfaces and types that form the contract between packages.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Bounds, ColorMode, Point } from './common';
export { KritaBlendMode } from './common';

// Layer types
export type {
  BaseLayer,
  CloneLayer,
  ColorizeMask,
  CompositeLayer,
  FileLayer,
  FillLayer,
  FilterLayer,
  FilterMask,
  GroupLayer,
  Layer,
  LayerType,
  MaskLayer,
  NodeLayer,
  PaintLayer,
  SelectionMask,
  Tile,
  TransformMask,
  TransparencyMask,
  VectorLayer,
} from './layer';

// Document
export type { KraDocument } from './document';

// Extraction
export type { ExtractOptions, RawImageBuffer } from './image';

// Import options & diagnostics
export type {
  ImportIssue,
  ImportSeverity,
  KraImportOptions,
  KraImportReport,
  KraImportResult,
} from './import';
