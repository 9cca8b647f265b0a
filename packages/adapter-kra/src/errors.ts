/**
 * @module errors
 * Error types thrown by the Krita decoder.
 *
 * Each error carries a string `code` so callers can branch without
 * matching on messages.
 */

/** Failure codes for document-level errors raised by `importKra`. */
export type KraDocumentErrorCode =
  | 'invalid-archive'
  | 'missing-mimetype'
  | 'wrong-mimetype'
  | 'missing-maindoc'
  | 'invalid-xml'
  | 'unsupported-color-mode'
  | 'malformed-tile-stream'
  | 'unresolved-clone'
  | 'clone-cycle';

/** A structural problem that makes the whole document unreadable. */
export class KraDocumentError extends Error {
  readonly code: KraDocumentErrorCode;

  constructor(code: KraDocumentErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'KraDocumentError';
    this.code = code;
  }
}

/** A tile stream that does not follow the header/record layout. */
export class KraFormatError extends Error {
  /** Byte offset in the tile stream where parsing stopped. */
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(`${message} (at byte ${offset})`);
    this.name = 'KraFormatError';
    this.offset = offset;
  }
}

/** Failure codes for the tile codec. */
export type LzfDecodeErrorCode = 'overflow' | 'invalid-reference' | 'truncated';

/** Corrupt LZF input. */
export class LzfDecodeError extends Error {
  readonly code: LzfDecodeErrorCode;
  /** Input position of the control byte that failed. */
  readonly inputOffset: number;

  constructor(code: LzfDecodeErrorCode, message: string, inputOffset: number) {
    super(message);
    this.name = 'LzfDecodeError';
    this.code = code;
    this.inputOffset = inputOffset;
  }
}

/** Failure codes for `extractLayerImage`. */
export type KraExtractErrorCode =
  | 'not-raster'
  | 'corrupt-tile'
  | 'pixel-size-mismatch'
  | 'layer-too-large';

/** A single extraction failed. The document and other layers stay usable. */
export class KraExtractError extends Error {
  readonly code: KraExtractErrorCode;

  constructor(code: KraExtractErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'KraExtractError';
    this.code = code;
  }
}
