/**
 * Core type definitions for track ingestion
 *
 * Plain data shapes shared across the opener, the record parser and the
 * array helpers, plus the ArkType schemas that validate option objects.
 */

import { type } from "arktype";

// =============================================================================
// RECORDS
// =============================================================================

/**
 * One record of a FASTA-style stream
 * Format: >label\nbody line\nbody line...
 */
export interface FastaRecord {
  /** Trimmed text following the record-start marker */
  readonly label: string;
  /** Body lines concatenated after trailing whitespace was stripped from each */
  readonly body: string;
}

/**
 * Result of advancing a record cursor by one step
 */
export type ParseStep =
  | { readonly kind: "record"; readonly record: FastaRecord }
  | { readonly kind: "end" };

/**
 * Observable state of the record framer
 */
export type FramerState = "seeking" | "accumulating" | "exhausted";

/**
 * Warning hook used in place of a logger
 */
export type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * Options shared by every parser
 */
export interface ParserOptions {
  /** AbortSignal checked between records */
  readonly signal?: AbortSignal;
  /** Receives non-fatal findings (default: console.warn) */
  readonly onWarning?: WarningHandler;
}

// =============================================================================
// FILE ACCESS
// =============================================================================

/**
 * Compression formats recognized by the opener
 */
export type CompressionFormat = "gzip" | "none";

/**
 * File open modes: read, truncate-and-write, append
 */
export type OpenMode = "r" | "w" | "a";

/**
 * Gzip compression levels accepted by the codec
 */
export type CompressionLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * Options for opening a stream handle
 */
export interface OpenOptions {
  /** Bytes requested per read from the underlying file (default: 65536) */
  readonly bufferSize?: number;
  /** Gzip level used by write handles (default: 6) */
  readonly compressionLevel?: CompressionLevel;
}

/**
 * Scoped handle over a raw or gzip-compressed file
 *
 * The caller owns the handle and must close it; `withMaybeGzip` does that
 * automatically. Closing more than once is a no-op.
 */
export interface StreamHandle {
  readonly path: string;
  readonly mode: OpenMode;
  /** Whether reads decompress and writes compress */
  readonly compressed: boolean;
  readonly closed: boolean;

  /** Decoded bytes, in file order, from the current position */
  chunks(): AsyncIterable<Uint8Array>;
  /** Decoded text lines without their line terminators */
  lines(): AsyncIterable<string>;
  /** Everything remaining, decoded */
  readAll(): Promise<Uint8Array>;
  write(data: string | Uint8Array): Promise<void>;
  /** Flush codec state and release the descriptor */
  close(): Promise<void>;
}

/**
 * Track file kinds distinguished by signature sniffing
 */
export type TrackFormat = "bigwig" | "text";

// =============================================================================
// VALIDATION SCHEMAS
// =============================================================================

/**
 * Open options validation schema
 */
export const OpenOptionsSchema = type({
  "bufferSize?": "1024<=number<=1048576",
  "compressionLevel?": "0<=number<=9",
}).narrow((options, ctx) => {
  if (options.bufferSize !== undefined && !Number.isInteger(options.bufferSize)) {
    return ctx.reject({
      expected: "an integer byte count",
      actual: String(options.bufferSize),
      path: ["bufferSize"],
    });
  }
  if (options.compressionLevel !== undefined && !Number.isInteger(options.compressionLevel)) {
    return ctx.reject({
      expected: "an integer gzip level",
      actual: String(options.compressionLevel),
      path: ["compressionLevel"],
    });
  }
  return true;
});

/**
 * Array dimension: a non-negative integer
 */
export const DimensionSchema = type("number>=0").narrow(
  (dimension, ctx) =>
    Number.isInteger(dimension) ||
    ctx.reject({ expected: "a non-negative integer", actual: String(dimension) })
);

/**
 * Array shape: a list of dimensions
 */
export const ShapeSchema = DimensionSchema.array();
