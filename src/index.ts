/**
 * trackfill - ingestion utilities for genomic sequence and signal tracks
 *
 * Opens raw or gzipped files, frames FASTA-style records, sniffs bigWig
 * signatures, and folds numeric batches into running extrema before they
 * are written to an array store.
 */

// Compression
export {
  type ChunkCodec,
  CompressionDetector,
  createDeflater,
  createInflater,
  DEFAULT_COMPRESSION_LEVEL,
} from './compression';
// Error types
export {
  CompressionError,
  type FileOperation,
  InconsistentShapeError,
  InvalidArgumentError,
  IOError,
  MalformedInputError,
  NotFoundError,
  ParseError,
  StreamExhaustedError,
  TrackfillError,
  ValidationError,
} from './errors';
// Record parsing and track format detection
export * from './formats';
// File I/O
export { gzipOpen, openMaybeGzip, withMaybeGzip } from './io/file-opener';
export { getPlatform } from './io/runtime';
export {
  ignoreComments,
  ignoreCommentsAsync,
  isComment,
  readLines,
  splitLines,
  StreamUtils,
} from './io/stream-utils';
// Array helpers and load operations
export * from './operations';
// Storage
export * from './storage';
// Core types
export type {
  CompressionFormat,
  CompressionLevel,
  FastaRecord,
  FramerState,
  OpenMode,
  OpenOptions,
  ParserOptions,
  ParseStep,
  StreamHandle,
  TrackFormat,
  WarningHandler,
} from './types';
export { DimensionSchema, OpenOptionsSchema, ShapeSchema } from './types';
