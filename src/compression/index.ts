/**
 * Compression module for track files
 *
 * @example Suffix-driven codec selection
 * ```typescript
 * import { CompressionDetector, createInflater } from './compression';
 *
 * if (CompressionDetector.isCompressed('signal.bedGraph.gz')) {
 *   const inflater = createInflater();
 *   const decoded = inflater.push(compressedChunk);
 * }
 * ```
 */

export { CompressionDetector, EXT_GZ, SUFFIX_GZ } from './detector';
export { createDeflater, createInflater, DEFAULT_COMPRESSION_LEVEL, type ChunkCodec } from './gzip';
export type { CompressionFormat, CompressionLevel } from '../types';
