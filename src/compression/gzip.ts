/**
 * Incremental gzip codecs backed by fflate
 *
 * The opener feeds file chunks through these one at a time, so neither the
 * compressed nor the decompressed file is ever held in memory as a whole.
 * Codec failures are thrown as-is; callers attach path context.
 */

import { Gunzip, Gzip } from 'fflate';
import type { CompressionLevel } from '../types';

/**
 * Default gzip level for write handles
 */
export const DEFAULT_COMPRESSION_LEVEL: CompressionLevel = 6;

/**
 * Push-based byte transformer
 */
export interface ChunkCodec {
  /** Feed input and collect whatever output it produced */
  push(chunk: Uint8Array): Uint8Array[];
  /** Signal end of input and collect the remaining output */
  finish(): Uint8Array[];
  /** Total input bytes pushed so far */
  readonly bytesIn: number;
}

/**
 * Gzip decoder; handles multi-member input (e.g. files written in append mode)
 *
 * Finishing without any input produces no output, so an empty `.gz` file
 * reads as empty instead of failing on a missing header.
 */
export function createInflater(): ChunkCodec {
  const output: Uint8Array[] = [];
  const gunzip = new Gunzip((chunk) => {
    output.push(chunk);
  });
  let bytesIn = 0;

  return {
    push(chunk: Uint8Array): Uint8Array[] {
      if (chunk.length === 0) return [];
      bytesIn += chunk.length;
      gunzip.push(chunk, false);
      return output.splice(0);
    },
    finish(): Uint8Array[] {
      if (bytesIn > 0) {
        gunzip.push(new Uint8Array(0), true);
      }
      return output.splice(0);
    },
    get bytesIn(): number {
      return bytesIn;
    },
  };
}

/**
 * Gzip encoder emitting one member per codec
 */
export function createDeflater(level: CompressionLevel = DEFAULT_COMPRESSION_LEVEL): ChunkCodec {
  const output: Uint8Array[] = [];
  const gzip = new Gzip({ level }, (chunk) => {
    output.push(chunk);
  });
  let bytesIn = 0;

  return {
    push(chunk: Uint8Array): Uint8Array[] {
      if (chunk.length === 0) return [];
      bytesIn += chunk.length;
      gzip.push(chunk, false);
      return output.splice(0);
    },
    finish(): Uint8Array[] {
      gzip.push(new Uint8Array(0), true);
      return output.splice(0);
    },
    get bytesIn(): number {
      return bytesIn;
    },
  };
}
