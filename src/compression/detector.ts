/**
 * Compression format detection for track files
 *
 * Detection is by file name only: a path ending in `.gz` is gzip, anything
 * else is read and written as-is. Content is never sniffed, so a `.gz` file
 * holding plain text fails on read instead of silently passing through.
 */

import type { CompressionFormat } from '../types';
import { InvalidArgumentError } from '../errors';

/**
 * Reserved extension token for gzip-compressed files
 */
export const EXT_GZ = 'gz';

/**
 * Suffix matched against the end of a path (extension separator + token)
 */
export const SUFFIX_GZ = `.${EXT_GZ}`;

/**
 * File-name based compression detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension('/data/chr21.fa.gz'); // 'gzip'
 * CompressionDetector.fromExtension('/data/chr21.fa');    // 'none'
 * CompressionDetector.fromExtension('/data/chr21.FA.GZ'); // 'none' (case-sensitive)
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from a path's final extension
   *
   * @param filePath Path to classify
   * @returns 'gzip' when the path ends in `.gz`, 'none' otherwise
   * @throws {InvalidArgumentError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new InvalidArgumentError('File path must not be empty');
    }

    return filePath.endsWith(SUFFIX_GZ) ? 'gzip' : 'none';
  }

  /**
   * Whether a path would be opened through the gzip layer
   */
  static isCompressed(filePath: string): boolean {
    return CompressionDetector.fromExtension(filePath) === 'gzip';
  }
}
