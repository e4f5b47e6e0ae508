/**
 * Option and result types for the load operations
 */

import type { FastaParserOptions } from "../formats/fasta";
import type { OpenOptions } from "../types";

/**
 * Callback invoked after each unit of work with the running count
 */
export type ProgressHandler = (completed: number) => void;

/**
 * Options for loading sequence records into an array store
 */
export interface LoadSequencesOptions extends FastaParserOptions {
  /** Prepended to each record label to form the array name (default: "sequence/") */
  readonly prefix?: string;
  /** Called with the number of records stored so far */
  readonly onProgress?: ProgressHandler;
  /** Passed to the file opener */
  readonly openOptions?: OpenOptions;
}

export interface LoadSequencesResult {
  readonly records: number;
  /** Sum of all body lengths */
  readonly totalLength: number;
}

/**
 * Options for loading a numeric track into an array store
 */
export interface LoadTrackOptions {
  /** Called with the number of batches folded so far */
  readonly onProgress?: ProgressHandler;
}
