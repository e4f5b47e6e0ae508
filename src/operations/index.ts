/**
 * Ingestion operations: records and numeric tracks into an array store
 */

export * from "./core";
export {
  DEFAULT_SEQUENCE_PREFIX,
  decodeSequence,
  encodeSequence,
  loadSequences,
} from "./load-sequences";
export { loadTrack } from "./load-track";
export type {
  LoadSequencesOptions,
  LoadSequencesResult,
  LoadTrackOptions,
  ProgressHandler,
} from "./types";
