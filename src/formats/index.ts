/**
 * Record stream parsing and track format detection
 */

export { AbstractParser } from "./abstract-parser";
export {
  BIGWIG_SIGNATURE,
  BIGWIG_SIGNATURE_BYTE_SIZE,
  detectTrackFormat,
  isBigWig,
  matchesBigWigSignature,
  readSignatureBytes,
} from "./bigwig";
export {
  AsyncRecordCursor,
  FastaParser,
  type FastaParserOptions,
  FastaWriter,
  isRecordMarker,
  parseRecords,
  RecordCursor,
  RecordFramer,
  type RecordFramerOptions,
} from "./fasta";
