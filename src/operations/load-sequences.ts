/**
 * Load sequence records from a (possibly gzipped) file into an array store
 *
 * Every record becomes one uint8 array of the body's character codes,
 * named `<prefix><label>`, with a `length` attribute.
 */

import { type } from "arktype";
import { InvalidArgumentError, MalformedInputError } from "../errors";
import { FastaParser } from "../formats/fasta";
import type { ArrayStore } from "../storage/array-store";
import { allocate, type NDArray } from "./core/ndarray";
import type { LoadSequencesOptions, LoadSequencesResult } from "./types";

export const DEFAULT_SEQUENCE_PREFIX = "sequence/";

const MAX_CHAR_CODE = 0xff;
const DECODE_CHUNK_SIZE = 8192;

const LoadSequencesOptionsSchema = type({
  "prefix?": "string",
});

/**
 * Character codes of a record body as a uint8 array
 *
 * @throws {MalformedInputError} If a character does not fit in one byte
 */
export function encodeSequence(body: string): NDArray<"uint8"> {
  const array = allocate([body.length], "uint8");
  for (let i = 0; i < body.length; i++) {
    const code = body.charCodeAt(i);
    if (code > MAX_CHAR_CODE) {
      throw new MalformedInputError(
        `Character '${body[i]}' at offset ${i} does not fit in a byte`,
        "FASTA"
      );
    }
    array.data[i] = code;
  }
  return array;
}

/**
 * Inverse of `encodeSequence`
 */
export function decodeSequence(array: NDArray): string {
  let body = "";
  let codes: number[] = [];
  for (let i = 0; i < array.data.length; i++) {
    codes.push(array.data[i]);
    if (codes.length === DECODE_CHUNK_SIZE) {
      body += String.fromCharCode(...codes);
      codes = [];
    }
  }
  return body + String.fromCharCode(...codes);
}

/**
 * Parse every record in `path` and store it
 *
 * Records must carry unique labels; at least one record is required unless
 * `requireRecords` is set to false.
 *
 * @throws {NotFoundError} If the file does not exist
 * @throws {MalformedInputError} On framing errors or a repeated label
 *
 * @example
 * ```typescript
 * const store = new InMemoryArrayStore();
 * const { records, totalLength } = await loadSequences("hg38.fa.gz", store, {
 *   onProgress: (n) => console.log(`${n} records`),
 * });
 * ```
 */
export async function loadSequences(
  path: string,
  store: ArrayStore,
  options: LoadSequencesOptions = {}
): Promise<LoadSequencesResult> {
  const validationResult = LoadSequencesOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new InvalidArgumentError(`Invalid load options: ${validationResult.summary}`);
  }

  const { prefix = DEFAULT_SEQUENCE_PREFIX, onProgress, openOptions, ...parserOptions } = options;
  const parser = new FastaParser({
    ...parserOptions,
    requireRecords: parserOptions.requireRecords ?? true,
  });

  const labels = new Set<string>();
  let records = 0;
  let totalLength = 0;

  for await (const record of parser.parseFile(path, openOptions)) {
    if (labels.has(record.label)) {
      throw new MalformedInputError(`Duplicate record label '${record.label}'`, "FASTA");
    }
    labels.add(record.label);

    const name = `${prefix}${record.label}`;
    await store.putArray(name, encodeSequence(record.body));
    await store.putAttributes(name, { length: record.body.length });

    records++;
    totalLength += record.body.length;
    onProgress?.(records);
  }

  return { records, totalLength };
}
