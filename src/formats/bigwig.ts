/**
 * bigWig signature sniffing
 *
 * Classifies a file by its first four bytes only; nothing past the magic
 * number is parsed. Writers emit the signature in their host's byte
 * order, so both interpretations are accepted.
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { InvalidArgumentError, IOError } from "../errors";
import { runFileEffect } from "../io/runtime";
import type { TrackFormat } from "../types";

export const BIGWIG_SIGNATURE = 0x888ffc26;
export const BIGWIG_SIGNATURE_BYTE_SIZE = 4;

/**
 * Whether the first four bytes equal the bigWig magic in either byte order
 *
 * @param bytes File prefix, at least four bytes long
 * @throws {InvalidArgumentError} If fewer than four bytes are given
 */
export function matchesBigWigSignature(bytes: Uint8Array): boolean {
  if (bytes.length < BIGWIG_SIGNATURE_BYTE_SIZE) {
    throw new InvalidArgumentError(
      `Signature check needs ${BIGWIG_SIGNATURE_BYTE_SIZE} bytes, got ${bytes.length}`
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, BIGWIG_SIGNATURE_BYTE_SIZE);
  const littleEndianSignature = view.getUint32(0, true);
  const bigEndianSignature = view.getUint32(0, false);

  return littleEndianSignature === BIGWIG_SIGNATURE || bigEndianSignature === BIGWIG_SIGNATURE;
}

/**
 * Read exactly the first four bytes of a file
 *
 * @throws {NotFoundError} If the file does not exist
 * @throws {IOError} If the file is shorter than four bytes or cannot be read
 */
export async function readSignatureBytes(path: string): Promise<Uint8Array> {
  const program = Effect.scoped(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const file = yield* fs.open(path, { flag: "r" });
      const buffer = new Uint8Array(BIGWIG_SIGNATURE_BYTE_SIZE);
      const bytesRead = yield* file.read(buffer);
      return buffer.subarray(0, Number(bytesRead));
    })
  );

  const bytes = await runFileEffect(program, path, "read");
  if (bytes.length < BIGWIG_SIGNATURE_BYTE_SIZE) {
    throw new IOError(
      `File '${path}' is truncated: expected ${BIGWIG_SIGNATURE_BYTE_SIZE} signature bytes, found ${bytes.length}`,
      path,
      "read"
    );
  }
  return bytes;
}

/**
 * Check that the given path refers to a bigWig file
 */
export async function isBigWig(path: string): Promise<boolean> {
  return matchesBigWigSignature(await readSignatureBytes(path));
}

/**
 * Pick the decoder family for a track file
 *
 * Files too short to carry a signature are text tracks.
 */
export async function detectTrackFormat(path: string): Promise<TrackFormat> {
  const size = await runFileEffect(
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const info = yield* fs.stat(path);
      return Number(info.size);
    }),
    path,
    "stat"
  );

  if (size < BIGWIG_SIGNATURE_BYTE_SIZE) {
    return "text";
  }
  return (await isBigWig(path)) ? "bigwig" : "text";
}
