/**
 * Transparent gzip-or-raw file access with scoped handles
 *
 * The file descriptor is opened inside an Effect Scope whose finalizer
 * closes it; the handle keeps that scope and closes it exactly once.
 * Whether the gzip layer is used depends only on the path suffix.
 *
 * @module file-opener
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Exit, Option, Scope } from "effect";
import {
  type ChunkCodec,
  CompressionDetector,
  createDeflater,
  createInflater,
  DEFAULT_COMPRESSION_LEVEL,
} from "../compression";
import { CompressionError, InvalidArgumentError, IOError } from "../errors";
import type { OpenMode, OpenOptions, StreamHandle } from "../types";
import { OpenOptionsSchema } from "../types";
import { runFileEffect } from "./runtime";
import { concatChunks, readLines } from "./stream-utils";

const DEFAULT_OPTIONS: Required<OpenOptions> = {
  bufferSize: 65536,
  compressionLevel: DEFAULT_COMPRESSION_LEVEL,
};

const encoder = new TextEncoder();

/**
 * Stream handle over one open file descriptor
 */
class ScopedStreamHandle implements StreamHandle {
  private closing: Promise<void> | undefined;
  private readonly deflater: ChunkCodec | undefined;

  constructor(
    readonly path: string,
    readonly mode: OpenMode,
    readonly compressed: boolean,
    private readonly file: FileSystem.File,
    private readonly scope: Scope.CloseableScope,
    private readonly options: Required<OpenOptions>
  ) {
    this.deflater = compressed && mode !== "r" ? createDeflater(options.compressionLevel) : undefined;
  }

  get closed(): boolean {
    return this.closing !== undefined;
  }

  async *chunks(): AsyncIterable<Uint8Array> {
    this.assertUsable("read");
    const inflater = this.compressed ? createInflater() : undefined;

    while (true) {
      const chunk = await this.readChunk();
      if (chunk === undefined) break;

      if (inflater === undefined) {
        yield chunk;
      } else {
        yield* this.runCodec(inflater, "read", () => inflater.push(chunk));
      }
    }

    if (inflater !== undefined) {
      yield* this.runCodec(inflater, "read", () => inflater.finish());
    }
  }

  lines(): AsyncIterable<string> {
    return readLines(this.chunks());
  }

  async readAll(): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [];
    for await (const chunk of this.chunks()) {
      chunks.push(chunk);
    }
    return concatChunks(chunks);
  }

  async write(data: string | Uint8Array): Promise<void> {
    this.assertUsable("write");
    const bytes = typeof data === "string" ? encoder.encode(data) : data;

    if (this.deflater === undefined) {
      await this.writeBytes(bytes);
      return;
    }

    const deflater = this.deflater;
    for (const chunk of this.runCodec(deflater, "write", () => deflater.push(bytes))) {
      await this.writeBytes(chunk);
    }
  }

  close(): Promise<void> {
    if (this.closing === undefined) {
      this.closing = this.release();
    }
    return this.closing;
  }

  private async release(): Promise<void> {
    try {
      if (this.deflater !== undefined) {
        const deflater = this.deflater;
        for (const chunk of this.runCodec(deflater, "close", () => deflater.finish())) {
          await this.writeBytes(chunk);
        }
      }
    } finally {
      await Effect.runPromise(Scope.close(this.scope, Exit.void));
    }
  }

  private async readChunk(): Promise<Uint8Array | undefined> {
    const chunk = await runFileEffect(this.file.readAlloc(this.options.bufferSize), this.path, "read");
    return Option.getOrUndefined(chunk);
  }

  private writeBytes(bytes: Uint8Array): Promise<void> {
    return runFileEffect(this.file.writeAll(bytes), this.path, "write");
  }

  private runCodec(
    codec: ChunkCodec,
    operation: "read" | "write" | "close",
    step: () => Uint8Array[]
  ): Uint8Array[] {
    try {
      return step();
    } catch (error) {
      throw CompressionError.fromCodecError(this.path, operation, error, codec.bytesIn);
    }
  }

  private assertUsable(operation: "read" | "write"): void {
    if (this.closed) {
      throw new IOError(`Cannot ${operation} '${this.path}': handle is closed`, this.path, operation);
    }
    const readable = this.mode === "r";
    if ((operation === "read") !== readable) {
      throw new IOError(
        `Cannot ${operation} '${this.path}': handle was opened with mode '${this.mode}'`,
        this.path,
        operation
      );
    }
  }
}

/**
 * Open a file, decompressing/compressing through gzip when the path ends in `.gz`
 *
 * @param path File to open
 * @param mode "r" (default), "w" (truncate/create) or "a" (append/create)
 * @param options Buffer size and gzip level
 * @returns Handle the caller must close
 * @throws {NotFoundError} If the path does not exist (read mode)
 * @throws {IOError} If the file cannot be opened in the requested mode
 *
 * @example
 * ```typescript
 * const handle = await openMaybeGzip("/data/hg38.fa.gz");
 * try {
 *   for await (const line of handle.lines()) {
 *     // ...
 *   }
 * } finally {
 *   await handle.close();
 * }
 * ```
 */
export async function openMaybeGzip(
  path: string,
  mode: OpenMode = "r",
  options: OpenOptions = {}
): Promise<StreamHandle> {
  return openHandle(path, mode, CompressionDetector.isCompressed(path), options);
}

/**
 * Open a file through the gzip layer regardless of its name
 */
export async function gzipOpen(
  path: string,
  mode: OpenMode = "r",
  options: OpenOptions = {}
): Promise<StreamHandle> {
  return openHandle(path, mode, true, options);
}

/**
 * Open a file, hand the handle to `use`, and close it however `use` exits
 *
 * @example
 * ```typescript
 * await withMaybeGzip("out/sequences.fa.gz", "w", async (handle) => {
 *   await handle.write(">chr1\nACGT\n");
 * });
 * ```
 */
export async function withMaybeGzip<T>(
  path: string,
  mode: OpenMode,
  use: (handle: StreamHandle) => Promise<T> | T,
  options: OpenOptions = {}
): Promise<T> {
  const handle = await openMaybeGzip(path, mode, options);
  try {
    return await use(handle);
  } finally {
    await handle.close();
  }
}

async function openHandle(
  path: string,
  mode: OpenMode,
  compressed: boolean,
  options: OpenOptions
): Promise<StreamHandle> {
  const mergedOptions = mergeOptions(options);
  const scope = await Effect.runPromise(Scope.make());

  try {
    const file = await runFileEffect(
      Effect.gen(function* () {
        const fs = yield* FileSystem.FileSystem;
        return yield* fs.open(path, { flag: mode });
      }).pipe(Scope.extend(scope)),
      path,
      "open"
    );
    return new ScopedStreamHandle(path, mode, compressed, file, scope, mergedOptions);
  } catch (error) {
    await Effect.runPromise(Scope.close(scope, Exit.void));
    throw error;
  }
}

function mergeOptions(options: OpenOptions): Required<OpenOptions> {
  const validationResult = OpenOptionsSchema(options);
  if (validationResult instanceof type.errors) {
    throw new InvalidArgumentError(`Invalid open options: ${validationResult.summary}`);
  }

  return { ...DEFAULT_OPTIONS, ...options };
}
