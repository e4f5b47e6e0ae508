/**
 * Effect platform layer selection and program execution
 *
 * All file system access goes through the Effect FileSystem service; this
 * module provides the Node.js layer for it and turns failed programs into
 * IOError / NotFoundError rejections.
 */

import type { FileSystem } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import { Effect, Either } from "effect";
import { type FileOperation, IOError } from "../errors";

/**
 * Get the Effect platform layer providing FileSystem and Path
 */
export function getPlatform() {
  return NodeContext.layer;
}

/**
 * Run a file system program and surface its failure as an IOError
 *
 * @param program Effect program needing only the FileSystem service
 * @param filePath Path the program operates on, for error context
 * @param operation Operation label used in the error
 * @returns Promise resolving to the program's result
 * @throws {NotFoundError} If the platform reports the path as missing
 * @throws {IOError} For any other failure
 */
export async function runFileEffect<A, E>(
  program: Effect.Effect<A, E, FileSystem.FileSystem>,
  filePath: string,
  operation: FileOperation
): Promise<A> {
  const result = await Effect.runPromise(program.pipe(Effect.either, Effect.provide(getPlatform())));

  if (Either.isLeft(result)) {
    throw IOError.fromSystemError(operation, filePath, result.left);
  }
  return result.right;
}
