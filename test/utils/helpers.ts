/**
 * Shared helpers for the test suites
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { NDArray } from "../../src/operations/core/ndarray";

/**
 * Drain an async iterable into an array
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

/**
 * Async iterable over the given items, in order
 */
export async function* fromItems<T>(items: readonly T[]): AsyncIterable<T> {
  yield* items;
}

/**
 * Plain number list of an array's elements; fails when the array is missing
 */
export function valuesOf(array: NDArray | undefined): number[] {
  if (array === undefined) {
    throw new Error("expected an array, got undefined");
  }
  return Array.from(array.data);
}

/**
 * Per-suite scratch directory
 */
export function createFixtureDir(name: string): { dir: string; path: (file: string) => string; remove: () => void } {
  const dir = mkdtempSync(join(tmpdir(), `trackfill-${name}-`));
  return {
    dir,
    path: (file: string) => join(dir, file),
    remove: () => rmSync(dir, { recursive: true, force: true }),
  };
}
