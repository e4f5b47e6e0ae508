/**
 * Load a numeric track into an array store as per-observation extrema
 *
 * Batches of `rows × numObs` values are folded into running minimum and
 * maximum arrays of length `numObs`, stored as `<name>/mins` and
 * `<name>/maxs`; `<name>` itself gets `numObs`, `rows` and `batches`.
 */

import { MalformedInputError } from "../errors";
import type { ArrayStore } from "../storage/array-store";
import { EMPTY_TRACK_ACCUMULATOR, foldBatch, type TrackAccumulator } from "./core/extrema";
import type { NDArray } from "./core/ndarray";
import type { LoadTrackOptions } from "./types";

/**
 * Fold every batch and store the resulting extrema
 *
 * @returns The final accumulator
 * @throws {MalformedInputError} If there are no batches
 * @throws {InvalidArgumentError} If a batch is not 2-D or has no rows
 * @throws {InconsistentShapeError} If batches disagree on the observation count
 *
 * @example
 * ```typescript
 * const acc = await loadTrack("dnase", readBatches("dnase.bedGraph"), store);
 * console.log(acc.numObs, acc.rows);
 * ```
 */
export async function loadTrack(
  name: string,
  batches: Iterable<NDArray> | AsyncIterable<NDArray>,
  store: ArrayStore,
  options: LoadTrackOptions = {}
): Promise<TrackAccumulator> {
  let accumulator = EMPTY_TRACK_ACCUMULATOR;
  for await (const batch of batches) {
    accumulator = foldBatch(accumulator, batch);
    options.onProgress?.(accumulator.batches);
  }

  const { numObs, extrema } = accumulator;
  if (numObs === undefined || extrema === undefined) {
    throw new MalformedInputError(`Track '${name}' has no batches`, "track");
  }

  await store.putArray(`${name}/mins`, extrema.mins);
  await store.putArray(`${name}/maxs`, extrema.maxs);
  await store.putAttributes(name, {
    numObs,
    rows: accumulator.rows,
    batches: accumulator.batches,
  });

  return accumulator;
}
