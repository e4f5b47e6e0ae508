/**
 * Running extrema over batches of track values
 *
 * Each batch is a `rows × numObs` array. A session fixes the observation
 * count with its first batch and keeps element-wise minimum and maximum
 * arrays that every later batch is folded into. All functions are pure.
 *
 * @module extrema
 */

import { InconsistentShapeError, InvalidArgumentError } from "../../errors";
import { allocate, type DType, type NDArray, sameShape, sizeOf } from "./ndarray";

export type ExtremumKind = "min" | "max";

/**
 * Element-wise minimum and maximum of everything folded so far
 */
export interface ExtremaPair {
  readonly mins: NDArray;
  readonly maxs: NDArray;
}

/**
 * State of one accumulation session, threaded through `foldBatch`
 */
export interface TrackAccumulator {
  readonly numObs?: number;
  readonly extrema?: ExtremaPair;
  /** Batches folded */
  readonly batches: number;
  /** Rows folded, across all batches */
  readonly rows: number;
}

export const EMPTY_TRACK_ACCUMULATOR: TrackAccumulator = { batches: 0, rows: 0 };

const COMBINE: { readonly [K in ExtremumKind]: (a: number, b: number) => number } = {
  min: Math.min,
  max: Math.max,
};

/**
 * Establish or check the observation count of a session
 *
 * @param numObs Count fixed by earlier batches, or undefined for the first one
 * @param continuous A 2-D batch
 * @returns The batch's second dimension
 * @throws {InvalidArgumentError} If the batch is not 2-D
 * @throws {InconsistentShapeError} If the batch disagrees with `numObs`
 */
export function initNumObs(numObs: number | undefined, continuous: NDArray): number {
  if (continuous.shape.length !== 2) {
    throw new InvalidArgumentError(
      `Expected a 2-D batch, got shape (${continuous.shape.join(", ")})`
    );
  }

  const batchNumObs = continuous.shape[1];
  if (numObs !== undefined && numObs !== batchNumObs) {
    throw InconsistentShapeError.forObservationCount(numObs, batchNumObs);
  }
  return batchNumObs;
}

/**
 * Minimum or maximum along axis 0: shape `[n, ...rest]` becomes `rest`
 *
 * NaN in any row yields NaN at that position.
 *
 * @throws {InvalidArgumentError} If the array is 0-D or has no rows
 */
export function reduceFirstAxis<D extends DType>(kind: ExtremumKind, data: NDArray<D>): NDArray<D> {
  if (data.shape.length === 0) {
    throw new InvalidArgumentError("Cannot reduce a 0-D array along axis 0");
  }
  const [rowCount, ...rest] = data.shape;
  if (rowCount === 0) {
    throw new InvalidArgumentError(`Cannot take the ${kind} of an empty first axis`);
  }

  const combine = COMBINE[kind];
  const stride = sizeOf(rest);
  const result = allocate(rest, data.dtype);

  for (let j = 0; j < stride; j++) {
    result.data[j] = data.data[j];
  }
  for (let row = 1; row < rowCount; row++) {
    const offset = row * stride;
    for (let j = 0; j < stride; j++) {
      result.data[j] = combine(result.data[j], data.data[offset + j]);
    }
  }
  return result;
}

/**
 * Fold a batch into a running extremum
 *
 * Returns the batch's own reduction when there is no running value yet.
 * Mixed dtypes combine into float64.
 *
 * @throws {InconsistentShapeError} If the reduction and `extrema` differ in shape
 *
 * @example
 * ```typescript
 * const first = newExtrema("max", fromValues([1, 5, 3], [1, 3]));
 * const next = newExtrema("max", fromValues([4, 0, 6], [1, 3]), first);
 * // next.data: [4, 5, 6]
 * ```
 */
export function newExtrema(kind: ExtremumKind, data: NDArray, extrema?: NDArray): NDArray {
  const reduced = reduceFirstAxis(kind, data);
  if (extrema === undefined) {
    return reduced;
  }

  if (!sameShape(reduced.shape, extrema.shape)) {
    throw new InconsistentShapeError(
      `Extrema shape mismatch: running ${kind} has shape (${extrema.shape.join(", ")}), batch reduces to (${reduced.shape.join(", ")})`,
      extrema.shape,
      reduced.shape
    );
  }

  const combine = COMBINE[kind];
  const dtype: DType = reduced.dtype === extrema.dtype ? reduced.dtype : "float64";
  const result = allocate(reduced.shape, dtype);
  for (let i = 0; i < result.data.length; i++) {
    result.data[i] = combine(extrema.data[i], reduced.data[i]);
  }
  return result;
}

/**
 * Fold a batch into both halves of an extrema pair
 */
export function foldExtremaPair(pair: ExtremaPair | undefined, data: NDArray): ExtremaPair {
  return {
    mins: newExtrema("min", data, pair?.mins),
    maxs: newExtrema("max", data, pair?.maxs),
  };
}

/**
 * Fold one `rows × numObs` batch into a session
 *
 * @example
 * ```typescript
 * let acc = EMPTY_TRACK_ACCUMULATOR;
 * for (const batch of batches) {
 *   acc = foldBatch(acc, batch);
 * }
 * ```
 */
export function foldBatch(accumulator: TrackAccumulator, continuous: NDArray): TrackAccumulator {
  const numObs = initNumObs(accumulator.numObs, continuous);
  const extrema = foldExtremaPair(accumulator.extrema, continuous);

  return {
    numObs,
    extrema,
    batches: accumulator.batches + 1,
    rows: accumulator.rows + continuous.shape[0],
  };
}
