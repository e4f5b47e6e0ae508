/**
 * Tests for observation-count checks and the extrema fold
 */

import { describe, expect, test } from "vitest";
import { InconsistentShapeError, InvalidArgumentError } from "../../../src/errors";
import {
  EMPTY_TRACK_ACCUMULATOR,
  foldBatch,
  foldExtremaPair,
  initNumObs,
  newExtrema,
  reduceFirstAxis,
} from "../../../src/operations/core/extrema";
import { createArray, fillArray, fromValues } from "../../../src/operations/core/ndarray";
import { valuesOf } from "../../utils/helpers";

const BATCH_2x5 = fromValues([1, 2, 3, 4, 5, 6, 7, 8, 9, 10], [2, 5]);

describe("initNumObs", () => {
  test("should take the second dimension of the first batch", () => {
    expect(initNumObs(undefined, BATCH_2x5)).toBe(5);
  });

  test("should accept a batch that matches the session", () => {
    expect(initNumObs(5, BATCH_2x5)).toBe(5);
  });

  test("should reject a batch that disagrees with the session", () => {
    expect(() => initNumObs(6, BATCH_2x5)).toThrow(InconsistentShapeError);
    expect(() => initNumObs(6, BATCH_2x5)).toThrow(
      "Observation count mismatch: session has 6 columns, batch has 5"
    );
  });

  test("should require 2-D batches", () => {
    expect(() => initNumObs(undefined, createArray([4]))).toThrow(InvalidArgumentError);
    expect(() => initNumObs(undefined, createArray([1, 2, 3]))).toThrow(
      "Expected a 2-D batch, got shape (1, 2, 3)"
    );
  });
});

describe("reduceFirstAxis", () => {
  const matrix = fromValues([3, 1, 2, 0, 5, 4], [2, 3], "int32");

  test("should take column minima and maxima", () => {
    expect(valuesOf(reduceFirstAxis("min", matrix))).toEqual([0, 1, 2]);
    expect(valuesOf(reduceFirstAxis("max", matrix))).toEqual([3, 5, 4]);
  });

  test("should drop the first dimension and keep the dtype", () => {
    const reduced = reduceFirstAxis("max", matrix);
    expect(reduced.shape).toEqual([3]);
    expect(reduced.dtype).toBe("int32");
  });

  test("should reduce higher-dimensional arrays", () => {
    const cube = fromValues([0, 1, 2, 3, 4, 5, 6, 7], [2, 2, 2]);
    const reduced = reduceFirstAxis("max", cube);

    expect(reduced.shape).toEqual([2, 2]);
    expect(valuesOf(reduced)).toEqual([4, 5, 6, 7]);
  });

  test("should propagate NaN", () => {
    const withNaN = fromValues([1, Number.NaN, 2, 3], [2, 2]);
    expect(valuesOf(reduceFirstAxis("min", withNaN))).toEqual([1, Number.NaN]);
  });

  test("should reject an empty first axis", () => {
    expect(() => reduceFirstAxis("min", createArray([0, 3]))).toThrow(InvalidArgumentError);
  });

  test("should reject 0-D arrays", () => {
    expect(() => reduceFirstAxis("max", fillArray(1, []))).toThrow(InvalidArgumentError);
  });
});

describe("newExtrema", () => {
  test("should return the batch reduction when there is no running value", () => {
    expect(valuesOf(newExtrema("max", fromValues([1, 5, 3], [1, 3])))).toEqual([1, 5, 3]);
  });

  test("should combine element-wise with the running value", () => {
    const first = newExtrema("max", fromValues([1, 5, 3], [1, 3]));
    const next = newExtrema("max", fromValues([4, 0, 6], [1, 3]), first);
    expect(valuesOf(next)).toEqual([4, 5, 6]);

    const firstMin = newExtrema("min", fromValues([1, 5, 3], [1, 3]));
    const nextMin = newExtrema("min", fromValues([4, 0, 6], [1, 3]), firstMin);
    expect(valuesOf(nextMin)).toEqual([1, 0, 3]);
  });

  test("should not modify its inputs", () => {
    const running = fromValues([1, 1, 1], [3]);
    const batch = fromValues([4, 0, 6], [1, 3]);

    newExtrema("max", batch, running);

    expect(valuesOf(running)).toEqual([1, 1, 1]);
    expect(valuesOf(batch)).toEqual([4, 0, 6]);
  });

  test("should promote mixed dtypes to float64", () => {
    const running = fillArray(1, [2]);
    const combined = newExtrema("max", fromValues([0.5, 2.5], [1, 2]), running);

    expect(running.dtype).toBe("int32");
    expect(combined.dtype).toBe("float64");
    expect(valuesOf(combined)).toEqual([1, 2.5]);
  });

  test("should reject a running value of another shape", () => {
    const running = fromValues([1, 2, 3], [3]);
    expect(() => newExtrema("min", fromValues([1, 2], [1, 2]), running)).toThrow(InconsistentShapeError);
  });
});

describe("foldExtremaPair", () => {
  test("should fold both halves", () => {
    const first = foldExtremaPair(undefined, fromValues([2, 8, 5, 1], [2, 2]));
    const pair = foldExtremaPair(first, fromValues([3, 0], [1, 2]));

    expect(valuesOf(pair.mins)).toEqual([2, 0]);
    expect(valuesOf(pair.maxs)).toEqual([5, 8]);
  });
});

describe("foldBatch", () => {
  test("should accumulate counts and extrema across batches", () => {
    let accumulator = EMPTY_TRACK_ACCUMULATOR;
    accumulator = foldBatch(accumulator, fromValues([1, 5, 3, 2], [2, 2]));
    accumulator = foldBatch(accumulator, fromValues([0, 9], [1, 2]));

    expect(accumulator.numObs).toBe(2);
    expect(accumulator.batches).toBe(2);
    expect(accumulator.rows).toBe(3);
    expect(valuesOf(accumulator.extrema?.mins)).toEqual([0, 2]);
    expect(valuesOf(accumulator.extrema?.maxs)).toEqual([3, 9]);
  });

  test("should keep mins at or below maxs", () => {
    let accumulator = EMPTY_TRACK_ACCUMULATOR;
    for (const values of [[4, -1, 7], [2, 3, 7], [-5, 0, 8]]) {
      accumulator = foldBatch(accumulator, fromValues(values, [1, 3]));
    }

    const mins = valuesOf(accumulator.extrema?.mins);
    const maxs = valuesOf(accumulator.extrema?.maxs);
    expect(mins).toEqual([-5, -1, 7]);
    expect(maxs).toEqual([4, 3, 8]);
    mins.forEach((min, i) => {
      expect(min).toBeLessThanOrEqual(maxs[i]);
    });
  });

  test("should reject a batch with a different observation count", () => {
    const accumulator = foldBatch(EMPTY_TRACK_ACCUMULATOR, fromValues([1, 2], [1, 2]));
    expect(() => foldBatch(accumulator, fromValues([1, 2, 3], [1, 3]))).toThrow(InconsistentShapeError);
  });

  test("should not modify the accumulator it was given", () => {
    const accumulator = foldBatch(EMPTY_TRACK_ACCUMULATOR, fromValues([1, 2], [1, 2]));
    foldBatch(accumulator, fromValues([5, 5], [1, 2]));

    expect(EMPTY_TRACK_ACCUMULATOR).toEqual({ batches: 0, rows: 0 });
    expect(accumulator.batches).toBe(1);
    expect(valuesOf(accumulator.extrema?.maxs)).toEqual([1, 2]);
  });
});
