/**
 * N-dimensional numeric arrays over typed-array storage
 *
 * Row-major `{ dtype, shape, data }` values with the allocation, scalar
 * fill and dtype inference used by the accumulation helpers.
 *
 * @module ndarray
 */

import { type } from "arktype";
import { InvalidArgumentError } from "../../errors";
import { ShapeSchema } from "../../types";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Element types backed by a typed array
 */
export type DType =
  | "int8"
  | "uint8"
  | "int16"
  | "uint16"
  | "int32"
  | "uint32"
  | "float32"
  | "float64";

/**
 * Dtypes chosen by `inferDType`
 */
export type InferredDType = "int32" | "float64";

export type TypedArray =
  | Int8Array
  | Uint8Array
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

/**
 * Dense row-major array
 */
export interface NDArray<D extends DType = DType> {
  readonly dtype: D;
  readonly shape: readonly number[];
  readonly data: TypedArray;
}

interface DTypeInfo {
  readonly allocate: (length: number) => TypedArray;
  readonly integer: boolean;
  readonly min: number;
  readonly max: number;
}

// =============================================================================
// CONSTANTS
// =============================================================================

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;
// Longest typed array Node 20 accepts on 64-bit hosts
const MAX_TYPED_ARRAY_LENGTH = 2 ** 32;

const DTYPE_INFO: { readonly [D in DType]: DTypeInfo } = {
  int8: { allocate: (n) => new Int8Array(n), integer: true, min: -128, max: 127 },
  uint8: { allocate: (n) => new Uint8Array(n), integer: true, min: 0, max: 255 },
  int16: { allocate: (n) => new Int16Array(n), integer: true, min: -32768, max: 32767 },
  uint16: { allocate: (n) => new Uint16Array(n), integer: true, min: 0, max: 65535 },
  int32: { allocate: (n) => new Int32Array(n), integer: true, min: INT32_MIN, max: INT32_MAX },
  uint32: { allocate: (n) => new Uint32Array(n), integer: true, min: 0, max: 4294967295 },
  float32: { allocate: (n) => new Float32Array(n), integer: false, min: -Infinity, max: Infinity },
  float64: { allocate: (n) => new Float64Array(n), integer: false, min: -Infinity, max: Infinity },
};

const DTypeSchema = type(
  "'int8' | 'uint8' | 'int16' | 'uint16' | 'int32' | 'uint32' | 'float32' | 'float64'"
);

// =============================================================================
// SHAPE HELPERS
// =============================================================================

/**
 * Number of elements described by a shape
 *
 * @throws {InvalidArgumentError} On negative or fractional dimensions, or a total size past 2^53 - 1
 */
export function sizeOf(shape: readonly number[]): number {
  const validationResult = ShapeSchema(shape);
  if (validationResult instanceof type.errors) {
    throw new InvalidArgumentError(`Invalid shape (${shape.join(", ")}): ${validationResult.summary}`);
  }

  const size = shape.reduce((product, dimension) => product * dimension, 1);
  if (!Number.isSafeInteger(size)) {
    throw new InvalidArgumentError(`Shape (${shape.join(", ")}) describes too many elements`);
  }
  return size;
}

export function sameShape(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((dimension, i) => dimension === b[i]);
}

/**
 * Whether a string names a supported dtype
 */
export function isDType(value: string): value is DType {
  return !(DTypeSchema(value) instanceof type.errors);
}

/**
 * Whether a dtype stores integers
 */
export function isIntegerDType(dtype: DType): boolean {
  return DTYPE_INFO[dtype].integer;
}

// =============================================================================
// CONSTRUCTION
// =============================================================================

/**
 * Pick the dtype for a scalar: int32 for integers that fit, float64 otherwise
 *
 * @example
 * ```typescript
 * inferDType(7);       // "int32"
 * inferDType(2 ** 40); // "float64"
 * inferDType(1.5);     // "float64"
 * ```
 */
export function inferDType(scalar: number): InferredDType {
  return Number.isInteger(scalar) && scalar >= INT32_MIN && scalar <= INT32_MAX ? "int32" : "float64";
}

/**
 * Zero-filled array
 */
export function createArray(shape: readonly number[]): NDArray<"float64">;
export function createArray<D extends DType>(shape: readonly number[], dtype: D): NDArray<D>;
export function createArray(shape: readonly number[], dtype: DType = "float64"): NDArray {
  return allocate(shape, checkDType(dtype));
}

/**
 * Array of the given shape with every element equal to `scalar`
 *
 * Without a dtype, one is inferred from the scalar. Integer dtypes truncate
 * fractional scalars toward zero.
 *
 * @throws {InvalidArgumentError} On an invalid shape or dtype, or a scalar the integer dtype cannot hold
 *
 * @example
 * ```typescript
 * fillArray(7, [3]);               // int32 [7, 7, 7]
 * fillArray(1.5, [2, 2]);          // float64 [[1.5, 1.5], [1.5, 1.5]]
 * fillArray(0, [4], "uint8");      // uint8 [0, 0, 0, 0]
 * ```
 */
export function fillArray<D extends DType>(scalar: number, shape: readonly number[], dtype: D): NDArray<D>;
export function fillArray(scalar: number, shape: readonly number[]): NDArray<InferredDType>;
export function fillArray(scalar: number, shape: readonly number[], dtype?: DType): NDArray {
  const resolved = checkDType(dtype ?? inferDType(scalar));
  checkScalar(scalar, resolved);

  const array = allocate(shape, resolved);
  for (let i = 0; i < array.data.length; i++) {
    array.data[i] = scalar;
  }
  return array;
}

/**
 * Array holding the given row-major values
 *
 * @throws {InvalidArgumentError} If the value count does not match the shape
 */
export function fromValues(values: readonly number[], shape: readonly number[]): NDArray<"float64">;
export function fromValues<D extends DType>(
  values: readonly number[],
  shape: readonly number[],
  dtype: D
): NDArray<D>;
export function fromValues(values: readonly number[], shape: readonly number[], dtype: DType = "float64"): NDArray {
  const array = allocate(shape, checkDType(dtype));
  if (values.length !== array.data.length) {
    throw new InvalidArgumentError(
      `Shape (${shape.join(", ")}) needs ${array.data.length} values, got ${values.length}`
    );
  }

  values.forEach((value, i) => {
    array.data[i] = value;
  });
  return array;
}

/**
 * Independent copy of an array
 */
export function cloneArray<D extends DType>(array: NDArray<D>): NDArray<D> {
  const copy = allocate(array.shape, array.dtype);
  copy.data.set(array.data);
  return copy;
}

/**
 * Allocate zeroed storage for a validated shape
 *
 * @throws {InvalidArgumentError} If the shape is invalid or too large to allocate
 */
export function allocate<D extends DType>(shape: readonly number[], dtype: D): NDArray<D> {
  const size = sizeOf(shape);
  if (size > MAX_TYPED_ARRAY_LENGTH) {
    throw new InvalidArgumentError(
      `Shape (${shape.join(", ")}) needs ${size} elements, more than a typed array can hold`
    );
  }

  try {
    return { dtype, shape: [...shape], data: DTYPE_INFO[dtype].allocate(size) };
  } catch (error) {
    if (error instanceof RangeError) {
      throw new InvalidArgumentError(`Cannot allocate ${dtype} array of shape (${shape.join(", ")}): ${error.message}`);
    }
    throw error;
  }
}

function checkDType<D extends DType>(dtype: D): D {
  if (!isDType(dtype)) {
    throw new InvalidArgumentError(`Unsupported dtype '${String(dtype)}'`);
  }
  return dtype;
}

function checkScalar(scalar: number, dtype: DType): void {
  const info = DTYPE_INFO[dtype];
  if (!info.integer) return;

  if (!Number.isFinite(scalar)) {
    throw new InvalidArgumentError(`Cannot store ${scalar} in an ${dtype} array`);
  }
  const truncated = Math.trunc(scalar);
  if (truncated < info.min || truncated > info.max) {
    throw new InvalidArgumentError(
      `Scalar ${scalar} is out of range for ${dtype} [${info.min}, ${info.max}]`
    );
  }
}
