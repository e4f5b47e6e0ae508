/**
 * Array primitives used by the track accumulation operations
 */

export {
  EMPTY_TRACK_ACCUMULATOR,
  type ExtremaPair,
  type ExtremumKind,
  foldBatch,
  foldExtremaPair,
  initNumObs,
  newExtrema,
  reduceFirstAxis,
  type TrackAccumulator,
} from "./extrema";
export {
  allocate,
  cloneArray,
  createArray,
  type DType,
  fillArray,
  fromValues,
  type InferredDType,
  inferDType,
  isDType,
  isIntegerDType,
  type NDArray,
  sameShape,
  sizeOf,
  type TypedArray,
} from "./ndarray";
