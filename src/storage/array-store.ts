/**
 * Named array storage consumed by the load operations
 *
 * Any backend (an HDF5 or Zarr writer, a database) can sit behind
 * `ArrayStore`; `InMemoryArrayStore` keeps everything in a Map.
 */

import { InvalidArgumentError } from "../errors";
import { cloneArray, type NDArray } from "../operations/core/ndarray";

export type AttributeValue = string | number | boolean;

export type ArrayAttributes = Readonly<Record<string, AttributeValue>>;

/**
 * Storage port for named arrays and their attributes
 */
export interface ArrayStore {
  /** Store an array, replacing any array already under `name` */
  putArray(name: string, array: NDArray): Promise<void>;
  getArray(name: string): Promise<NDArray | undefined>;
  /** Merge attributes into those already recorded for `name` */
  putAttributes(name: string, attributes: ArrayAttributes): Promise<void>;
  getAttributes(name: string): Promise<ArrayAttributes>;
  listArrays(): Promise<string[]>;
}

/**
 * Map-backed store; arrays are copied on the way in and on the way out
 *
 * @example
 * ```typescript
 * const store = new InMemoryArrayStore();
 * await store.putArray("chr1/maxs", fillArray(0, [4]));
 * await store.listArrays(); // ["chr1/maxs"]
 * ```
 */
export class InMemoryArrayStore implements ArrayStore {
  private readonly arrays = new Map<string, NDArray>();
  private readonly attributes = new Map<string, ArrayAttributes>();

  async putArray(name: string, array: NDArray): Promise<void> {
    this.arrays.set(checkName(name), cloneArray(array));
  }

  async getArray(name: string): Promise<NDArray | undefined> {
    const array = this.arrays.get(name);
    return array === undefined ? undefined : cloneArray(array);
  }

  async putAttributes(name: string, attributes: ArrayAttributes): Promise<void> {
    const key = checkName(name);
    this.attributes.set(key, { ...this.attributes.get(key), ...attributes });
  }

  async getAttributes(name: string): Promise<ArrayAttributes> {
    return { ...this.attributes.get(name) };
  }

  async listArrays(): Promise<string[]> {
    return [...this.arrays.keys()].sort();
  }

  /** Whether an array is stored under `name` */
  has(name: string): boolean {
    return this.arrays.has(name);
  }

  get size(): number {
    return this.arrays.size;
  }
}

function checkName(name: string): string {
  if (name.length === 0) {
    throw new InvalidArgumentError("Array name cannot be empty");
  }
  return name;
}
