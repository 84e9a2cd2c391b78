import type { Comparator, Equality, Orientation, Transform } from "./types.js";

/**
 * Contract shared by every container in the collection family.
 */
export interface Collection<K> extends Iterable<K> {
  size(): number;
  isEmpty(): boolean;
  contains(key: K): boolean;
  clear(): void;
  copy(): Collection<K>;
  equals(other: Collection<K>, eq?: Equality<K>): boolean;
  toString(): string;
}

/**
 * Priority queue contract.
 *
 * `poll` and `peek` throw UnderflowError on an empty queue; iteration yields keys
 * in priority order without touching the queue.
 */
export interface PQ<K> extends Collection<K> {
  insert(key: K): void;
  poll(): K;
  peek(): K;

  copy(): PQ<K>;
  /** Copy whose keys are `transform(key)`. The transform must keep relative order. */
  deepcopy(transform: Transform<K>): PQ<K>;

  /** Caller-supplied comparator, or undefined when keys order themselves. */
  comparator(): Comparator<K> | undefined;
  orientation(): Orientation;
  /** Keys in storage order (implementation-defined). */
  toArray(): K[];
}

export interface TopKSelector<T> {
  /**
   * Returns top K items by comparator.
   * Comparator should behave like Array.sort: <0 means a before b.
   */
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}
