import { config } from "../../config.js";
import { createLogger, type Logger } from "../../logger.js";
import { InvalidArgumentError, UnderflowError } from "../errors.js";
import type { Collection, PQ } from "../heap.js";
import type { Comparator, Equality, Ordering, Orientation, Transform } from "../types.js";
import { asPositiveInt, isAbsent } from "../validation.js";
import { HeapIterator } from "./heapIterator.js";
import { orderingOf, resolveCompare } from "./ordering.js";
import { SlotBuffer } from "./slotBuffer.js";

export interface HeapOptions<K> {
  /** Initial capacity, also the capacity the store never shrinks below. */
  capacity?: number;
  /** Omit to order keys intrinsically (numbers, strings, bigints, dates, Comparable). */
  comparator?: Comparator<K>;
  /** "min" (default) keeps the smallest key at the root, "max" the largest. */
  orientation?: Orientation;
  logger?: Logger;
}

/**
 * Binary-heap priority queue over a resizing, 1-indexed slot buffer.
 *
 * - insert / poll: amortized O(log n)
 * - peek, size, isEmpty: O(1)
 * - contains, copy, deepcopy: O(n)
 * - full iteration: O(n log n) time, O(n) extra space (drains a shallow copy)
 */
export class HeapPQ<K> implements PQ<K> {
  private readonly ordering: Ordering<K>;
  private readonly dir: Orientation;
  private readonly compare: Comparator<K>;
  private readonly log: Logger;
  private readonly store: SlotBuffer<K>;

  /**
   * @param store - already populated buffer to adopt in place of a fresh one; copies
   *   pass their clone here and the capacity option is then ignored.
   */
  constructor(options: HeapOptions<K> = {}, store?: SlotBuffer<K>) {
    this.ordering = orderingOf(options.comparator);
    this.dir = options.orientation ?? "min";
    this.compare = resolveCompare(this.ordering, this.dir);
    this.log = options.logger ?? createLogger("heap");
    this.store = store ?? new SlotBuffer<K>(floorOf(options.capacity), this.log);
  }

  size(): number {
    return this.store.length;
  }

  isEmpty(): boolean {
    return this.size() === 0;
  }

  capacity(): number {
    return this.store.capacity;
  }

  comparator(): Comparator<K> | undefined {
    return this.ordering.kind === "explicit" ? this.ordering.compare : undefined;
  }

  orientation(): Orientation {
    return this.dir;
  }

  insert(key: K): void {
    if (isAbsent(key)) throw new InvalidArgumentError("argument to insert() is null or undefined");

    this.store.ensureCapacityForInsert();
    this.swim(this.store.append(key));
  }

  poll(): K {
    if (this.isEmpty()) throw new UnderflowError("underflow: can't poll() from empty PQ");

    this.store.swap(1, this.store.length);
    const key = this.store.removeLast();
    this.sink(1);
    this.store.ensureCapacityForRemoval();
    return key;
  }

  peek(): K {
    if (this.isEmpty()) throw new UnderflowError("underflow: can't peek() at empty PQ");
    return this.store.get(1);
  }

  contains(key: K): boolean {
    if (isAbsent(key)) throw new InvalidArgumentError("argument to contains() is null or undefined");

    for (let i = 1; i <= this.store.length; i++) {
      if (Object.is(this.store.get(i), key)) return true;
    }
    return false;
  }

  clear(): void {
    this.store.reset();
  }

  copy(): HeapPQ<K> {
    return this.withStore(this.store.clone());
  }

  /**
   * Copy whose keys are `transform(key)`, placed in the same slots as their
   * originals. The transform must keep the keys' relative order.
   */
  deepcopy(transform: Transform<K>): HeapPQ<K> {
    if (typeof transform !== "function") {
      throw new InvalidArgumentError("argument to deepcopy() is null or undefined");
    }
    return this.withStore(
      this.store.clone((key) => {
        const copied = transform(key);
        if (isAbsent(copied)) throw new InvalidArgumentError("deepcopy() transform returned null or undefined");
        return copied;
      }),
    );
  }

  toArray(): K[] {
    return this.store.toArray();
  }

  iterator(): HeapIterator<K> {
    return new HeapIterator(this.copy());
  }

  [Symbol.iterator](): Iterator<K> {
    return this.iterator();
  }

  equals(other: Collection<K>, eq: Equality<K> = Object.is): boolean {
    if (this === other) return true;
    if (this.size() !== other.size()) return false;

    const theirs = other[Symbol.iterator]();
    for (const key of this) {
      const next = theirs.next();
      if (next.done || !eq(key, next.value)) return false;
    }
    return true;
  }

  toString(): string {
    const name = this.dir === "min" ? "MinPQ" : "MaxPQ";
    if (this.isEmpty()) return `${name}[0] [ ]`;
    return `${name}[${this.size()}] [ ${Array.from(this, String).join(", ")} ]`;
  }

  private withStore(store: SlotBuffer<K>): HeapPQ<K> {
    return new HeapPQ<K>({ comparator: this.comparator(), orientation: this.dir, logger: this.log }, store);
  }

  private less(i: number, j: number): boolean {
    return this.compare(this.store.get(i), this.store.get(j)) < 0;
  }

  private swim(k: number): void {
    while (k > 1) {
      const parent = k >> 1;
      if (!this.less(k, parent)) break;
      this.store.swap(k, parent);
      k = parent;
    }
  }

  private sink(k: number): void {
    const n = this.store.length;
    while (k * 2 <= n) {
      let j = k * 2;
      // ties go to the left child
      if (j + 1 <= n && this.less(j + 1, j)) j++;
      if (!this.less(j, k)) break;
      this.store.swap(j, k);
      k = j;
    }
  }
}

function floorOf(capacity: number | undefined): number {
  if (capacity === undefined) return config.defaultCapacity;
  const floor = asPositiveInt(capacity);
  if (floor === undefined) throw new InvalidArgumentError(`invalid capacity: ${String(capacity)}`);
  return floor;
}

export function createMinPQ<K>(options: Omit<HeapOptions<K>, "orientation"> = {}): HeapPQ<K> {
  return new HeapPQ<K>({ ...options, orientation: "min" });
}

export function createMaxPQ<K>(options: Omit<HeapOptions<K>, "orientation"> = {}): HeapPQ<K> {
  return new HeapPQ<K>({ ...options, orientation: "max" });
}
