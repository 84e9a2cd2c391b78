import { ResourceExhaustionError } from "../errors.js";
import type { Logger } from "../../logger.js";

/**
 * Owned, explicitly sized storage for a 1-indexed complete binary tree.
 *
 * Slot 0 is a sentinel and never holds a key. Live keys sit in [1, length];
 * every slot past `length` is kept `undefined` so removed keys can be collected.
 *
 * Capacity doubles when an insert would fill the last slot and halves once a
 * removal drops occupancy to a quarter, never going below `floor`.
 */
export class SlotBuffer<K> {
  private slots: Array<K | undefined>;
  private count = 0;

  constructor(
    readonly floor: number,
    private readonly log: Logger,
    initialCapacity: number = floor,
  ) {
    this.slots = allocate<K>(Math.max(initialCapacity, floor));
  }

  get length(): number {
    return this.count;
  }

  get capacity(): number {
    return this.slots.length;
  }

  get(i: number): K {
    const key = i >= 1 && i <= this.count ? this.slots[i] : undefined;
    if (key === undefined) {
      throw new RangeError(`slot ${i} is outside [1, ${this.count}]`);
    }
    return key;
  }

  swap(i: number, j: number): void {
    const a = this.get(i);
    this.slots[i] = this.get(j);
    this.slots[j] = a;
  }

  /** Writes `key` into the slot after the last live one. Capacity must already allow it. */
  append(key: K): number {
    const i = this.count + 1;
    if (i >= this.slots.length) {
      throw new RangeError(`append past capacity ${this.slots.length}`);
    }
    this.slots[i] = key;
    this.count = i;
    return i;
  }

  /** Removes and returns the key in the last live slot. */
  removeLast(): K {
    const key = this.get(this.count);
    this.slots[this.count] = undefined;
    this.count--;
    return key;
  }

  ensureCapacityForInsert(): void {
    if (this.count + 1 >= this.slots.length) {
      this.resize(this.slots.length * 2);
    }
  }

  ensureCapacityForRemoval(): void {
    const cap = this.slots.length;
    if (cap > this.floor && this.count <= cap / 4) {
      this.resize(Math.max(Math.floor(cap / 2), this.floor));
    }
  }

  /** Drops every key and goes back to floor capacity. */
  reset(): void {
    this.slots = allocate<K>(this.floor);
    this.count = 0;
  }

  /**
   * Index-preserving copy of the live slots into a fresh buffer sized for the
   * current occupancy. With `transform`, each key is replaced by its result.
   */
  clone(transform?: (key: K) => K): SlotBuffer<K> {
    const copy = new SlotBuffer<K>(this.floor, this.log, this.count * 2);
    for (let i = 1; i <= this.count; i++) {
      const key = this.get(i);
      copy.slots[i] = transform ? transform(key) : key;
    }
    copy.count = this.count;
    return copy;
  }

  /** Live keys in slot order. */
  toArray(): K[] {
    const out: K[] = [];
    for (let i = 1; i <= this.count; i++) out.push(this.get(i));
    return out;
  }

  /** Every slot including the sentinel and the empty tail, for inspection. */
  dump(): Array<K | undefined> {
    return Array.from(this.slots);
  }

  private resize(capacity: number): void {
    const from = this.slots.length;
    const next = allocate<K>(capacity);
    for (let i = 1; i <= this.count; i++) next[i] = this.slots[i];
    this.slots = next;
    this.log.debug({ from, to: capacity, length: this.count }, "slot buffer resized");
  }
}

function allocate<K>(capacity: number): Array<K | undefined> {
  try {
    return new Array<K | undefined>(capacity).fill(undefined);
  } catch (e) {
    if (e instanceof RangeError) {
      throw new ResourceExhaustionError(`cannot allocate ${capacity} slots`, { cause: e });
    }
    throw e;
  }
}
