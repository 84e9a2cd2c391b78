import { ExhaustedError } from "../errors.js";
import type { PQ } from "../heap.js";

/**
 * Yields keys in priority order by polling a private copy of the queue.
 *
 * The source queue is never touched, so changes made to it mid-iteration don't
 * show up here. Not restartable: a drained iterator stays drained.
 */
export class HeapIterator<K> implements IterableIterator<K> {
  constructor(private readonly pq: PQ<K>) {}

  hasNext(): boolean {
    return !this.pq.isEmpty();
  }

  nextKey(): K {
    if (!this.hasNext()) throw new ExhaustedError("iterator depleted");
    return this.pq.poll();
  }

  next(): IteratorResult<K> {
    if (!this.hasNext()) return { done: true, value: undefined };
    return { done: false, value: this.pq.poll() };
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this;
  }
}
