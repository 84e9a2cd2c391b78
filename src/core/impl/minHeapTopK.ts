import type { TopKSelector } from "../heap.js";
import type { Comparator } from "../types.js";
import { createMaxPQ } from "./heapPQ.js";

/**
 * Keeps a bounded heap of the best K items.
 *
 * Comparator uses Array.sort semantics (a before b if <0), so "best" sorts first and
 * a max-oriented heap over the same comparator keeps the *worst of the best* at the root.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    if (k <= 0) return [];

    const heap = createMaxPQ<T>({ comparator });

    for (const item of items) {
      if (heap.size() < k) {
        heap.insert(item);
        continue;
      }
      // if item is better than worst => replace
      if (comparator(item, heap.peek()) < 0) {
        heap.poll();
        heap.insert(item);
      }
    }

    // polling a max heap yields worst first
    const out: T[] = [];
    while (!heap.isEmpty()) out.push(heap.poll());
    return out.reverse();
  }
}
