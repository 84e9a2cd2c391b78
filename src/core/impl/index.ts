export { HeapPQ, createMinPQ, createMaxPQ, type HeapOptions } from "./heapPQ.js";
export { HeapIterator } from "./heapIterator.js";
export { SlotBuffer } from "./slotBuffer.js";
export { intrinsicCompare, orderingOf, resolveCompare } from "./ordering.js";
export { MinHeapTopKSelector } from "./minHeapTopK.js";
