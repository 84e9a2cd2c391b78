export * from "./impl/index.js";
export * from "./errors.js";
export type { Collection, PQ, TopKSelector } from "./heap.js";
export type { Comparable, Comparator, Equality, Ordering, Orientation, Transform } from "./types.js";
