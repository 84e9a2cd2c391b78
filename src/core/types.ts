/** Shared core types used by module contracts. */

/** Three-way comparison: <0 means a before b, 0 equal priority, >0 a after b. */
export type Comparator<K> = (a: K, b: K) => number;

/** Per-key transform used by deep copies. */
export type Transform<K> = (key: K) => K;

/** Equality used by `contains`-style lookups and `equals`. */
export type Equality<K> = (a: K, b: K) => boolean;

/** Which end of the ordering sits at the root. */
export type Orientation = "min" | "max";

/**
 * Keys that know how to order themselves.
 *
 * `compareTo` follows the same sign convention as {@link Comparator}.
 */
export interface Comparable<K> {
  compareTo(other: K): number;
}

/**
 * How a heap orders its keys.
 * - explicit: a caller-supplied comparator decides
 * - intrinsic: numbers, strings, bigints, dates or {@link Comparable} keys decide
 */
export type Ordering<K> =
  | { kind: "explicit"; compare: Comparator<K> }
  | { kind: "intrinsic" };
