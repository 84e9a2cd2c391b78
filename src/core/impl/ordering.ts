import { ConfigurationError } from "../errors.js";
import { isComparable } from "../validation.js";
import type { Comparator, Ordering, Orientation } from "../types.js";

export function orderingOf<K>(comparator?: Comparator<K>): Ordering<K> {
  return comparator ? { kind: "explicit", compare: comparator } : { kind: "intrinsic" };
}

function threeWay<T extends number | string | bigint>(a: T, b: T): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Orders two keys by what they are, for heaps built without a comparator.
 *
 * Throws ConfigurationError when the pair has no intrinsic order, so the failure
 * only shows up once a comparison is actually needed.
 */
export function intrinsicCompare(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return threeWay(a, b);
  if (typeof a === "string" && typeof b === "string") return threeWay(a, b);
  if (typeof a === "bigint" && typeof b === "bigint") return threeWay(a, b);
  if (a instanceof Date && b instanceof Date) return threeWay(a.getTime(), b.getTime());
  if (isComparable<unknown>(a)) return a.compareTo(b);

  throw new ConfigurationError("key type is not comparable and no ordering function was provided");
}

/** Resolves the comparison a heap runs for every swim/sink step. */
export function resolveCompare<K>(ordering: Ordering<K>, orientation: Orientation): Comparator<K> {
  const base: Comparator<K> = ordering.kind === "explicit" ? ordering.compare : intrinsicCompare;
  if (orientation === "min") return base;
  return (a, b) => base(b, a);
}
