import type { Comparable } from "./types.js";

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isInteger(v) ? v : undefined;
}

export function asPositiveInt(v: unknown): number | undefined {
  const n = asInt(v);
  return n !== undefined && n > 0 ? n : undefined;
}

/** Parses an env-style string as a positive integer. */
export function parsePositiveInt(raw: string | undefined): number | undefined {
  if (raw === undefined || !/^\s*\d+\s*$/.test(raw)) return undefined;
  return asPositiveInt(Number(raw));
}

export function isAbsent(v: unknown): v is null | undefined {
  return v === null || v === undefined;
}

export function isComparable<K>(v: unknown): v is Comparable<K> {
  return typeof v === "object" && v !== null && "compareTo" in v && typeof v.compareTo === "function";
}
