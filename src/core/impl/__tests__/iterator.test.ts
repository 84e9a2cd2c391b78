import { describe, expect, it } from "vitest";
import { ExhaustedError, HeapPQ, createMaxPQ } from "../../index.js";

describe("HeapIterator", () => {
  it("yields every key in priority order and leaves the heap alone", () => {
    const pq = new HeapPQ<number>();
    const keys = [12, 4, 9, 4, 1, 15, 7, 3, 10, 2, 8];
    for (const k of keys) pq.insert(k);
    const before = pq.toArray();

    const seen = [...pq];

    expect(seen).toEqual([...keys].sort((a, b) => a - b));
    expect(pq.size()).toBe(keys.length);
    expect(pq.toArray()).toEqual(before);
  });

  it("follows the heap orientation", () => {
    const pq = createMaxPQ<string>();
    for (const w of ["b", "d", "a", "c"]) pq.insert(w);
    expect(Array.from(pq)).toEqual(["d", "c", "b", "a"]);
  });

  it("does not see changes made to the source after creation", () => {
    const pq = new HeapPQ<number>();
    for (const k of [3, 1, 2]) pq.insert(k);

    const iter = pq.iterator();
    expect(iter.nextKey()).toBe(1);

    pq.insert(0);
    pq.poll();
    pq.poll();

    expect(iter.nextKey()).toBe(2);
    expect(iter.nextKey()).toBe(3);
    expect(pq.size()).toBe(2);
  });

  it("throws ExhaustedError past the last key", () => {
    const pq = new HeapPQ<number>();
    pq.insert(42);

    const iter = pq.iterator();
    expect(iter.hasNext()).toBe(true);
    expect(iter.nextKey()).toBe(42);
    expect(iter.hasNext()).toBe(false);
    expect(() => iter.nextKey()).toThrow(ExhaustedError);
    expect(iter.next()).toEqual({ done: true, value: undefined });
  });

  it("is not restartable", () => {
    const pq = new HeapPQ<number>();
    for (const k of [2, 1]) pq.insert(k);

    const iter = pq.iterator();
    expect([...iter]).toEqual([1, 2]);
    expect([...iter]).toEqual([]);
  });

  it("yields nothing for an empty heap", () => {
    expect([...new HeapPQ<number>()]).toEqual([]);
  });
});
