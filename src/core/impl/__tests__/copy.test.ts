import { describe, expect, it } from "vitest";
import { HeapPQ, InvalidArgumentError } from "../../index.js";

function drain<K>(pq: HeapPQ<K>): K[] {
  const out: K[] = [];
  while (!pq.isEmpty()) out.push(pq.poll());
  return out;
}

interface Job {
  priority: number;
  name: string;
}

const byPriority = (a: Job, b: Job) => a.priority - b.priority;

describe("copy", () => {
  it("is independent of the source", () => {
    const pq = new HeapPQ<number>();
    for (const k of [5, 3, 8]) pq.insert(k);

    const cp = pq.copy();
    cp.insert(1);

    expect(pq.size()).toBe(3);
    expect(pq.peek()).toBe(3);
    expect(cp.size()).toBe(4);
    expect(cp.peek()).toBe(1);

    pq.poll();
    expect(cp.size()).toBe(4);
  });

  it("shares key references", () => {
    const urgent: Job = { priority: 1, name: "urgent" };
    const pq = new HeapPQ<Job>({ comparator: byPriority });
    pq.insert({ priority: 5, name: "later" });
    pq.insert(urgent);

    const cp = pq.copy();
    expect(cp.poll()).toBe(urgent);
    expect(pq.peek()).toBe(urgent);
  });

  it("carries over ordering, orientation and floor", () => {
    const cmp = (a: number, b: number) => a - b;
    const pq = new HeapPQ<number>({ comparator: cmp, orientation: "max", capacity: 4 });
    for (const k of [1, 7, 3]) pq.insert(k);

    const cp = pq.copy();
    expect(cp.comparator()).toBe(cmp);
    expect(cp.orientation()).toBe("max");
    expect(cp.toArray()).toEqual(pq.toArray());
    expect(cp.capacity()).toBe(6);

    drain(cp);
    expect(cp.capacity()).toBe(4);
  });

  it("sizes an empty copy at the floor", () => {
    const pq = new HeapPQ<number>({ capacity: 16 });
    expect(pq.copy().capacity()).toBe(16);
  });
});

describe("deepcopy", () => {
  it("applies the transform to every key", () => {
    const pq = new HeapPQ<number>();
    for (const k of [3, 1, 2]) pq.insert(k);

    const cp = pq.deepcopy((k) => k + 1);

    expect(drain(cp)).toEqual([2, 3, 4]);
    expect(drain(pq)).toEqual([1, 2, 3]);
  });

  it("produces distinct key objects", () => {
    const pq = new HeapPQ<Job>({ comparator: byPriority });
    const original: Job = { priority: 2, name: "build" };
    pq.insert(original);

    const cp = pq.deepcopy((job) => ({ ...job }));
    const copied = cp.peek();

    expect(copied).not.toBe(original);
    expect(copied).toEqual(original);

    copied.name = "renamed";
    expect(original.name).toBe("build");
  });

  it("rejects a missing transform", () => {
    const pq = new HeapPQ<number>();
    // untyped callers can still pass nothing
    expect(() => Reflect.apply(pq.deepcopy, pq, [undefined])).toThrow(InvalidArgumentError);
  });

  it("rejects a transform that yields no key, only when it is applied", () => {
    const pq = new HeapPQ<number | null>({ comparator: (a, b) => (a ?? 0) - (b ?? 0) });
    const toNull = () => null;

    expect(pq.deepcopy(toNull).size()).toBe(0);

    pq.insert(1);
    expect(() => pq.deepcopy(toNull)).toThrow(InvalidArgumentError);
  });
});
