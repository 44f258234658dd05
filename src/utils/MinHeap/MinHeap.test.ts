import { describe, expect, it } from "vitest";
import { MinHeap } from "./MinHeap";

const drain = <T,>(heap: MinHeap<T>) => {
  const out: T[] = [];
  for (let v = heap.pop(); v !== undefined; v = heap.pop()) out.push(v);
  return out;
};

describe("MinHeap", () => {
  it("pops in key order", () => {
    const heap = new MinHeap<string>();
    heap.push(5, "e");
    heap.push(1, "a");
    heap.push(3, "c");
    heap.push(2, "b");
    heap.push(4, "d");
    expect(heap.size()).toBe(5);
    expect(heap.peekKey()).toBe(1);
    expect(drain(heap)).toEqual(["a", "b", "c", "d", "e"]);
    expect(heap.size()).toBe(0);
  });

  it("pops equal keys in insertion order", () => {
    const heap = new MinHeap<string>();
    for (const v of ["w", "x", "y", "z"]) heap.push(7, v);
    heap.push(6, "first");
    expect(drain(heap)).toEqual(["first", "w", "x", "y", "z"]);
  });

  it("returns undefined when empty", () => {
    const heap = new MinHeap<number>();
    expect(heap.pop()).toBeUndefined();
    expect(heap.peekKey()).toBeUndefined();
  });

  it("tracks membership", () => {
    const heap = new MinHeap<string>();
    heap.push(1, "a");
    expect(heap.has("a")).toBe(true);
    heap.pop();
    expect(heap.has("a")).toBe(false);
  });

  it("re-keys a queued value in both directions", () => {
    const heap = new MinHeap<string>();
    heap.push(10, "a");
    heap.push(20, "b");
    heap.push(30, "c");
    heap.update(5, "c");
    heap.update(40, "a");
    expect(drain(heap)).toEqual(["c", "b", "a"]);
  });

  it("keeps the insertion sequence of a re-keyed value for tie-breaking", () => {
    const heap = new MinHeap<string>();
    heap.push(3, "early");
    heap.push(9, "late");
    heap.push(3, "middle");
    heap.update(3, "late");
    expect(drain(heap)).toEqual(["early", "late", "middle"]);
  });

  it("rejects duplicate pushes and unknown updates", () => {
    const heap = new MinHeap<string>();
    heap.push(1, "a");
    expect(() => heap.push(2, "a")).toThrow("already queued");
    expect(() => heap.update(2, "b")).toThrow("not queued");
  });
});
