import { describe, it, expect } from "vitest";
import { BinaryHeap } from "./BinaryHeap";

describe("BinaryHeap", () => {
  it("pops in comparator order", () => {
    const heap = new BinaryHeap<number>((a, b) => a - b);
    for (const n of [5, 1, 4, 1, 9, 2, 6]) heap.push(n);

    const out: number[] = [];
    while (heap.size > 0) {
      const n = heap.pop();
      if (n !== undefined) out.push(n);
    }

    expect(out).toEqual([1, 1, 2, 4, 5, 6, 9]);
    expect(heap.pop()).toBeUndefined();
  });

  it("keeps equal keys in insertion order when the comparator includes a sequence", () => {
    const heap = new BinaryHeap<{ key: number; seq: number }>((a, b) => a.key - b.key || a.seq - b.seq);
    ["a", "b", "c", "d"].forEach((_, seq) => heap.push({ key: 1, seq }));
    heap.push({ key: 0, seq: 4 });

    expect(heap.peek()).toEqual({ key: 0, seq: 4 });
    heap.pop();
    expect([heap.pop(), heap.pop(), heap.pop(), heap.pop()].map((n) => n?.seq)).toEqual([0, 1, 2, 3]);
  });
});
