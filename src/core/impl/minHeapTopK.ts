import type { Comparator, Heap, TopKSelector } from "../heap.js";

/** Binary heap ordered by `before`: the root is the item for which `before(root, x)` holds against all others. */
class ArrayHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  constructor(private readonly before: (a: T, b: T) => boolean) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    this.data.push(item);
    this.siftUp(this.data.length - 1);
  }

  pop(): T | undefined {
    const a = this.data;
    const top = a[0];
    const last = a.pop();
    if (a.length && last !== undefined) {
      a[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  private at(i: number): T {
    const v = this.data[i];
    if (v === undefined) throw new RangeError(`heap index ${i} out of bounds`);
    return v;
  }

  private swap(i: number, j: number): void {
    const tmp = this.at(i);
    this.data[i] = this.at(j);
    this.data[j] = tmp;
  }

  private siftUp(i: number): void {
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.before(this.at(i), this.at(p))) return;
      this.swap(i, p);
      i = p;
    }
  }

  private siftDown(i: number): void {
    const n = this.data.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let first = i;

      if (l < n && this.before(this.at(l), this.at(first))) first = l;
      if (r < n && this.before(this.at(r), this.at(first))) first = r;
      if (first === i) return;

      this.swap(i, first);
      i = first;
    }
  }
}

/**
 * Keeps a fixed-size min-heap of the best K items.
 *
 * Comparator uses Array.sort semantics (a before b if <0), "best" first. The heap
 * root is the worst of the current best, so each new item costs O(log k).
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    if (k <= 0) return [];

    // root = worst kept item
    const heap = new ArrayHeap<T>((a, b) => comparator(a, b) > 0);

    for (const item of items) {
      if (heap.size() < k) {
        heap.push(item);
        continue;
      }
      const worst = heap.peek();
      if (worst !== undefined && comparator(item, worst) < 0) {
        heap.pop();
        heap.push(item);
      }
    }

    return heap.toArray().sort(comparator);
  }
}
