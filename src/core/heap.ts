/** Array.sort semantics: negative when `a` ranks ahead of `b`. */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Priority queue backing bounded selection. The root is whatever the heap's
 * ordering puts first; `toArray` has no guaranteed order.
 */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  pop(): T | undefined;
  toArray(): T[];
}

/**
 * Picks the best `k` of a stream without sorting all of it. Used for search hits
 * and for compaction survivors.
 *
 * Results come back best first. Items the comparator calls equal keep no particular
 * order, so callers that need a stable tie-break fold it into the comparator.
 */
export interface TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[];
}
