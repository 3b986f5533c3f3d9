import type { TopKSelector } from "../heap.js";
import { decay } from "./decay.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";
import { requireCount, requirePositive } from "./validation.js";

export const DEFAULT_FREQUENCY = 1;

export interface CompactOptions<T> {
  capacity: number;
  /** Same unit as `ageOf` (days for every store in this package). */
  halfLife: number;
  /** Caller-computed age of an entry; the compactor has no clock. */
  ageOf: (entry: T) => number;
  /** Recurrence count; untracked entries count as 1. */
  frequencyOf?: (entry: T) => number | undefined;
  topK?: TopKSelector<Scored<T>>;
}

export interface CompactResult<T> {
  /** Survivors, in their original order. */
  kept: T[];
  evicted: T[];
}

interface Scored<T> {
  entry: T;
  index: number;
  relevance: number;
}

export function relevanceOf(age: number, halfLife: number, frequency: number = DEFAULT_FREQUENCY): number {
  return decay(age, halfLife) * (1 + frequency);
}

/**
 * Shrinks a bounded log to `capacity` by relevance instead of insertion order:
 * relevance = decay(age, halfLife) * (1 + frequency). A frequent, slightly older
 * entry can outlive a recent one-off. Equal relevance keeps the newer entry.
 */
export function compactByRelevance<T>(entries: readonly T[], options: CompactOptions<T>): CompactResult<T> {
  const capacity = requireCount("capacity", options.capacity);
  const halfLife = requirePositive("halfLife", options.halfLife);
  if (entries.length <= capacity) return { kept: [...entries], evicted: [] };

  const scored: Array<Scored<T>> = entries.map((entry, index) => ({
    entry,
    index,
    relevance: relevanceOf(options.ageOf(entry), halfLife, options.frequencyOf?.(entry) ?? DEFAULT_FREQUENCY),
  }));

  const selector = options.topK ?? new MinHeapTopKSelector<Scored<T>>();
  const survivors = new Set(
    selector.topK(scored, capacity, (a, b) => b.relevance - a.relevance || b.index - a.index).map((s) => s.index),
  );

  const kept: T[] = [];
  const evicted: T[] = [];
  for (const s of scored) {
    (survivors.has(s.index) ? kept : evicted).push(s.entry);
  }
  return { kept, evicted };
}
