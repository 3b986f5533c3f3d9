import { ageInDays } from "../core/impl/decay.js";
import { compactByRelevance } from "../core/impl/compactor.js";
import { DEFAULT_TOP_K, RelevanceIndex, type RelevanceIndexOptions } from "../core/impl/relevanceIndex.js";
import { requireCount, requirePositive } from "../core/impl/validation.js";
import { silentLogger, type Logger } from "../logger.js";

/** Per-project error log size. */
export const PROJECT_ERROR_LOG_CAPACITY = 30;
/** Cross-project recurring-error log size. */
export const CROSS_PROJECT_LOG_CAPACITY = 20;
export const DEFAULT_LOG_HALF_LIFE_DAYS = 30;

export interface LogEvent {
  /** Dedup key, e.g. an error type; repeats of a key merge into one entry. */
  key: string;
  /** Searchable description. The latest non-empty text wins. */
  text: string;
  /** Where it happened (project name, file...). */
  source?: string;
}

export interface LogEntry {
  key: string;
  text: string;
  frequency: number;
  /** epoch ms */
  firstSeen: number;
  lastSeen: number;
  sources: string[];
}

export interface EventLogOptions {
  capacity: number;
  halfLifeDays?: number;
  index?: RelevanceIndexOptions;
  logger?: Logger;
}

export interface SimilarEntry {
  entry: LogEntry;
  score: number;
}

function copy(e: LogEntry): LogEntry {
  return { ...e, sources: [...e.sources] };
}

function toEpoch(at: Date | number): number {
  return typeof at === "number" ? at : at.getTime();
}

/**
 * Bounded, deduplicating event log. Over capacity it keeps the most relevant entries
 * (recent and recurring) rather than the newest ones.
 *
 * Persistence stays with the caller: `entries()` out, constructor `initial` back in.
 */
export class EventLog {
  private readonly capacity: number;
  private readonly halfLifeDays: number;
  private readonly indexOptions: RelevanceIndexOptions;
  private readonly logger: Logger;

  private items: LogEntry[];
  private snapshot: RelevanceIndex | undefined;

  constructor(options: EventLogOptions, initial: readonly LogEntry[] = []) {
    this.capacity = requireCount("capacity", options.capacity);
    this.halfLifeDays = requirePositive("halfLifeDays", options.halfLifeDays ?? DEFAULT_LOG_HALF_LIFE_DAYS);
    this.indexOptions = options.index ?? {};
    this.logger = options.logger ?? silentLogger;
    this.items = initial.map(copy);
  }

  get size(): number {
    return this.items.length;
  }

  entries(): LogEntry[] {
    return this.items.map(copy);
  }

  get(key: string): LogEntry | undefined {
    const e = this.items.find((x) => x.key === key);
    return e ? copy(e) : undefined;
  }

  /**
   * Adds an event or bumps the entry with the same key. Compacts when the log
   * grows past capacity, using `at` as the current time.
   */
  record(event: LogEvent, at: Date | number): LogEntry {
    const ts = toEpoch(at);
    let entry = this.items.find((x) => x.key === event.key);

    if (entry) {
      entry.frequency++;
      entry.lastSeen = Math.max(entry.lastSeen, ts);
      if (event.text) entry.text = event.text;
    } else {
      entry = { key: event.key, text: event.text, frequency: 1, firstSeen: ts, lastSeen: ts, sources: [] };
      this.items.push(entry);
    }
    if (event.source && !entry.sources.includes(event.source)) entry.sources.push(event.source);

    this.snapshot = undefined;
    const result = copy(entry);
    if (this.items.length > this.capacity) this.compact(ts);
    return result;
  }

  /** Applies relevance compaction; returns the evicted entries. */
  compact(now: Date | number): LogEntry[] {
    const nowMs = toEpoch(now);
    const { kept, evicted } = compactByRelevance(this.items, {
      capacity: this.capacity,
      halfLife: this.halfLifeDays,
      ageOf: (e) => ageInDays(e.lastSeen, nowMs),
      frequencyOf: (e) => e.frequency,
    });
    if (evicted.length === 0) return [];

    this.items = kept;
    this.snapshot = undefined;
    this.logger.debug("event log compacted", { kept: kept.length, evicted: evicted.map((e) => e.key) });
    return evicted.map(copy);
  }

  /** Entries whose text is lexically closest to `query`. */
  findSimilar(query: string, topK: number = DEFAULT_TOP_K): SimilarEntry[] {
    const index = this.currentIndex();
    const out: SimilarEntry[] = [];
    for (const hit of index.search(query, topK)) {
      const entry = this.items.find((x) => x.key === hit.name);
      if (entry) out.push({ entry: copy(entry), score: hit.score });
    }
    return out;
  }

  /** Entries seen at least `minFrequency` times, most frequent first (ties: most recent). */
  recurring(minFrequency = 2): LogEntry[] {
    return this.items
      .filter((e) => e.frequency >= minFrequency)
      .sort((a, b) => b.frequency - a.frequency || b.lastSeen - a.lastSeen)
      .map(copy);
  }

  private currentIndex(): RelevanceIndex {
    // rebuilt wholesale after any change, never patched
    if (!this.snapshot) {
      this.snapshot = RelevanceIndex.build(
        this.items.map((e): [string, string] => [e.key, `${e.key.replace(/[-_.]+/g, " ")} ${e.text}`]),
        this.indexOptions,
      );
    }
    return this.snapshot;
  }
}
