import type { CacheEntry, CacheKey } from "@subforge/shared";
import { consoleLogger, type Logger } from "../lib/logger.js";

/** Backing storage for finished results. Implementations must be safe to call concurrently. */
export interface ResultStore {
  get(key: CacheKey): Promise<CacheEntry | undefined>;
  put(key: CacheKey, entry: CacheEntry): Promise<void>;
}

export function cacheKeyToString(key: CacheKey): string {
  return `${key.fingerprint}:${key.tier}`;
}

export interface MemoryResultStoreOptions {
  /** Entry lifetime; null keeps entries until evicted by size. */
  ttlSeconds?: number | null;
  /** Oldest entries are dropped beyond this; null is unbounded. */
  maxEntries?: number | null;
  now?: () => number;
}

interface StoredEntry {
  entry: CacheEntry;
  storedAt: number;
}

export class MemoryResultStore implements ResultStore {
  // Map iteration order is insertion order, so the first key is the oldest write.
  private readonly entries = new Map<string, StoredEntry>();
  private readonly ttlMs: number | null;
  private readonly maxEntries: number | null;
  private readonly now: () => number;

  constructor(options: MemoryResultStoreOptions = {}) {
    this.ttlMs = options.ttlSeconds == null ? null : options.ttlSeconds * 1000;
    this.maxEntries = options.maxEntries ?? null;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  async get(key: CacheKey): Promise<CacheEntry | undefined> {
    const id = cacheKeyToString(key);
    const stored = this.entries.get(id);
    if (!stored) return undefined;
    if (this.ttlMs !== null && this.now() - stored.storedAt >= this.ttlMs) {
      this.entries.delete(id);
      return undefined;
    }
    return stored.entry;
  }

  async put(key: CacheKey, entry: CacheEntry): Promise<void> {
    const id = cacheKeyToString(key);
    this.entries.delete(id);
    this.entries.set(id, { entry, storedAt: this.now() });
    if (this.maxEntries === null) return;
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }
}

export interface CacheLookup {
  entry: CacheEntry;
  /** False only for the caller whose computation produced the entry. */
  hit: boolean;
}

/**
 * Result cache keyed by content fingerprint and model tier.
 *
 * Requests for a key already being resolved join the in-flight lookup instead
 * of starting their own, so a backend transcription runs at most once per key
 * at a time. Waiters see `hit: true`.
 */
export class ResultCache {
  private readonly inFlight = new Map<string, Promise<CacheLookup>>();

  constructor(
    private readonly store: ResultStore,
    private readonly logger: Logger = consoleLogger,
  ) {}

  get(key: CacheKey): Promise<CacheEntry | undefined> {
    return this.store.get(key);
  }

  put(key: CacheKey, entry: CacheEntry): Promise<void> {
    return this.store.put(key, Object.freeze({ ...entry }));
  }

  getOrCompute(key: CacheKey, compute: () => Promise<CacheEntry>): Promise<CacheLookup> {
    const id = cacheKeyToString(key);
    const pending = this.inFlight.get(id);
    if (pending) {
      return pending.then(({ entry }) => ({ entry, hit: true }));
    }

    const lookup = this.resolve(key, compute).finally(() => {
      this.inFlight.delete(id);
    });
    this.inFlight.set(id, lookup);
    return lookup;
  }

  private async resolve(key: CacheKey, compute: () => Promise<CacheEntry>): Promise<CacheLookup> {
    const cached = await this.store.get(key);
    if (cached) {
      return { entry: cached, hit: true };
    }

    const entry = Object.freeze({ ...(await compute()) });
    try {
      await this.store.put(key, entry);
    } catch (err) {
      // The result is still valid for this request; only reuse is lost.
      this.logger.warn(`[cache] Failed to store ${cacheKeyToString(key)}: ${String(err)}`);
    }
    return { entry, hit: false };
  }
}
