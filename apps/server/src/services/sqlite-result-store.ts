import { and, eq } from "drizzle-orm";
import type { CacheEntry, CacheKey } from "@subforge/shared";
import type { CacheDatabase } from "../db/index.js";
import { cachedResults } from "../db/schema.js";
import type { ResultStore } from "./result-cache.js";

export interface SqliteResultStoreOptions {
  ttlSeconds?: number | null;
  now?: () => number;
}

/** Result store that survives restarts, backed by the `cached_results` table. */
export class SqliteResultStore implements ResultStore {
  private readonly ttlMs: number | null;
  private readonly now: () => number;

  constructor(
    private readonly db: CacheDatabase,
    options: SqliteResultStoreOptions = {},
  ) {
    this.ttlMs = options.ttlSeconds == null ? null : options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  async get(key: CacheKey): Promise<CacheEntry | undefined> {
    const match = and(
      eq(cachedResults.fingerprint, key.fingerprint),
      eq(cachedResults.modelTier, key.tier),
    );
    const rows = await this.db.select().from(cachedResults).where(match).limit(1);
    const row = rows[0];
    if (!row) return undefined;

    if (this.ttlMs !== null && this.now() - row.storedAt >= this.ttlMs) {
      await this.db.delete(cachedResults).where(match);
      return undefined;
    }
    return { transcriptText: row.transcriptText, srtText: row.srtText };
  }

  async put(key: CacheKey, entry: CacheEntry): Promise<void> {
    const storedAt = this.now();
    await this.db
      .insert(cachedResults)
      .values({
        fingerprint: key.fingerprint,
        modelTier: key.tier,
        transcriptText: entry.transcriptText,
        srtText: entry.srtText,
        storedAt,
      })
      .onConflictDoUpdate({
        target: [cachedResults.fingerprint, cachedResults.modelTier],
        set: { transcriptText: entry.transcriptText, srtText: entry.srtText, storedAt },
      });
  }
}
