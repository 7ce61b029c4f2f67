import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";

export type CacheDatabase = BetterSQLite3Database<typeof schema>;

export interface OpenedCacheDatabase {
  db: CacheDatabase;
  close(): void;
}

// Kept in step with schema.ts.
const CREATE_CACHED_RESULTS = `
  CREATE TABLE IF NOT EXISTS cached_results (
    fingerprint TEXT NOT NULL,
    model_tier TEXT NOT NULL,
    transcript_text TEXT NOT NULL,
    srt_text TEXT NOT NULL,
    stored_at INTEGER NOT NULL,
    PRIMARY KEY (fingerprint, model_tier)
  )
`;

/** Opens (creating if needed) the result cache database. Pass ":memory:" for a throwaway one. */
export function openCacheDatabase(path: string): OpenedCacheDatabase {
  const sqlite = new Database(path);

  // WAL has no effect on an in-memory database.
  if (path !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  sqlite.exec(CREATE_CACHED_RESULTS);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
