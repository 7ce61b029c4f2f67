import { integer, primaryKey, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const cachedResults = sqliteTable(
  "cached_results",
  {
    // Lowercase SHA-256 hex of the uploaded bytes.
    fingerprint: text("fingerprint").notNull(),
    modelTier: text("model_tier").notNull(),
    transcriptText: text("transcript_text").notNull(),
    srtText: text("srt_text").notNull(),
    // Epoch milliseconds of the last write.
    storedAt: integer("stored_at").notNull()
  },
  (table) => ({
    cachedResultsPk: primaryKey({ columns: [table.fingerprint, table.modelTier] })
  })
);
