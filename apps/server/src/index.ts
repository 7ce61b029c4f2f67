import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { loadConfig, type ServerConfig } from "./config.js";
import { openCacheDatabase } from "./db/index.js";
import { FfmpegAudioExtractor } from "./lib/ffmpeg.js";
import { MediaNormalizer } from "./lib/media-normalizer.js";
import { WhisperServiceBackend } from "./lib/speech-backend.js";
import { ModelRegistry } from "./services/model-registry.js";
import { TranscriptionPipeline } from "./services/pipeline.js";
import { MemoryResultStore, ResultCache, type ResultStore } from "./services/result-cache.js";
import { SqliteResultStore } from "./services/sqlite-result-store.js";
import { TranscriptionAdapter } from "./services/transcription-adapter.js";

function createResultStore(config: ServerConfig): ResultStore {
  if (config.cacheStore === "sqlite") {
    const { db } = openCacheDatabase(config.cacheDatabaseUrl);
    console.log(`[server] Caching results in ${config.cacheDatabaseUrl}`);
    return new SqliteResultStore(db, { ttlSeconds: config.cacheTtlSeconds });
  }
  return new MemoryResultStore({
    ttlSeconds: config.cacheTtlSeconds,
    maxEntries: config.cacheMaxEntries,
  });
}

const config = loadConfig(process.env);

const cache = new ResultCache(createResultStore(config));
const extractor = new FfmpegAudioExtractor({
  ffmpegPath: config.ffmpegPath,
  ffprobePath: config.ffprobePath,
});
const registry = new ModelRegistry(new WhisperServiceBackend({ baseUrl: config.asrServiceUrl }));
const pipeline = new TranscriptionPipeline({
  normalizer: new MediaNormalizer(extractor),
  adapter: new TranscriptionAdapter(registry),
  cache,
});

const app = createApp({
  pipeline,
  cache,
  defaultTier: config.defaultModelTier,
  uploadMaxBytes: config.uploadMaxBytes,
});

serve(
  {
    fetch: app.fetch,
    port: config.port,
  },
  (info) => {
    console.log(`[server] SubForge listening on http://localhost:${info.port}`);
    console.log(`[server] Speech backend at ${config.asrServiceUrl}, default tier "${config.defaultModelTier}"`);
  },
);
