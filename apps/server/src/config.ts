import {
  ASR_SERVICE_BASE_URL_DEFAULT,
  DEFAULT_MODEL_TIER,
  modelTierSchema,
  type ModelTier,
} from "@subforge/shared";

export type CacheStoreKind = "memory" | "sqlite";

export interface ServerConfig {
  port: number;
  asrServiceUrl: string;
  ffmpegPath: string;
  ffprobePath: string;
  defaultModelTier: ModelTier;
  cacheStore: CacheStoreKind;
  cacheDatabaseUrl: string;
  /** Entry lifetime in seconds; null keeps entries for the life of the store. */
  cacheTtlSeconds: number | null;
  /** Upper bound on in-memory entries; null leaves the cache unbounded. */
  cacheMaxEntries: number | null;
  uploadMaxBytes: number;
}

type Env = Record<string, string | undefined>;

function parsePositiveInt(env: Env, name: string, fallback: number): number;
function parsePositiveInt(env: Env, name: string, fallback: null): number | null;
function parsePositiveInt(env: Env, name: string, fallback: number | null): number | null {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function resolveModelTier(env: Env): ModelTier {
  const raw = env["DEFAULT_MODEL_TIER"] ?? DEFAULT_MODEL_TIER;
  const parsed = modelTierSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `DEFAULT_MODEL_TIER must be one of ${modelTierSchema.options.join(", ")}, got "${raw}"`,
    );
  }
  return parsed.data;
}

function resolveCacheStore(env: Env): CacheStoreKind {
  const raw = env["CACHE_STORE"] ?? "memory";
  if (raw !== "memory" && raw !== "sqlite") {
    throw new Error(`CACHE_STORE must be "memory" or "sqlite", got "${raw}"`);
  }
  return raw;
}

export function loadConfig(env: Env): ServerConfig {
  const config: ServerConfig = {
    port: parsePositiveInt(env, "PORT", 4000),
    asrServiceUrl: (env["ASR_SERVICE_URL"] ?? ASR_SERVICE_BASE_URL_DEFAULT).replace(/\/+$/, ""),
    ffmpegPath: env["FFMPEG_PATH"] ?? "ffmpeg",
    ffprobePath: env["FFPROBE_PATH"] ?? "ffprobe",
    defaultModelTier: resolveModelTier(env),
    cacheStore: resolveCacheStore(env),
    cacheDatabaseUrl: env["CACHE_DATABASE_URL"] ?? "subforge-cache.db",
    cacheTtlSeconds: parsePositiveInt(env, "CACHE_TTL_SECONDS", null),
    cacheMaxEntries: parsePositiveInt(env, "CACHE_MAX_ENTRIES", null),
    uploadMaxBytes: parsePositiveInt(env, "UPLOAD_MAX_BYTES", 500 * 1024 * 1024),
  };

  if (config.cacheStore !== "memory" && config.cacheMaxEntries !== null) {
    throw new Error(
      `CACHE_MAX_ENTRIES only applies to CACHE_STORE=memory, got "${config.cacheStore}"`,
    );
  }
  return config;
}
