import type { MODEL_TIERS } from "./constants.js";

// ─── ASR service response types ───────────────────────────────────────────────
// These match the service's OpenAI-compatible JSON (snake_case where it has any).

export interface HealthResponse {
  status: "ok";
}

export interface AsrSegment {
  start: number;
  end: number;
  text?: string;
}

export interface AsrTranscriptionResponse {
  text?: string;
  language?: string;
  duration?: number;
  segments?: AsrSegment[];
}

export interface AsrModelLoadResponse {
  status: "ok";
  model: string;
}

// ─── Domain types ─────────────────────────────────────────────────────────────

export type ModelTier = (typeof MODEL_TIERS)[number];

export interface Segment {
  /** 1-based position in the backend's emission order. */
  index: number;
  start: number;
  end: number;
  text: string;
}

export interface TranscriptionResult {
  fullText: string;
  segments: readonly Segment[];
}

export interface CacheKey {
  /** Lowercase SHA-256 hex of the original uploaded bytes. */
  fingerprint: string;
  tier: ModelTier;
}

export interface CacheEntry {
  transcriptText: string;
  srtText: string;
}

export interface SrtCue {
  index: number;
  start: number;
  end: number;
  text: string;
}

export interface OutputArtifact {
  filename: string;
  mimeType: string;
  content: string;
}

export interface OutputArtifacts {
  subtitles: OutputArtifact;
  transcript: OutputArtifact;
}

export type IngestionState =
  | "IDLE"
  | "NORMALIZING"
  | "CACHE_LOOKUP"
  | "LOADING_MODEL"
  | "TRANSCRIBING"
  | "BUILDING"
  | "CACHING"
  | "DONE"
  | "FAILED";

export type PipelineErrorKind = "EXTRACTION_FAILED" | "MODEL_LOAD_FAILED" | "TRANSCRIPTION_FAILED";

export interface TranscriptionResponse {
  cacheKey: CacheKey;
  cached: boolean;
  transcript: OutputArtifact;
  subtitles: OutputArtifact;
}

export interface ModelsResponse {
  tiers: ModelTier[];
  defaultTier: ModelTier;
}
