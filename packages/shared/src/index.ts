// ─── ASR service response types ───────────────────────────────────────────────
export type { HealthResponse } from "./types.js";
export type { AsrSegment } from "./types.js";
export type { AsrTranscriptionResponse } from "./types.js";
export type { AsrModelLoadResponse } from "./types.js";

export {
  healthResponseSchema,
  asrSegmentSchema,
  asrTranscriptionResponseSchema,
  asrModelLoadResponseSchema,
} from "./schemas.js";
export type {
  HealthResponseFromSchema,
  AsrSegmentFromSchema,
  AsrTranscriptionResponseFromSchema,
  AsrModelLoadResponseFromSchema,
} from "./schemas.js";

// ─── Domain types ─────────────────────────────────────────────────────────────
export type {
  ModelTier,
  Segment,
  TranscriptionResult,
  CacheKey,
  CacheEntry,
  SrtCue,
  OutputArtifact,
  OutputArtifacts,
  IngestionState,
  PipelineErrorKind,
  TranscriptionResponse,
  ModelsResponse,
} from "./types.js";

export {
  modelTierSchema,
  fingerprintSchema,
  cacheKeySchema,
  outputArtifactSchema,
  transcriptionResponseSchema,
  modelsResponseSchema,
  errorResponseSchema,
} from "./schemas.js";
export type {
  ModelTierFromSchema,
  CacheKeyFromSchema,
  OutputArtifactFromSchema,
  TranscriptionResponseFromSchema,
  ModelsResponseFromSchema,
  ErrorResponseFromSchema,
} from "./schemas.js";

// ─── State machine ────────────────────────────────────────────────────────────
export { canTransition, isTerminalState, VALID_TRANSITIONS } from "./stateMachine.js";

// ─── SRT ──────────────────────────────────────────────────────────────────────
export { formatTimestamp, buildSrt, parseTimestamp, parseSrt } from "./srt.js";
export type { SrtSegmentInput } from "./srt.js";
export { baseName, fileExtension, buildOutputArtifacts } from "./artifacts.js";

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  MODEL_TIERS,
  DEFAULT_MODEL_TIER,
  AUDIO_EXTENSIONS,
  VIDEO_EXTENSIONS,
  TRANSCRIPTION_SAMPLE_RATE_HZ,
  SRT_MIME_TYPE,
  TRANSCRIPT_MIME_TYPE,
  ASR_SERVICE_BASE_URL_DEFAULT,
} from "./constants.js";
