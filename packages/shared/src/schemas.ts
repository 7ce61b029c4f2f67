import { z } from "zod";
import { MODEL_TIERS } from "./constants.js";

// ─── ASR service response schemas ─────────────────────────────────────────────

export const healthResponseSchema = z.object({
  status: z.literal("ok"),
});

export type HealthResponseFromSchema = z.infer<typeof healthResponseSchema>;

// Timing is passed through as the backend reports it, so only the types are checked.
export const asrSegmentSchema = z.object({
  start: z.number(),
  end: z.number(),
  text: z.string().nullish(),
});

export type AsrSegmentFromSchema = z.infer<typeof asrSegmentSchema>;

export const asrTranscriptionResponseSchema = z.object({
  text: z.string().nullish(),
  language: z.string().nullish(),
  duration: z.number().nullish(),
  segments: z.array(asrSegmentSchema).nullish(),
});

export type AsrTranscriptionResponseFromSchema = z.infer<typeof asrTranscriptionResponseSchema>;

export const asrModelLoadResponseSchema = z.object({
  status: z.literal("ok"),
  model: z.string(),
});

export type AsrModelLoadResponseFromSchema = z.infer<typeof asrModelLoadResponseSchema>;

// ─── Domain schemas ───────────────────────────────────────────────────────────

export const modelTierSchema = z.enum(MODEL_TIERS);

export type ModelTierFromSchema = z.infer<typeof modelTierSchema>;

export const fingerprintSchema = z
  .string()
  .regex(/^[a-f0-9]{64}$/, "Must be a lowercase SHA-256 hex string");

export const cacheKeySchema = z.object({
  fingerprint: fingerprintSchema,
  tier: modelTierSchema,
});

export type CacheKeyFromSchema = z.infer<typeof cacheKeySchema>;

export const outputArtifactSchema = z.object({
  filename: z.string().min(1),
  mimeType: z.string().min(1),
  content: z.string(),
});

export type OutputArtifactFromSchema = z.infer<typeof outputArtifactSchema>;

export const transcriptionResponseSchema = z.object({
  cacheKey: cacheKeySchema,
  cached: z.boolean(),
  transcript: outputArtifactSchema,
  subtitles: outputArtifactSchema,
});

export type TranscriptionResponseFromSchema = z.infer<typeof transcriptionResponseSchema>;

export const modelsResponseSchema = z.object({
  tiers: z.array(modelTierSchema).min(1),
  defaultTier: modelTierSchema,
});

export type ModelsResponseFromSchema = z.infer<typeof modelsResponseSchema>;

export const errorResponseSchema = z.object({
  error: z.string(),
  kind: z.enum(["EXTRACTION_FAILED", "MODEL_LOAD_FAILED", "TRANSCRIPTION_FAILED"]).optional(),
});

export type ErrorResponseFromSchema = z.infer<typeof errorResponseSchema>;
