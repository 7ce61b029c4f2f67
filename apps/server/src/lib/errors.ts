import type { PipelineErrorKind } from "@subforge/shared";

/**
 * Terminal failure of one ingestion. The message keeps the underlying
 * diagnostic (`"<summary>: <cause message>"`) and the original error stays on `cause`.
 */
export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, summary: string, cause: unknown) {
    super(`${summary}: ${describeError(cause)}`, { cause });
    this.name = "PipelineError";
    this.kind = kind;
  }
}

export class ExtractionFailedError extends PipelineError {
  constructor(cause: unknown) {
    super("EXTRACTION_FAILED", "Audio extraction failed", cause);
    this.name = "ExtractionFailedError";
  }
}

export class ModelLoadFailedError extends PipelineError {
  constructor(tier: string, cause: unknown) {
    super("MODEL_LOAD_FAILED", `Failed to load "${tier}" model`, cause);
    this.name = "ModelLoadFailedError";
  }
}

export class TranscriptionFailedError extends PipelineError {
  constructor(cause: unknown) {
    super("TRANSCRIPTION_FAILED", "Transcription failed", cause);
    this.name = "TranscriptionFailedError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
