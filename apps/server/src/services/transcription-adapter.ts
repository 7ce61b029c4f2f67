import type { ModelTier, Segment, TranscriptionResult } from "@subforge/shared";
import { TranscriptionFailedError } from "../lib/errors.js";
import type { BackendTranscription, SpeechModel } from "../lib/speech-backend.js";
import type { ModelRegistry } from "./model-registry.js";

/** Shapes raw backend output: trimmed full text and 1-based, frozen segments with timings untouched. */
export function toTranscriptionResult(raw: BackendTranscription): TranscriptionResult {
  const segments: Segment[] = (raw.segments ?? []).map((segment, i) =>
    Object.freeze({
      index: i + 1,
      start: segment.start,
      end: segment.end,
      text: segment.text ?? "",
    }),
  );
  return Object.freeze({
    fullText: (raw.text ?? "").trim(),
    segments: Object.freeze(segments),
  });
}

export class TranscriptionAdapter {
  constructor(private readonly registry: ModelRegistry) {}

  /** Resolves the model for `tier`, loading it on first use. Rejects with ModelLoadFailedError. */
  loadModel(tier: ModelTier): Promise<SpeechModel> {
    return this.registry.load(tier);
  }

  async transcribe(model: SpeechModel, audioPath: string): Promise<TranscriptionResult> {
    let raw: BackendTranscription;
    try {
      raw = await model.transcribe(audioPath);
    } catch (err) {
      throw new TranscriptionFailedError(err);
    }
    return toTranscriptionResult(raw);
  }
}
