import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { z } from "zod";
import {
  asrModelLoadResponseSchema,
  asrTranscriptionResponseSchema,
  fileExtension,
  type AsrTranscriptionResponseFromSchema,
  type ModelTier,
} from "@subforge/shared";

/** Raw output of one backend transcription, before it is shaped into a TranscriptionResult. */
export type BackendTranscription = AsrTranscriptionResponseFromSchema;

export interface SpeechModel {
  readonly tier: ModelTier;
  transcribe(audioPath: string): Promise<BackendTranscription>;
}

/** Anything that can turn a tier name into a ready speech model. */
export interface SpeechBackend {
  loadModel(tier: ModelTier): Promise<SpeechModel>;
}

export type FetchFn = typeof fetch;

export interface WhisperServiceOptions {
  /** Service root without a trailing slash, e.g. `http://localhost:5001`. */
  baseUrl: string;
  fetch?: FetchFn;
}

const AUDIO_CONTENT_TYPE: Record<string, string> = {
  wav: "audio/wav",
  mp3: "audio/mpeg",
  mp4: "video/mp4",
};

async function readJson<T>(
  response: Response,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  what: string,
): Promise<T> {
  if (!response.ok) {
    const body = await response.text();
    throw new Error(`ASR service ${what} responded ${response.status}: ${body.slice(0, 200)}`);
  }

  let raw: unknown;
  try {
    raw = await response.json();
  } catch {
    throw new Error(`ASR service ${what} returned non-JSON output`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`ASR service ${what} returned an unexpected shape: ${parsed.error.message}`);
  }
  return parsed.data;
}

class WhisperServiceModel implements SpeechModel {
  constructor(
    readonly tier: ModelTier,
    private readonly baseUrl: string,
    private readonly fetchFn: FetchFn,
  ) {}

  async transcribe(audioPath: string): Promise<BackendTranscription> {
    const bytes = await readFile(audioPath);
    const filename = basename(audioPath);
    const contentType = AUDIO_CONTENT_TYPE[fileExtension(filename)] ?? "application/octet-stream";

    const form = new FormData();
    form.append("file", new Blob([bytes], { type: contentType }), filename);
    form.append("model", this.tier);
    form.append("response_format", "verbose_json");

    const response = await this.fetchFn(`${this.baseUrl}/v1/audio/transcriptions`, {
      method: "POST",
      body: form,
    });
    return readJson(response, asrTranscriptionResponseSchema, "transcription");
  }
}

/**
 * Speech backend served over HTTP by a local Whisper service exposing an
 * OpenAI-compatible transcription endpoint plus `/v1/models/load`.
 */
export class WhisperServiceBackend implements SpeechBackend {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: WhisperServiceOptions) {
    this.fetchFn = options.fetch ?? fetch;
  }

  async loadModel(tier: ModelTier): Promise<SpeechModel> {
    const response = await this.fetchFn(`${this.options.baseUrl}/v1/models/load`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model: tier }),
    });
    const loaded = await readJson(response, asrModelLoadResponseSchema, "model load");
    if (loaded.model !== tier) {
      throw new Error(`ASR service loaded "${loaded.model}" instead of "${tier}"`);
    }
    return new WhisperServiceModel(tier, this.options.baseUrl, this.fetchFn);
  }
}
