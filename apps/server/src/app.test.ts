import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  errorResponseSchema,
  transcriptionResponseSchema,
  type ModelTier,
} from "@subforge/shared";
import { createApp } from "./app.js";
import type { AudioExtractor } from "./lib/ffmpeg.js";
import { MediaNormalizer } from "./lib/media-normalizer.js";
import type { BackendTranscription, SpeechBackend } from "./lib/speech-backend.js";
import { ModelRegistry } from "./services/model-registry.js";
import { TranscriptionPipeline } from "./services/pipeline.js";
import { MemoryResultStore, ResultCache } from "./services/result-cache.js";
import { TranscriptionAdapter } from "./services/transcription-adapter.js";

const RAW: BackendTranscription = {
  text: "Testing one two.",
  segments: [{ start: 0.5, end: 2.25, text: " Testing one two." }],
};

const EXPECTED_SRT = "1\n00:00:00,500 --> 00:00:02,250\nTesting one two.\n";

let tempRoot: string;

beforeEach(async () => {
  tempRoot = await mkdtemp(join(tmpdir(), "app-test-"));
});

afterEach(async () => {
  await rm(tempRoot, { recursive: true, force: true });
});

interface TestAppOptions {
  extractor?: AudioExtractor;
  loadModel?: SpeechBackend["loadModel"];
  transcribe?: (audioPath: string) => Promise<BackendTranscription>;
  uploadMaxBytes?: number;
}

function testApp(options: TestAppOptions = {}) {
  const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const transcribe = vi.fn<(audioPath: string) => Promise<BackendTranscription>>(
    options.transcribe ?? (() => Promise.resolve(RAW)),
  );
  const loadModel =
    options.loadModel ?? ((tier: ModelTier) => Promise.resolve({ tier, transcribe }));
  const extractor: AudioExtractor = options.extractor ?? {
    async extractAudio(_inputPath, outputPath) {
      await writeFile(outputPath, Buffer.from("RIFF"));
    },
  };
  const cache = new ResultCache(new MemoryResultStore(), logger);
  const pipeline = new TranscriptionPipeline({
    normalizer: new MediaNormalizer(extractor, { tempRoot, logger }),
    adapter: new TranscriptionAdapter(new ModelRegistry({ loadModel }, logger)),
    cache,
    logger,
  });
  const app = createApp({
    pipeline,
    cache,
    defaultTier: "base",
    uploadMaxBytes: options.uploadMaxBytes ?? 1024 * 1024,
    tempRoot,
    logger,
  });
  return { app, transcribe, logger };
}

function uploadForm(filename: string, model?: string, content = "test-media-bytes"): FormData {
  const form = new FormData();
  form.append("file", new File([content], filename));
  if (model !== undefined) {
    form.append("model", model);
  }
  return form;
}

describe("GET /health", () => {
  it("reports ok", async () => {
    const { app } = testApp();

    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });
});

describe("GET /api/models", () => {
  it("lists the tiers and the default", async () => {
    const { app } = testApp();

    const res = await app.request("/api/models");

    expect(await res.json()).toEqual({
      tiers: ["tiny", "base", "small", "medium", "large"],
      defaultTier: "base",
    });
  });
});

describe("POST /api/transcriptions", () => {
  it("returns both artifacts for a fresh upload", async () => {
    const { app } = testApp();

    const res = await app.request("/api/transcriptions", {
      method: "POST",
      body: uploadForm("talk.mp3"),
    });

    expect(res.status).toBe(200);
    const body = transcriptionResponseSchema.parse(await res.json());
    expect(body.cached).toBe(false);
    expect(body.cacheKey.tier).toBe("base");
    expect(body.transcript).toEqual({
      filename: "talk.txt",
      mimeType: "text/plain",
      content: "Testing one two.\n",
    });
    expect(body.subtitles).toEqual({
      filename: "talk.srt",
      mimeType: "application/x-subrip",
      content: EXPECTED_SRT,
    });
    expect(await readdir(tempRoot)).toEqual([]);
  });

  it("serves a repeat upload from cache", async () => {
    const { app, transcribe } = testApp();

    await app.request("/api/transcriptions", { method: "POST", body: uploadForm("a.mp3") });
    const res = await app.request("/api/transcriptions", {
      method: "POST",
      body: uploadForm("b.mp3"),
    });

    const body = transcriptionResponseSchema.parse(await res.json());
    expect(body.cached).toBe(true);
    expect(body.subtitles.filename).toBe("b.srt");
    expect(transcribe).toHaveBeenCalledTimes(1);
  });

  it("honours the requested model tier", async () => {
    const { app } = testApp();

    const res = await app.request("/api/transcriptions", {
      method: "POST",
      body: uploadForm("talk.wav", "small"),
    });

    const body = transcriptionResponseSchema.parse(await res.json());
    expect(body.cacheKey.tier).toBe("small");
  });

  it("rejects a request without a file", async () => {
    const { app } = testApp();
    const form = new FormData();
    form.append("model", "base");

    const res = await app.request("/api/transcriptions", { method: "POST", body: form });

    expect(res.status).toBe(400);
    expect(errorResponseSchema.parse(await res.json())).toEqual({ error: "Missing file upload" });
  });

  it("rejects an unknown model tier", async () => {
    const { app, transcribe } = testApp();

    const res = await app.request("/api/transcriptions", {
      method: "POST",
      body: uploadForm("talk.mp3", "huge"),
    });

    expect(res.status).toBe(400);
    expect(errorResponseSchema.parse(await res.json())).toEqual({
      error: 'Unknown model tier "huge"',
    });
    expect(transcribe).not.toHaveBeenCalled();
  });

  it("rejects uploads over the size limit", async () => {
    const { app } = testApp({ uploadMaxBytes: 16 });

    const res = await app.request("/api/transcriptions", {
      method: "POST",
      body: uploadForm("talk.mp3", undefined, "x".repeat(64)),
    });

    expect(res.status).toBe(413);
    expect(errorResponseSchema.parse(await res.json())).toEqual({
      error: "Upload exceeds 16 bytes",
    });
  });

  it("maps extraction failures to 422", async () => {
    const { app } = testApp({
      extractor: { extractAudio: () => Promise.reject(new Error("no audio track")) },
    });

    const res = await app.request("/api/transcriptions", {
      method: "POST",
      body: uploadForm("clip.mp4"),
    });

    expect(res.status).toBe(422);
    expect(errorResponseSchema.parse(await res.json())).toEqual({
      error: "Audio extraction failed: no audio track",
      kind: "EXTRACTION_FAILED",
    });
    expect(await readdir(tempRoot)).toEqual([]);
  });

  it("maps model load failures to 503", async () => {
    const { app } = testApp({ loadModel: () => Promise.reject(new Error("service down")) });

    const res = await app.request("/api/transcriptions", {
      method: "POST",
      body: uploadForm("talk.mp3", "medium"),
    });

    expect(res.status).toBe(503);
    expect(errorResponseSchema.parse(await res.json())).toEqual({
      error: 'Failed to load "medium" model: service down',
      kind: "MODEL_LOAD_FAILED",
    });
  });

  it("maps transcription failures to 502", async () => {
    const { app } = testApp({ transcribe: () => Promise.reject(new Error("timeout")) });

    const res = await app.request("/api/transcriptions", {
      method: "POST",
      body: uploadForm("talk.mp3"),
    });

    expect(res.status).toBe(502);
    expect(errorResponseSchema.parse(await res.json())).toEqual({
      error: "Transcription failed: timeout",
      kind: "TRANSCRIPTION_FAILED",
    });
  });
});

describe("GET /api/transcriptions/:fingerprint/:tier/*", () => {
  async function transcribed(app: ReturnType<typeof testApp>["app"]) {
    const res = await app.request("/api/transcriptions", {
      method: "POST",
      body: uploadForm("talk.mp3"),
    });
    return transcriptionResponseSchema.parse(await res.json()).cacheKey;
  }

  it("downloads the cached subtitles under the original name", async () => {
    const { app } = testApp();
    const { fingerprint, tier } = await transcribed(app);

    const res = await app.request(
      `/api/transcriptions/${fingerprint}/${tier}/subtitles.srt?name=${encodeURIComponent("My Talk.mp3")}`,
    );

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("application/x-subrip; charset=utf-8");
    expect(res.headers.get("Content-Disposition")).toBe(
      "attachment; filename=\"My Talk.srt\"; filename*=UTF-8''My%20Talk.srt",
    );
    expect(await res.text()).toBe(EXPECTED_SRT);
  });

  it("downloads the cached transcript with a default name", async () => {
    const { app } = testApp();
    const { fingerprint, tier } = await transcribed(app);

    const res = await app.request(`/api/transcriptions/${fingerprint}/${tier}/transcript.txt`);

    expect(res.headers.get("Content-Disposition")).toBe(
      "attachment; filename=\"transcript.txt\"; filename*=UTF-8''transcript.txt",
    );
    expect(await res.text()).toBe("Testing one two.\n");
  });

  it("downloads under a non-Latin-1 name with an ASCII fallback", async () => {
    const { app } = testApp();
    const { fingerprint, tier } = await transcribed(app);

    const res = await app.request(
      `/api/transcriptions/${fingerprint}/${tier}/subtitles.srt?name=${encodeURIComponent("字幕.mp4")}`,
    );

    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Disposition")).toBe(
      "attachment; filename=\"__.srt\"; filename*=UTF-8''%E5%AD%97%E5%B9%95.srt",
    );
    expect(await res.text()).toBe(EXPECTED_SRT);
  });

  it("escapes quotes in the fallback and RFC 5987 specials in the encoded name", async () => {
    const { app } = testApp();
    const { fingerprint, tier } = await transcribed(app);

    const res = await app.request(
      `/api/transcriptions/${fingerprint}/${tier}/transcript.txt?name=${encodeURIComponent('say "hi" (1).mp3')}`,
    );

    expect(res.headers.get("Content-Disposition")).toBe(
      "attachment; filename=\"say _hi_ (1).txt\"; filename*=UTF-8''say%20%22hi%22%20%281%29.txt",
    );
  });

  it("returns 404 for a tier that was never transcribed", async () => {
    const { app } = testApp();
    const { fingerprint } = await transcribed(app);

    const res = await app.request(`/api/transcriptions/${fingerprint}/large/subtitles.srt`);

    expect(res.status).toBe(404);
    expect(errorResponseSchema.parse(await res.json())).toEqual({
      error: "Transcription not found",
    });
  });

  it("rejects a malformed fingerprint or tier", async () => {
    const { app } = testApp();

    const badFingerprint = await app.request("/api/transcriptions/not-a-hash/base/subtitles.srt");
    const badTier = await app.request(`/api/transcriptions/${"e".repeat(64)}/huge/transcript.txt`);

    expect(badFingerprint.status).toBe(400);
    expect(badTier.status).toBe(400);
    expect(errorResponseSchema.parse(await badTier.json())).toEqual({
      error: "Invalid fingerprint or model tier",
    });
  });
});
