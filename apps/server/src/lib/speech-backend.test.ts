import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WhisperServiceBackend, type FetchFn } from "./speech-backend.js";

let dir: string;
let audioPath: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "speech-backend-test-"));
  audioPath = join(dir, "audio.wav");
  await writeFile(audioPath, Buffer.from("RIFF-test-bytes"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("WhisperServiceBackend.loadModel", () => {
  it("posts the tier to the load endpoint", async () => {
    const fetch = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ status: "ok", model: "small" }));
    const backend = new WhisperServiceBackend({ baseUrl: "http://asr.test", fetch });

    const model = await backend.loadModel("small");

    expect(model.tier).toBe("small");
    expect(fetch).toHaveBeenCalledWith("http://asr.test/v1/models/load", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: '{"model":"small"}',
    });
  });

  it("rejects a non-2xx status with the response body", async () => {
    const fetch = vi.fn<FetchFn>().mockResolvedValue(new Response("weights missing", { status: 500 }));
    const backend = new WhisperServiceBackend({ baseUrl: "http://asr.test", fetch });

    await expect(backend.loadModel("large")).rejects.toThrow(
      "ASR service model load responded 500: weights missing",
    );
  });

  it("rejects when the service reports a different model", async () => {
    const fetch = vi.fn<FetchFn>().mockResolvedValue(jsonResponse({ status: "ok", model: "tiny" }));
    const backend = new WhisperServiceBackend({ baseUrl: "http://asr.test", fetch });

    await expect(backend.loadModel("base")).rejects.toThrow(
      'ASR service loaded "tiny" instead of "base"',
    );
  });

  it("propagates network errors", async () => {
    const fetch = vi.fn<FetchFn>().mockRejectedValue(new TypeError("fetch failed"));
    const backend = new WhisperServiceBackend({ baseUrl: "http://asr.test", fetch });

    await expect(backend.loadModel("base")).rejects.toThrow("fetch failed");
  });
});

describe("WhisperServiceModel.transcribe", () => {
  async function loadedModel(transcriptionResponse: Response) {
    const fetch = vi
      .fn<FetchFn>()
      .mockResolvedValueOnce(jsonResponse({ status: "ok", model: "base" }))
      .mockResolvedValueOnce(transcriptionResponse);
    const backend = new WhisperServiceBackend({ baseUrl: "http://asr.test", fetch });
    return { fetch, model: await backend.loadModel("base") };
  }

  it("uploads the audio as multipart and returns the parsed body", async () => {
    const { fetch, model } = await loadedModel(
      jsonResponse({
        text: " Hello there. ",
        language: "en",
        segments: [{ start: 0, end: 1.5, text: " Hello there." }],
      }),
    );

    const result = await model.transcribe(audioPath);

    expect(result).toEqual({
      text: " Hello there. ",
      language: "en",
      segments: [{ start: 0, end: 1.5, text: " Hello there." }],
    });
    const [url, init] = fetch.mock.calls[1] ?? [];
    expect(url).toBe("http://asr.test/v1/audio/transcriptions");
    const body = init?.body;
    expect(body).toBeInstanceOf(FormData);
    if (!(body instanceof FormData)) return;
    expect(body.get("model")).toBe("base");
    expect(body.get("response_format")).toBe("verbose_json");
    const file = body.get("file");
    expect(file).toBeInstanceOf(Blob);
    if (!(file instanceof Blob)) return;
    expect(await file.text()).toBe("RIFF-test-bytes");
    expect(file.type).toBe("audio/wav");
  });

  it("rejects a malformed body", async () => {
    const { model } = await loadedModel(jsonResponse({ segments: [{ start: "zero" }] }));

    await expect(model.transcribe(audioPath)).rejects.toThrow(
      /ASR service transcription returned an unexpected shape/,
    );
  });

  it("rejects non-JSON output", async () => {
    const { model } = await loadedModel(new Response("<html>", { status: 200 }));

    await expect(model.transcribe(audioPath)).rejects.toThrow(
      "ASR service transcription returned non-JSON output",
    );
  });

  it("rejects when the audio file cannot be read", async () => {
    const { model } = await loadedModel(jsonResponse({ text: "" }));

    await expect(model.transcribe(join(dir, "missing.wav"))).rejects.toThrow(/ENOENT/);
  });
});
