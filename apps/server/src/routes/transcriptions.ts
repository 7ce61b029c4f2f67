import { tmpdir } from "node:os";
import { Hono, type Context } from "hono";
import { bodyLimit } from "hono/body-limit";
import {
  buildOutputArtifacts,
  cacheKeySchema,
  modelTierSchema,
  transcriptionResponseSchema,
  type ErrorResponseFromSchema,
  type ModelTier,
  type OutputArtifact,
  type OutputArtifacts,
  type PipelineErrorKind,
} from "@subforge/shared";
import { describeError, PipelineError } from "../lib/errors.js";
import { consoleLogger, type Logger } from "../lib/logger.js";
import { stageUpload } from "../lib/uploads.js";
import type { PipelineResult, TranscriptionPipeline } from "../services/pipeline.js";
import type { ResultCache } from "../services/result-cache.js";

export interface TranscriptionRoutesDeps {
  pipeline: TranscriptionPipeline;
  cache: ResultCache;
  defaultTier: ModelTier;
  uploadMaxBytes: number;
  /** Where uploads are staged; defaults to the OS temp dir. */
  tempRoot?: string;
  logger?: Logger;
}

const ERROR_STATUS = {
  EXTRACTION_FAILED: 422,
  MODEL_LOAD_FAILED: 503,
  TRANSCRIPTION_FAILED: 502,
} as const satisfies Record<PipelineErrorKind, number>;

/** `filename` carries an ASCII fallback; `filename*` carries the exact name as UTF-8. */
function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]|["\\]/g, "_");
  const encoded = encodeURIComponent(filename).replace(
    /['()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

export function createTranscriptionRoutes(deps: TranscriptionRoutesDeps): Hono {
  const app = new Hono();
  const logger = deps.logger ?? consoleLogger;
  const tempRoot = deps.tempRoot ?? tmpdir();

  /**
   * POST /api/transcriptions — multipart upload (`file`, optional `model`).
   * Runs the full pipeline and returns both artifacts inline.
   */
  app.post(
    "/api/transcriptions",
    bodyLimit({
      maxSize: deps.uploadMaxBytes,
      onError: (c) => c.json({ error: `Upload exceeds ${deps.uploadMaxBytes} bytes` }, 413),
    }),
    async (c) => {
      const body = await c.req.parseBody();
      const file = body["file"];
      if (!file || typeof file === "string") {
        return c.json({ error: "Missing file upload" }, 400);
      }

      const rawTier = body["model"];
      let tier = deps.defaultTier;
      if (rawTier !== undefined && rawTier !== "") {
        const parsed = modelTierSchema.safeParse(rawTier);
        if (!parsed.success) {
          const shown = typeof rawTier === "string" ? rawTier : "(file)";
          return c.json({ error: `Unknown model tier "${shown}"` }, 400);
        }
        tier = parsed.data;
      }

      const upload = await stageUpload(new Uint8Array(await file.arrayBuffer()), file.name, tempRoot);
      logger.info(`[transcriptions] ${file.name} (${file.size} bytes, ${tier})`);

      let result: PipelineResult;
      try {
        result = await deps.pipeline.run({ upload, tier });
      } catch (err) {
        if (err instanceof PipelineError) {
          const payload: ErrorResponseFromSchema = { error: err.message, kind: err.kind };
          return c.json(payload, ERROR_STATUS[err.kind]);
        }
        logger.error(`[transcriptions] Unexpected failure for ${file.name}:`, describeError(err));
        return c.json({ error: "Internal error" }, 500);
      }

      const validated = transcriptionResponseSchema.safeParse({
        cacheKey: result.cacheKey,
        cached: result.cached,
        transcript: result.artifacts.transcript,
        subtitles: result.artifacts.subtitles,
      });
      if (!validated.success) {
        logger.error("[transcriptions] Invalid transcription payload:", validated.error.message);
        return c.json({ error: "Internal error: invalid transcription data" }, 500);
      }
      return c.json(validated.data);
    },
  );

  async function serveArtifact(c: Context, pick: (artifacts: OutputArtifacts) => OutputArtifact) {
    const key = cacheKeySchema.safeParse({
      fingerprint: c.req.param("fingerprint"),
      tier: c.req.param("tier"),
    });
    if (!key.success) {
      return c.json({ error: "Invalid fingerprint or model tier" }, 400);
    }

    const entry = await deps.cache.get(key.data);
    if (!entry) {
      return c.json({ error: "Transcription not found" }, 404);
    }

    const artifact = pick(buildOutputArtifacts(c.req.query("name") ?? "", entry));
    return c.body(artifact.content, 200, {
      "Content-Type": `${artifact.mimeType}; charset=utf-8`,
      "Content-Disposition": contentDisposition(artifact.filename),
    });
  }

  /** GET /api/transcriptions/:fingerprint/:tier/subtitles.srt?name= — cached SRT download */
  app.get("/api/transcriptions/:fingerprint/:tier/subtitles.srt", (c) =>
    serveArtifact(c, (artifacts) => artifacts.subtitles),
  );

  /** GET /api/transcriptions/:fingerprint/:tier/transcript.txt?name= — cached transcript download */
  app.get("/api/transcriptions/:fingerprint/:tier/transcript.txt", (c) =>
    serveArtifact(c, (artifacts) => artifacts.transcript),
  );

  return app;
}
