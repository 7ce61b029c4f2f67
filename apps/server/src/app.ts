import { Hono } from "hono";
import { healthResponseSchema, type HealthResponse, type ModelTier } from "@subforge/shared";
import { describeError } from "./lib/errors.js";
import { consoleLogger, type Logger } from "./lib/logger.js";
import type { TranscriptionPipeline } from "./services/pipeline.js";
import type { ResultCache } from "./services/result-cache.js";
import { createModelRoutes } from "./routes/models.js";
import { createTranscriptionRoutes } from "./routes/transcriptions.js";

export interface AppDeps {
  pipeline: TranscriptionPipeline;
  cache: ResultCache;
  defaultTier: ModelTier;
  uploadMaxBytes: number;
  tempRoot?: string;
  logger?: Logger;
}

export function createApp(deps: AppDeps): Hono {
  const logger = deps.logger ?? consoleLogger;
  const app = new Hono();

  app.get("/", (context) => {
    return context.text("SubForge server running");
  });

  app.get("/health", (context) => {
    const payload: HealthResponse = {
      status: "ok",
    };

    const parsedPayload = healthResponseSchema.safeParse(payload);
    if (!parsedPayload.success) {
      throw new Error("Invalid /health payload");
    }

    return context.json(parsedPayload.data);
  });

  app.route("/", createModelRoutes(deps.defaultTier));
  app.route("/", createTranscriptionRoutes({ ...deps, logger }));

  app.onError((err, context) => {
    logger.error("[server] Unhandled error:", describeError(err));
    return context.json({ error: "Internal error" }, 500);
  });

  return app;
}
