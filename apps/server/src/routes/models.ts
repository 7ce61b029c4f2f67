import { Hono } from "hono";
import { MODEL_TIERS, modelsResponseSchema, type ModelTier } from "@subforge/shared";

export function createModelRoutes(defaultTier: ModelTier): Hono {
  const app = new Hono();

  /** GET /api/models — tiers a request may name, in increasing accuracy order */
  app.get("/api/models", (c) => {
    const validated = modelsResponseSchema.safeParse({ tiers: [...MODEL_TIERS], defaultTier });
    if (!validated.success) {
      console.error("[models] Invalid models payload:", validated.error.message);
      return c.json({ error: "Internal error: invalid models data" }, 500);
    }
    return c.json(validated.data);
  });

  return app;
}
