import type { ModelTier } from "@subforge/shared";
import { ModelLoadFailedError } from "../lib/errors.js";
import { consoleLogger, type Logger } from "../lib/logger.js";
import type { SpeechBackend, SpeechModel } from "../lib/speech-backend.js";

/**
 * Process-wide memo of loaded models, one per tier.
 *
 * Concurrent requests for the same tier share a single load. A failed load is
 * evicted so the next request tries again.
 */
export class ModelRegistry {
  private readonly models = new Map<ModelTier, Promise<SpeechModel>>();

  constructor(
    private readonly backend: SpeechBackend,
    private readonly logger: Logger = consoleLogger,
  ) {}

  load(tier: ModelTier): Promise<SpeechModel> {
    const existing = this.models.get(tier);
    if (existing) {
      return existing;
    }

    const startedAt = Date.now();
    this.logger.info(`[models] Loading "${tier}"`);
    const loading = Promise.resolve()
      .then(() => this.backend.loadModel(tier))
      .then(
        (model) => {
          this.logger.info(`[models] Loaded "${tier}" in ${Date.now() - startedAt}ms`);
          return model;
        },
        (err: unknown) => {
          this.models.delete(tier);
          const failure = new ModelLoadFailedError(tier, err);
          this.logger.error(`[models] ${failure.message}`);
          throw failure;
        },
      );
    this.models.set(tier, loading);
    return loading;
  }

  /** Tiers with a load started or finished. */
  loadedTiers(): ModelTier[] {
    return [...this.models.keys()];
  }
}
