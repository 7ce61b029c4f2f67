import {
  buildOutputArtifacts,
  buildSrt,
  canTransition,
  fileExtension,
  type CacheEntry,
  type CacheKey,
  type IngestionState,
  type ModelTier,
  type OutputArtifacts,
} from "@subforge/shared";
import { computeFileHash } from "../lib/file-hash.js";
import { describeError } from "../lib/errors.js";
import { consoleLogger, type Logger } from "../lib/logger.js";
import type { MediaNormalizer, TransientAudioResource } from "../lib/media-normalizer.js";
import { releaseQuietly } from "../lib/temp-resources.js";
import type { UploadedMedia } from "../lib/uploads.js";
import type { ResultCache } from "./result-cache.js";
import type { TranscriptionAdapter } from "./transcription-adapter.js";

export type StateListener = (state: IngestionState) => void;

export interface PipelineRequest {
  upload: UploadedMedia;
  tier: ModelTier;
}

export interface PipelineResult {
  cacheKey: CacheKey;
  cached: boolean;
  entry: CacheEntry;
  artifacts: OutputArtifacts;
}

export interface PipelineDeps {
  normalizer: MediaNormalizer;
  adapter: TranscriptionAdapter;
  cache: ResultCache;
  fingerprint?: (path: string) => Promise<string>;
  logger?: Logger;
}

/** Walks one ingestion through the state table, refusing transitions it does not list. */
class StateTracker {
  private current: IngestionState = "IDLE";

  constructor(private readonly listener?: StateListener) {}

  get state(): IngestionState {
    return this.current;
  }

  moveTo(next: IngestionState): void {
    if (!canTransition(this.current, next)) {
      throw new Error(`Invalid ingestion transition ${this.current} -> ${next}`);
    }
    this.enter(next);
  }

  fail(): void {
    if (this.current !== "FAILED") {
      this.enter("FAILED");
    }
  }

  private enter(next: IngestionState): void {
    this.current = next;
    this.listener?.(next);
  }
}

/**
 * Upload → normalized audio → fingerprint → cached or fresh transcript → artifacts.
 *
 * The upload and any extracted audio are released on every exit path, the
 * transient audio first. A release failure is logged and never replaces the
 * error that ended the run.
 */
export class TranscriptionPipeline {
  private readonly normalizer: MediaNormalizer;
  private readonly adapter: TranscriptionAdapter;
  private readonly cache: ResultCache;
  private readonly fingerprint: (path: string) => Promise<string>;
  private readonly logger: Logger;

  constructor(deps: PipelineDeps) {
    this.normalizer = deps.normalizer;
    this.adapter = deps.adapter;
    this.cache = deps.cache;
    this.fingerprint = deps.fingerprint ?? computeFileHash;
    this.logger = deps.logger ?? consoleLogger;
  }

  async run(request: PipelineRequest, onStateChange?: StateListener): Promise<PipelineResult> {
    const { upload, tier } = request;
    const tracker = new StateTracker(onStateChange);
    let transient: TransientAudioResource | null = null;

    try {
      tracker.moveTo("NORMALIZING");
      const normalized = await this.normalizer.normalize(
        upload.path,
        fileExtension(upload.originalFilename),
      );
      transient = normalized.transient;

      tracker.moveTo("CACHE_LOOKUP");
      // Fingerprint the original bytes, never the extracted audio.
      const cacheKey: CacheKey = { fingerprint: await this.fingerprint(upload.path), tier };

      const { entry, hit } = await this.cache.getOrCompute(cacheKey, async () => {
        tracker.moveTo("LOADING_MODEL");
        const model = await this.adapter.loadModel(tier);

        tracker.moveTo("TRANSCRIBING");
        const result = await this.adapter.transcribe(model, normalized.audioPath);

        tracker.moveTo("BUILDING");
        const built: CacheEntry = {
          transcriptText: result.fullText,
          srtText: buildSrt(result.segments),
        };

        tracker.moveTo("CACHING");
        return built;
      });

      tracker.moveTo("DONE");
      this.logger.info(
        `[pipeline] ${upload.originalFilename} (${tier}) done${hit ? " from cache" : ""}`,
      );
      return {
        cacheKey,
        cached: hit,
        entry,
        artifacts: buildOutputArtifacts(upload.originalFilename, entry),
      };
    } catch (err) {
      const failedIn = tracker.state;
      tracker.fail();
      this.logger.error(
        `[pipeline] ${upload.originalFilename} (${tier}) failed in ${failedIn}: ${describeError(err)}`,
      );
      throw err;
    } finally {
      await releaseQuietly(transient, "extracted audio", this.logger);
      await releaseQuietly(upload, `upload "${upload.originalFilename}"`, this.logger);
    }
  }
}
