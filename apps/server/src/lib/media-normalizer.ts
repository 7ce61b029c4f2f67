import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  AUDIO_EXTENSIONS,
  TRANSCRIPTION_SAMPLE_RATE_HZ,
  VIDEO_EXTENSIONS,
} from "@subforge/shared";
import type { AudioExtractor } from "./ffmpeg.js";
import { ExtractionFailedError } from "./errors.js";
import { consoleLogger, type Logger } from "./logger.js";
import { createTempDir, ownedDirectory, removeDir, type Releasable } from "./temp-resources.js";

export type MediaKind = "audio" | "video" | "unknown";

/** A derived file owned by one ingestion. `release` is idempotent. */
export interface TransientAudioResource extends Releasable {
  readonly path: string;
}

export interface NormalizedAudio {
  audioPath: string;
  /** Present only when audio was extracted; null when the input is passed through. */
  transient: TransientAudioResource | null;
}

export interface MediaNormalizerOptions {
  /** Parent directory for extracted audio; defaults to the OS temp dir. */
  tempRoot?: string;
  sampleRateHz?: number;
  logger?: Logger;
}

const audioExtensions: ReadonlySet<string> = new Set(AUDIO_EXTENSIONS);
const videoExtensions: ReadonlySet<string> = new Set(VIDEO_EXTENSIONS);

export function classifyExtension(declaredExtension: string): MediaKind {
  const ext = declaredExtension.trim().replace(/^\./, "").toLowerCase();
  if (audioExtensions.has(ext)) return "audio";
  if (videoExtensions.has(ext)) return "video";
  return "unknown";
}

/**
 * Turns an upload into something the speech backend can read.
 *
 * Audio and unrecognized extensions pass through untouched; the backend is
 * left to reject content it cannot decode. Video has its first audio track
 * extracted to a fresh temp directory, which the caller must release.
 */
export class MediaNormalizer {
  private readonly tempRoot: string;
  private readonly sampleRateHz: number;
  private readonly logger: Logger;

  constructor(
    private readonly extractor: AudioExtractor,
    options: MediaNormalizerOptions = {},
  ) {
    this.tempRoot = options.tempRoot ?? tmpdir();
    this.sampleRateHz = options.sampleRateHz ?? TRANSCRIPTION_SAMPLE_RATE_HZ;
    this.logger = options.logger ?? consoleLogger;
  }

  async normalize(path: string, declaredExtension: string): Promise<NormalizedAudio> {
    if (classifyExtension(declaredExtension) !== "video") {
      return { audioPath: path, transient: null };
    }

    let dir: string | null = null;
    try {
      dir = await createTempDir(this.tempRoot, "audio");
      const audioPath = join(dir, "audio.wav");
      await this.extractor.extractAudio(path, audioPath, this.sampleRateHz);
      const owner = ownedDirectory(dir);
      return { audioPath, transient: { path: audioPath, release: () => owner.release() } };
    } catch (err) {
      if (dir !== null) {
        await this.discardPartialOutput(dir);
      }
      throw new ExtractionFailedError(err);
    }
  }

  private async discardPartialOutput(dir: string): Promise<void> {
    try {
      await removeDir(dir);
    } catch (cleanupErr) {
      this.logger.warn(`[normalizer] Failed to remove partial output "${dir}": ${String(cleanupErr)}`);
    }
  }
}
