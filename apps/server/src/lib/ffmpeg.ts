import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { z } from "zod";

const execFileAsync = promisify(execFile);

export type ExecFileFn = (
  file: string,
  args: ReadonlyArray<string>,
) => Promise<{ stdout: string; stderr: string }>;

const defaultExecFile: ExecFileFn = async (file, args) => {
  const { stdout, stderr } = await execFileAsync(file, [...args], {
    encoding: "utf8",
    maxBuffer: 16 * 1024 * 1024,
  });
  return { stdout, stderr };
};

// ─── Internal ffprobe output schema ───────────────────────────────────────────

const ffprobeStreamSchema = z.object({
  codec_type: z.string(),
});

const ffprobeOutputSchema = z.object({
  streams: z.array(ffprobeStreamSchema),
});

// ─── Public interface ──────────────────────────────────────────────────────────

export interface MediaProbe {
  audioStreamCount: number;
}

/** Writes the audio track of a media file to a mono WAV file at the given sample rate. */
export interface AudioExtractor {
  extractAudio(inputPath: string, outputPath: string, sampleRateHz: number): Promise<void>;
}

export interface FfmpegOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  execFile?: ExecFileFn;
}

/**
 * Probes a media file with ffprobe and counts its audio streams.
 * Throws if ffprobe is not available, the file is unreadable, or the output
 * cannot be parsed.
 */
export async function probeMediaFile(
  filePath: string,
  options: FfmpegOptions = {},
): Promise<MediaProbe> {
  const run = options.execFile ?? defaultExecFile;
  let stdout: string;
  try {
    ({ stdout } = await run(options.ffprobePath ?? "ffprobe", [
      "-v",
      "quiet",
      "-print_format",
      "json",
      "-show_streams",
      filePath,
    ]));
  } catch (cause) {
    throw new Error(`ffprobe failed for "${filePath}": ${String(cause)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    throw new Error(`ffprobe returned non-JSON output for "${filePath}"`);
  }

  const parsed = ffprobeOutputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `ffprobe output has unexpected shape for "${filePath}": ${parsed.error.message}`,
    );
  }

  return {
    audioStreamCount: parsed.data.streams.filter((s) => s.codec_type === "audio").length,
  };
}

/** Builds the ffmpeg argument list that demuxes the first audio stream to 16-bit mono PCM WAV. */
export function buildExtractAudioArgs(
  inputPath: string,
  outputPath: string,
  sampleRateHz: number,
): string[] {
  return [
    "-y",
    "-v",
    "error",
    "-i",
    inputPath,
    "-map",
    "0:a:0",
    "-vn",
    "-ac",
    "1",
    "-ar",
    String(sampleRateHz),
    "-c:a",
    "pcm_s16le",
    outputPath,
  ];
}

export class FfmpegAudioExtractor implements AudioExtractor {
  private readonly ffmpegPath: string;
  private readonly run: ExecFileFn;

  constructor(private readonly options: FfmpegOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.run = options.execFile ?? defaultExecFile;
  }

  async extractAudio(inputPath: string, outputPath: string, sampleRateHz: number): Promise<void> {
    const probe = await probeMediaFile(inputPath, this.options);
    if (probe.audioStreamCount === 0) {
      throw new Error(`No audio stream found in "${inputPath}"`);
    }

    try {
      await this.run(this.ffmpegPath, buildExtractAudioArgs(inputPath, outputPath, sampleRateHz));
    } catch (cause) {
      throw new Error(`ffmpeg failed for "${inputPath}": ${String(cause)}`);
    }
  }
}
