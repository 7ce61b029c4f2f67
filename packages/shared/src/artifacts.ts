import { SRT_MIME_TYPE, TRANSCRIPT_MIME_TYPE } from "./constants.js";
import type { CacheEntry, OutputArtifacts } from "./types.js";

/** Returns the filename without directory components and without its last extension. */
export function baseName(filename: string): string {
  const name = filename.slice(Math.max(filename.lastIndexOf("/"), filename.lastIndexOf("\\")) + 1);
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(0, dot) : name;
}

/** Returns the lowercase extension without the dot, or "" when there is none. */
export function fileExtension(filename: string): string {
  const name = filename.slice(Math.max(filename.lastIndexOf("/"), filename.lastIndexOf("\\")) + 1);
  const dot = name.lastIndexOf(".");
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : "";
}

/**
 * Names and packages the downloadable outputs for an upload:
 * `<base>.srt` as SubRip and `<base>.txt` as plain text ending in one newline.
 */
export function buildOutputArtifacts(originalFilename: string, entry: CacheEntry): OutputArtifacts {
  const base = baseName(originalFilename) || "transcript";
  return {
    subtitles: {
      filename: `${base}.srt`,
      mimeType: SRT_MIME_TYPE,
      content: entry.srtText,
    },
    transcript: {
      filename: `${base}.txt`,
      mimeType: TRANSCRIPT_MIME_TYPE,
      content: `${entry.transcriptText}\n`,
    },
  };
}
