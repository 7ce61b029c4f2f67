/** Model size tiers exposed by the speech backend, ordered by increasing accuracy and latency. */
export const MODEL_TIERS = ["tiny", "base", "small", "medium", "large"] as const;

/** Tier used when a request does not name one. */
export const DEFAULT_MODEL_TIER = "base";

/** Extensions handed to the speech backend as-is. */
export const AUDIO_EXTENSIONS = ["mp3", "wav"] as const;

/** Extensions whose audio track is extracted before transcription. */
export const VIDEO_EXTENSIONS = ["mp4"] as const;

/** Sample rate expected by the speech models. */
export const TRANSCRIPTION_SAMPLE_RATE_HZ = 16_000;

export const SRT_MIME_TYPE = "application/x-subrip";
export const TRANSCRIPT_MIME_TYPE = "text/plain";

/** Default base URL for the local ASR service. */
export const ASR_SERVICE_BASE_URL_DEFAULT = "http://localhost:5001";
