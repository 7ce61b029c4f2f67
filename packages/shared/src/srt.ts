import type { SrtCue } from "./types.js";

/** Anything with a time range; `Segment` qualifies, and `text` may be missing. */
export interface SrtSegmentInput {
  index?: number;
  start: number;
  end: number;
  text?: string | null;
}

const TIMESTAMP_PATTERN = /^(\d{2,}):([0-5]\d):([0-5]\d)[,.](\d{3})$/;
const TIMING_LINE_PATTERN = /^(\S+)\s+-->\s+(\S+)/;

function pad(value: number, width: number): string {
  return value.toString().padStart(width, "0");
}

/** Rounds to the nearest integer, ties to even. */
function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction > 0.5) return floor + 1;
  if (fraction < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Formats seconds as an SRT timestamp (`HH:MM:SS,mmm`).
 *
 * Negative input clamps to zero. The value is first rounded to whole
 * microseconds (ties to even), and the millisecond part is then truncated,
 * never rounded: `1.9999` is `00:00:01,999`. Hours are not wrapped at 24.
 */
export function formatTimestamp(seconds: number): string {
  const clamped = seconds > 0 ? seconds : 0;
  // Integer microseconds keep the split exact.
  const totalMicros = roundHalfEven(clamped * 1_000_000);

  const totalSeconds = Math.floor(totalMicros / 1_000_000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const secs = totalSeconds % 60;
  const milliseconds = Math.floor((totalMicros % 1_000_000) / 1000);

  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(secs, 2)},${pad(milliseconds, 3)}`;
}

/**
 * Builds an SRT document from segments in the order given.
 * Entries are renumbered from 1; `segment.index` is ignored.
 * The result always ends with exactly one newline, so no segments yields `"\n"`.
 */
export function buildSrt(segments: ReadonlyArray<SrtSegmentInput>): string {
  const lines: string[] = [];

  segments.forEach((segment, position) => {
    lines.push(String(position + 1));
    lines.push(`${formatTimestamp(segment.start)} --> ${formatTimestamp(segment.end)}`);
    lines.push((segment.text ?? "").trim());
    lines.push("");
  });

  return `${lines.join("\n").trimEnd()}\n`;
}

/** Parses an `HH:MM:SS,mmm` (or `HH:MM:SS.mmm`) timestamp into seconds. */
export function parseTimestamp(value: string): number {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid SRT timestamp "${value}"`);
  }

  const [, hours = "0", minutes = "0", secs = "0", millis = "0"] = match;
  const totalMillis =
    Number.parseInt(hours, 10) * 3_600_000 +
    Number.parseInt(minutes, 10) * 60_000 +
    Number.parseInt(secs, 10) * 1000 +
    Number.parseInt(millis, 10);
  return totalMillis / 1000;
}

/**
 * Parses an SRT document into cues.
 * Accepts LF or CRLF line endings and a leading BOM. Multi-line cue text is
 * joined with "\n"; a cue may have no text at all.
 */
export function parseSrt(document: string): SrtCue[] {
  const normalized = document.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  const lines = normalized.split("\n");
  const cues: SrtCue[] = [];

  let cursor = 0;
  while (cursor < lines.length) {
    // Skip blank separator lines between blocks.
    if ((lines[cursor] ?? "").trim() === "") {
      cursor++;
      continue;
    }

    const indexLine = (lines[cursor] ?? "").trim();
    const index = Number.parseInt(indexLine, 10);
    if (!/^\d+$/.test(indexLine) || index <= 0) {
      throw new Error(`Invalid SRT cue number "${indexLine}" at line ${cursor + 1}`);
    }

    const timingLine = lines[cursor + 1] ?? "";
    const timingMatch = TIMING_LINE_PATTERN.exec(timingLine.trim());
    if (!timingMatch) {
      throw new Error(`Invalid SRT timing line "${timingLine}" at line ${cursor + 2}`);
    }
    const start = parseTimestamp(timingMatch[1] ?? "");
    const end = parseTimestamp(timingMatch[2] ?? "");

    cursor += 2;
    const textLines: string[] = [];
    while (cursor < lines.length && (lines[cursor] ?? "").trim() !== "") {
      textLines.push(lines[cursor] ?? "");
      cursor++;
    }

    cues.push({ index, start, end, text: textLines.join("\n") });
  }

  return cues;
}
