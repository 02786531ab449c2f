import { z } from "zod";
import type { CaptionFormat } from "../types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

// yt-dlp "json3": { events: [{ tStartMs, dDurationMs, segs: [{ utf8 }] }] }
const Json3Schema = z.object({
  events: z
    .array(
      z.object({
        segs: z.array(z.object({ utf8: z.string().optional() })).nullish(),
      })
    )
    .nullish(),
});

const VTT_TIMING =
  /^(?:\d+:)?\d{2}:\d{2}\.\d{3}\s+-->\s+(?:\d+:)?\d{2}:\d{2}\.\d{3}/;
const SRT_TIMING = /^\d+:\d{2}:\d{2},\d{3}\s+-->\s+\d+:\d{2}:\d{2},\d{3}/;
const SRT_CUE_NUMBER = /^\d+$/;
const INLINE_TAG = /<[^>]*>/g;

export function captionFormatFromExt(ext: string): CaptionFormat {
  switch (ext.toLowerCase()) {
    case "json3":
      return "json_events";
    case "vtt":
      return "vtt";
    case "srt":
      return "srt";
    default:
      return "other";
  }
}

/**
 * Flattens a caption document to plain text, dropping timing and markup.
 * Returns undefined for unsupported formats, malformed input and documents
 * without any text.
 */
export function parseCaptions(
  raw: string | Uint8Array,
  format: CaptionFormat,
  logger: Logger = silentLogger
): string | undefined {
  const content = typeof raw === "string" ? raw : Buffer.from(raw).toString("utf8");
  try {
    let text: string;
    switch (format) {
      case "json_events":
        text = parseJsonEvents(content);
        break;
      case "vtt":
        text = joinCueLines(stripVttHeader(content), (line) => VTT_TIMING.test(line));
        break;
      case "srt":
        text = joinCueLines(
          content,
          (line) => SRT_CUE_NUMBER.test(line) || SRT_TIMING.test(line)
        );
        break;
      default:
        logger.warn({ format }, "Unsupported caption format");
        return undefined;
    }
    return text || undefined;
  } catch (err) {
    logger.error({ err, format }, "Failed to parse caption document");
    return undefined;
  }
}

function parseJsonEvents(content: string): string {
  const doc = Json3Schema.parse(JSON.parse(content));
  const texts: string[] = [];
  for (const event of doc.events ?? []) {
    for (const seg of event.segs ?? []) {
      const text = (seg.utf8 ?? "").trim();
      if (text) texts.push(text);
    }
  }
  return texts.join(" ");
}

// Everything from WEBVTT up to the next blank line belongs to the header block
function stripVttHeader(content: string): string {
  const normalized = content.replace(/\r\n?/g, "\n");
  const start = normalized.search(/\S/);
  if (start === -1 || !normalized.startsWith("WEBVTT", start)) return normalized;
  const end = normalized.indexOf("\n\n", start);
  return end === -1 ? "" : normalized.slice(end + 2);
}

function joinCueLines(content: string, isTimingLine: (line: string) => boolean): string {
  return content
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line && !isTimingLine(line))
    .map((line) => line.replace(INLINE_TAG, "").trim())
    .filter(Boolean)
    .join(" ");
}
