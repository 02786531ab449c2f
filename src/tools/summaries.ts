import { watchUrl } from "../constants.js";
import type { TranscriptProvider } from "../pipeline/transcript.js";
import type { Summarizer } from "../summarize/index.js";
import type { VideoMetadata, VideoSummaryRecord } from "../types.js";
import type { Logger } from "../utils/logger.js";

export interface SummaryDeps {
  transcripts: TranscriptProvider;
  summarizer: Summarizer;
  logger: Logger;
}

/**
 * Summarizes videos one at a time in listing order. Videos without a
 * transcript, or whose processing throws, are skipped with a warning.
 */
export async function summarizeVideos(
  videos: VideoMetadata[],
  includeTranscript: boolean,
  deps: SummaryDeps
): Promise<VideoSummaryRecord[]> {
  const summaries: VideoSummaryRecord[] = [];

  for (const video of videos) {
    deps.logger.info({ videoId: video.videoId, title: video.title }, "Processing video");
    try {
      const transcript = await deps.transcripts.getTranscript(video.videoId, {
        metadata: {
          defaultAudioLanguage: video.defaultAudioLanguage,
          defaultLanguage: video.defaultLanguage,
        },
      });
      if (!transcript) {
        deps.logger.warn({ videoId: video.videoId }, "Skipping video without transcript");
        continue;
      }

      const content = await deps.summarizer.summarize({
        title: video.title,
        description: video.description,
        transcriptText: transcript.text,
      });

      const record: VideoSummaryRecord = {
        video_id: video.videoId,
        title: video.title,
        url: watchUrl(video.videoId),
        published_at: video.publishedAt,
        duration_seconds: video.durationSeconds,
        view_count: video.viewCount,
        summary: content.summary,
        key_points: content.keyPoints,
        highlights: content.highlights,
        topics: content.topics,
        has_subtitles: video.hasSubtitles,
        transcript_source: transcript.source,
        transcript_language: transcript.language,
      };
      if (includeTranscript) {
        record.full_transcript = transcript.text;
      }
      summaries.push(record);
    } catch (err) {
      deps.logger.warn({ err, videoId: video.videoId }, "Failed to summarize video");
    }
  }

  return summaries;
}
