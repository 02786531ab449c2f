import { z } from "zod";
import { ToolError } from "../errors.js";
import type { TranscriptProvider } from "../pipeline/transcript.js";
import type { Summarizer } from "../summarize/index.js";
import type { Logger } from "../utils/logger.js";
import { isChannelId, type VideoCatalog } from "../youtube/client.js";
import { parseIsoTimestamp } from "./dates.js";
import { defineTool, type Tool } from "./registry.js";
import { summarizeVideos } from "./summaries.js";

export type { Tool, ToolResult } from "./registry.js";

export interface ToolDeps {
  youtube: VideoCatalog;
  transcripts: TranscriptProvider;
  summarizer: Summarizer;
  logger: Logger;
}

const username = z
  .string()
  .trim()
  .min(1, "username is required")
  .describe("YouTube username (e.g. '@mkbhd'), handle, or channel ID");

// Numeric strings become numbers; booleans, null and the rest fail as non-numbers
function numericString(value: unknown): unknown {
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value);
    return Number.isNaN(n) ? value : n;
  }
  return value;
}

const includeTranscript = z
  .boolean()
  .default(false)
  .describe("Include the full transcript of each video in the response");

export const ChannelMetadataArgs = z.object({ username });

export const LatestVideosArgs = z.object({
  username,
  n: z
    .preprocess(
      numericString,
      z
        .number()
        .int("n must be an integer")
        .min(1, "n must be between 1 and 50")
        .max(50, "n must be between 1 and 50")
    )
    .default(5)
    .describe("Number of latest videos to summarize (1-50)"),
  include_transcript: includeTranscript,
});

export const TimeRangeArgs = z.object({
  username,
  start_date: z.string().describe("Start of the range, ISO 8601 (YYYY-MM-DD or YYYY-MM-DDTHH:MM:SSZ)"),
  end_date: z.string().describe("End of the range, ISO 8601"),
  max_videos: z
    .preprocess(
      numericString,
      z
        .number()
        .int("max_videos must be an integer")
        .min(1, "max_videos must be between 1 and 100")
        .max(100, "max_videos must be between 1 and 100")
    )
    .default(20)
    .describe("Maximum number of videos to process (1-100)"),
  include_transcript: includeTranscript,
});

async function requireChannelId(youtube: VideoCatalog, identifier: string): Promise<string> {
  const channelId = isChannelId(identifier) ? identifier : await youtube.resolveChannelId(identifier);
  if (!channelId) {
    throw new ToolError("not_found", `Channel not found: ${identifier}`);
  }
  return channelId;
}

export function createTools(deps: ToolDeps): Tool[] {
  const logger = deps.logger.child({ component: "tools" });
  const summaryDeps = { transcripts: deps.transcripts, summarizer: deps.summarizer, logger };

  const channelMetadata = defineTool(
    {
      name: "get_channel_metadata",
      description:
        "Get metadata for a YouTube channel: title, description, custom URL, avatar, " +
        "subscriber/video/view counts, creation date, country and keywords.",
      schema: ChannelMetadataArgs,
      async handler(args) {
        logger.info({ username: args.username }, "Fetching channel metadata");
        const metadata = await deps.youtube.getChannelMetadata(args.username);
        if (!metadata) {
          throw new ToolError("not_found", `Channel not found: ${args.username}`);
        }
        return {
          channel_id: metadata.channelId,
          title: metadata.title,
          description: metadata.description,
          custom_url: metadata.customUrl ?? null,
          avatar_url: metadata.avatarUrl ?? null,
          statistics: {
            subscribers: metadata.subscriberCount,
            videos: metadata.videoCount,
            total_views: metadata.viewCount,
          },
          published_at: metadata.publishedAt,
          country: metadata.country ?? null,
          keywords: metadata.keywords,
        };
      },
    },
    logger
  );

  const latestVideos = defineTool(
    {
      name: "get_latest_videos_summary",
      description:
        "Summarize the latest N videos of a channel. Transcripts come from YouTube captions " +
        "or, when there are none, from speech-to-text over the audio.",
      schema: LatestVideosArgs,
      async handler(args) {
        logger.info({ username: args.username, n: args.n }, "Fetching latest videos");
        const channelId = await requireChannelId(deps.youtube, args.username);

        const videos = await deps.youtube.getLatestVideos(channelId, args.n);
        if (videos.length === 0) {
          throw new ToolError("no_content", "No videos found");
        }

        logger.info({ count: videos.length }, "Found videos, extracting transcripts");
        const summaries = await summarizeVideos(videos, args.include_transcript, summaryDeps);
        return {
          channel: args.username,
          videos_processed: summaries.length,
          summaries,
        };
      },
    },
    logger
  );

  const timeRange = defineTool(
    {
      name: "get_videos_by_timerange",
      description:
        "Summarize the videos a channel published between two ISO 8601 timestamps.",
      schema: TimeRangeArgs,
      async handler(args) {
        const start = parseIsoTimestamp(args.start_date);
        const end = parseIsoTimestamp(args.end_date);
        if (start.getTime() > end.getTime()) {
          throw new ToolError("validation", "start_date must not be after end_date");
        }

        logger.info(
          { username: args.username, start: start.toISOString(), end: end.toISOString() },
          "Fetching videos in time range"
        );
        const channelId = await requireChannelId(deps.youtube, args.username);

        const videos = await deps.youtube.getVideosByTimeRange(channelId, start, end, args.max_videos);
        if (videos.length === 0) {
          throw new ToolError("no_content", "No videos found in this time range");
        }

        const summaries = await summarizeVideos(videos, args.include_transcript, summaryDeps);
        return {
          channel: args.username,
          time_range: { start: start.toISOString(), end: end.toISOString() },
          videos_found: videos.length,
          videos_processed: summaries.length,
          summaries,
        };
      },
    },
    logger
  );

  return [channelMetadata, latestVideos, timeRange];
}
