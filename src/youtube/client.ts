import { fetch } from "undici";
import type { z } from "zod";
import { YOUTUBE_API_BASE_URL } from "../constants.js";
import { ToolError } from "../errors.js";
import type { ChannelMetadata, VideoMetadata } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { parseIsoDuration } from "./duration.js";
import {
  ChannelListSchema,
  PlaylistItemListSchema,
  SearchListSchema,
  VideoListSchema,
  type ChannelItem,
  type VideoItem,
} from "./schemas.js";

/** Read access to channels and their uploads. */
export interface VideoCatalog {
  resolveChannelId(identifier: string): Promise<string | undefined>;
  getChannelMetadata(identifier: string): Promise<ChannelMetadata | undefined>;
  getLatestVideos(channelId: string, maxResults: number): Promise<VideoMetadata[]>;
  getVideosByTimeRange(
    channelId: string,
    start: Date,
    end: Date,
    maxResults: number
  ): Promise<VideoMetadata[]>;
}

/**
 * Channel ids look like `UC` + 22 characters. Anything of that shape is taken
 * as an id without asking the API whether it exists.
 */
export function isChannelId(identifier: string): boolean {
  return identifier.startsWith("UC") && identifier.length === 24;
}

type QueryParams = Record<string, string | number | undefined>;

// The API caps maxResults at 50 per page
const PAGE_SIZE = 50;

export interface YouTubeClientOptions {
  apiKey: string;
  logger: Logger;
  baseUrl?: string;
  timeoutMs?: number;
}

export class YouTubeClient implements VideoCatalog {
  private readonly log: Logger;
  private readonly baseUrl: string;

  constructor(private readonly opts: YouTubeClientOptions) {
    if (!opts.apiKey) {
      throw new Error("YouTube API key is required");
    }
    this.log = opts.logger.child({ component: "youtube" });
    this.baseUrl = opts.baseUrl ?? YOUTUBE_API_BASE_URL;
  }

  async resolveChannelId(identifier: string): Promise<string | undefined> {
    const username = identifier.replace(/^@+/, "");

    const legacy = await this.get("channels", ChannelListSchema, {
      part: "id",
      forUsername: username,
      maxResults: 1,
    });
    if (legacy.items.length > 0) {
      return legacy.items[0].id;
    }

    // Handles and custom names are only reachable through search
    const search = await this.get("search", SearchListSchema, {
      part: "snippet",
      q: username,
      type: "channel",
      maxResults: 1,
    });
    const hit = search.items[0];
    return hit?.snippet?.channelId ?? hit?.id?.channelId;
  }

  async getChannelMetadata(identifier: string): Promise<ChannelMetadata | undefined> {
    const channelId = isChannelId(identifier)
      ? identifier
      : await this.resolveChannelId(identifier);
    if (!channelId) {
      this.log.warn({ identifier }, "Channel not found");
      return undefined;
    }

    const res = await this.get("channels", ChannelListSchema, {
      part: "snippet,statistics,contentDetails,brandingSettings",
      id: channelId,
    });
    const item = res.items[0];
    if (!item) return undefined;

    return toChannelMetadata(item, isChannelId(identifier) ? undefined : identifier);
  }

  async getLatestVideos(channelId: string, maxResults: number): Promise<VideoMetadata[]> {
    const channel = await this.get("channels", ChannelListSchema, {
      part: "contentDetails",
      id: channelId,
    });
    const uploads = channel.items[0]?.contentDetails?.relatedPlaylists?.uploads;
    if (!uploads) return [];

    const videos: VideoMetadata[] = [];
    let pageToken: string | undefined;
    while (videos.length < maxResults) {
      const page = await this.get("playlistItems", PlaylistItemListSchema, {
        part: "snippet,contentDetails",
        playlistId: uploads,
        maxResults: Math.min(PAGE_SIZE, maxResults - videos.length),
        pageToken,
      });
      videos.push(...(await this.getVideos(page.items.map((i) => i.contentDetails.videoId))));

      pageToken = page.nextPageToken;
      if (!pageToken) break;
    }
    return videos.slice(0, maxResults);
  }

  async getVideosByTimeRange(
    channelId: string,
    start: Date,
    end: Date,
    maxResults: number
  ): Promise<VideoMetadata[]> {
    const videos: VideoMetadata[] = [];
    let pageToken: string | undefined;
    while (videos.length < maxResults) {
      const page = await this.get("search", SearchListSchema, {
        part: "id",
        channelId,
        type: "video",
        order: "date",
        publishedAfter: start.toISOString(),
        publishedBefore: end.toISOString(),
        maxResults: Math.min(PAGE_SIZE, maxResults - videos.length),
        pageToken,
      });
      const ids = page.items.flatMap((i) => (i.id?.videoId ? [i.id.videoId] : []));
      videos.push(...(await this.getVideos(ids)));

      pageToken = page.nextPageToken;
      if (!pageToken) break;
    }
    return videos.slice(0, maxResults);
  }

  private async getVideos(ids: string[]): Promise<VideoMetadata[]> {
    if (ids.length === 0) return [];
    const res = await this.get("videos", VideoListSchema, {
      part: "snippet,statistics,contentDetails",
      id: ids.join(","),
    });
    return res.items.map(toVideoMetadata);
  }

  private async get<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    params: QueryParams
  ): Promise<z.output<S>> {
    const query = new URLSearchParams({ key: this.opts.apiKey });
    for (const [k, v] of Object.entries(params)) {
      if (v !== undefined) query.set(k, String(v));
    }

    const res = await fetch(`${this.baseUrl}/${path}?${query.toString()}`, {
      signal: AbortSignal.timeout(this.opts.timeoutMs ?? 30000),
    });
    if (!res.ok) {
      const body = await res.text();
      this.log.error({ path, status: res.status, body: body.slice(0, 500) }, "YouTube API error");
      throw new ToolError("upstream", `YouTube API error (${res.status}) on ${path}`);
    }

    const parsed = schema.safeParse(await res.json());
    if (!parsed.success) {
      this.log.error({ path, issues: parsed.error.issues }, "Unexpected YouTube API response");
      throw new ToolError("upstream", `Unexpected YouTube API response on ${path}`);
    }
    return parsed.data;
  }
}

function count(value: string | undefined): number {
  const n = parseInt(value ?? "0", 10);
  return Number.isFinite(n) && n >= 0 ? n : 0;
}

function bestThumbnail(thumbnails: Record<string, { url?: string }> | undefined): string | undefined {
  return thumbnails?.high?.url || thumbnails?.medium?.url || thumbnails?.default?.url || undefined;
}

export function toChannelMetadata(item: ChannelItem, username?: string): ChannelMetadata {
  const snippet = item.snippet;
  const stats = item.statistics;
  const keywords = item.brandingSettings?.channel?.keywords ?? "";
  return {
    channelId: item.id,
    username,
    title: snippet?.title ?? "",
    description: snippet?.description ?? "",
    customUrl: snippet?.customUrl,
    avatarUrl: bestThumbnail(snippet?.thumbnails),
    bannerUrl: item.brandingSettings?.image?.bannerExternalUrl,
    subscriberCount: count(stats?.subscriberCount),
    videoCount: count(stats?.videoCount),
    viewCount: count(stats?.viewCount),
    publishedAt: snippet?.publishedAt ?? "",
    country: snippet?.country,
    keywords: keywords
      .split(",")
      .map((k) => k.trim())
      .filter(Boolean),
  };
}

export function toVideoMetadata(item: VideoItem): VideoMetadata {
  const { snippet } = item;
  return {
    videoId: item.id,
    title: snippet.title,
    description: snippet.description,
    thumbnailUrl: snippet.thumbnails?.high?.url,
    channelId: snippet.channelId,
    channelTitle: snippet.channelTitle,
    viewCount: count(item.statistics?.viewCount),
    likeCount: count(item.statistics?.likeCount),
    commentCount: count(item.statistics?.commentCount),
    publishedAt: snippet.publishedAt,
    durationSeconds: parseIsoDuration(item.contentDetails?.duration),
    tags: snippet.tags ?? [],
    categoryId: snippet.categoryId,
    hasSubtitles: item.contentDetails?.caption === "true",
    defaultAudioLanguage: snippet.defaultAudioLanguage,
    defaultLanguage: snippet.defaultLanguage,
  };
}
