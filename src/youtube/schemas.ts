import { z } from "zod";

// Only the YouTube Data API v3 fields this service reads

const ThumbnailsSchema = z
  .record(z.object({ url: z.string() }).partial())
  .optional();

// Counts arrive as decimal strings
const CountSchema = z.string().optional();

export const ChannelItemSchema = z.object({
  id: z.string(),
  snippet: z
    .object({
      title: z.string().default(""),
      description: z.string().default(""),
      customUrl: z.string().optional(),
      publishedAt: z.string().optional(),
      country: z.string().optional(),
      thumbnails: ThumbnailsSchema,
    })
    .optional(),
  statistics: z
    .object({
      subscriberCount: CountSchema,
      videoCount: CountSchema,
      viewCount: CountSchema,
    })
    .optional(),
  contentDetails: z
    .object({
      relatedPlaylists: z.object({ uploads: z.string().optional() }).optional(),
    })
    .optional(),
  brandingSettings: z
    .object({
      channel: z.object({ keywords: z.string().optional() }).optional(),
      image: z.object({ bannerExternalUrl: z.string().optional() }).optional(),
    })
    .optional(),
});

export const ChannelListSchema = z.object({
  items: z.array(ChannelItemSchema).default([]),
});

export const SearchListSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z
    .array(
      z.object({
        id: z.object({ videoId: z.string().optional(), channelId: z.string().optional() }).optional(),
        snippet: z.object({ channelId: z.string().optional() }).optional(),
      })
    )
    .default([]),
});

export const PlaylistItemListSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z
    .array(z.object({ contentDetails: z.object({ videoId: z.string() }) }))
    .default([]),
});

export const VideoItemSchema = z.object({
  id: z.string(),
  snippet: z.object({
    title: z.string(),
    description: z.string().default(""),
    channelId: z.string(),
    channelTitle: z.string().default(""),
    publishedAt: z.string(),
    thumbnails: ThumbnailsSchema,
    tags: z.array(z.string()).optional(),
    categoryId: z.string().optional(),
    defaultLanguage: z.string().optional(),
    defaultAudioLanguage: z.string().optional(),
  }),
  statistics: z
    .object({ viewCount: CountSchema, likeCount: CountSchema, commentCount: CountSchema })
    .optional(),
  contentDetails: z
    .object({ duration: z.string().optional(), caption: z.string().optional() })
    .optional(),
});

export const VideoListSchema = z.object({
  items: z.array(VideoItemSchema).default([]),
});

export type ChannelItem = z.infer<typeof ChannelItemSchema>;
export type VideoItem = z.infer<typeof VideoItemSchema>;
