export type CaptionFormat = "json_events" | "vtt" | "srt" | "other";

export type CaptionOrigin = "manual" | "automatic";

export interface CaptionTrack {
  language: string;
  format: CaptionFormat;
  origin: CaptionOrigin;
  ext: string; // extension as reported by yt-dlp (json3, vtt, srv1, ...)
  url: string;
}

// Tracks keyed by language, in the order yt-dlp lists them
export interface CaptionCatalog {
  manual: Record<string, CaptionTrack[]>;
  automatic: Record<string, CaptionTrack[]>;
}

export type TranscriptSource =
  | "platform_manual_captions"
  | "platform_auto_captions"
  | "speech_to_text";

export interface TranscriptSegment {
  start: number; // seconds
  end: number;
  text: string;
}

export interface Transcript {
  videoId: string;
  language: string;
  source: TranscriptSource;
  text: string;
  segments?: TranscriptSegment[];
}

/** Language fields of a video's metadata used to bias speech-to-text. */
export interface LanguageMetadata {
  defaultAudioLanguage?: string;
  defaultLanguage?: string;
}

export interface ChannelMetadata {
  channelId: string;
  username?: string;
  title: string;
  description: string;
  customUrl?: string;
  avatarUrl?: string;
  bannerUrl?: string;
  subscriberCount: number;
  videoCount: number;
  viewCount: number;
  publishedAt: string;
  country?: string;
  keywords: string[];
}

export interface VideoMetadata extends LanguageMetadata {
  videoId: string;
  title: string;
  description: string;
  thumbnailUrl?: string;
  channelId: string;
  channelTitle: string;
  viewCount: number;
  likeCount: number;
  commentCount: number;
  publishedAt: string;
  durationSeconds: number;
  tags: string[];
  categoryId?: string;
  hasSubtitles: boolean;
}

export interface SummaryContent {
  summary: string;
  keyPoints: string[];
  highlights: string[];
  topics: string[];
}

// Wire shape of one summarized video in a tool response
export interface VideoSummaryRecord {
  video_id: string;
  title: string;
  url: string;
  published_at: string;
  duration_seconds: number;
  view_count: number;
  summary: string;
  key_points: string[];
  highlights: string[];
  topics: string[];
  has_subtitles: boolean;
  transcript_source: TranscriptSource;
  transcript_language: string;
  full_transcript?: string;
}
