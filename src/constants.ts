/**
 * Fixed pipeline behavior. Values here are part of the service contract and
 * are not read from the environment.
 */

// Speech-to-text upload ceiling (OpenAI Whisper API limit)
export const MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

// Down-conversion profile applied when audio exceeds MAX_UPLOAD_BYTES
export const COMPRESSION_PROFILE = {
  channels: 1,
  sampleRateHz: 16000,
  bitrateKbps: 32,
} as const;

// Bitrate yt-dlp extracts mp3 audio at
export const DOWNLOAD_AUDIO_QUALITY = "64K";

export const DEFAULT_CAPTION_LANGUAGE = "en";

// Caption extensions in order of preference (timed JSON first)
export const CAPTION_EXT_PREFERENCE = ["json3", "vtt", "srt"] as const;

export const DEFAULT_WHISPER_MODEL = "whisper-1";

export const AI_PROVIDERS = ["openai", "deepseek", "anthropic"] as const;
export type AiProvider = (typeof AI_PROVIDERS)[number];

export function isAiProvider(value: string): value is AiProvider {
  return AI_PROVIDERS.some((p) => p === value);
}

export const DEFAULT_SUMMARY_MODELS: Record<AiProvider, string> = {
  openai: "gpt-4-turbo-preview",
  deepseek: "deepseek-chat",
  anthropic: "claude-3-5-sonnet-20241022",
};

export const DEEPSEEK_BASE_URL = "https://api.deepseek.com";

// Transcript characters sent to the summarizer
export const MAX_TRANSCRIPT_CHARS = 50000;

export const SUMMARY_TEMPERATURE = 0.3;

export const YOUTUBE_API_BASE_URL = "https://www.googleapis.com/youtube/v3";

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}
