import "dotenv/config";
import path from "node:path";
import fs from "node:fs";
import {
  DEFAULT_SUMMARY_MODELS,
  DEFAULT_WHISPER_MODEL,
  isAiProvider,
  type AiProvider,
} from "./constants.js";

export type TransportMode = "http" | "stdio";

export interface ServiceConfig {
  youtubeApiKey: string;
  openaiApiKey?: string;
  deepseekApiKey?: string;
  anthropicApiKey?: string;

  aiProvider: AiProvider;
  summaryModel: string;
  maxSummaryTokens: number;

  // Speech-to-text (OpenAI-compatible /audio/transcriptions)
  sttBaseUrl: string;
  whisperModel: string;
  sttTimeoutMs: number;

  audioDir: string; // per-video audio artifacts
  ffmpegCmd: string;
  ytdlpCmd: string;
  commandTimeoutMs: number;

  transport: TransportMode;
  port: number;
  host: string;
  apiKey?: string; // x-api-key for the HTTP tool routes
  logLevel: string;

  serverName: string;
  serverVersion: string;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function intFromEnv(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function optional(value: string | undefined): string | undefined {
  return value ? value : undefined;
}

export const rootDir = path.resolve(process.cwd());

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2)
): ServiceConfig {
  const provider = (env.AI_PROVIDER || "openai").toLowerCase();
  if (!isAiProvider(provider)) {
    throw new Error(`Unsupported AI provider: ${provider}`);
  }

  const transportArg = argv[0] || env.MCP_TRANSPORT || "http";
  const transport: TransportMode = transportArg === "stdio" ? "stdio" : "http";

  const audioDir = path.resolve(
    rootDir,
    env.AUDIO_DIR || env.TEMP_DIR || "./temp"
  );
  ensureDir(audioDir);

  return {
    youtubeApiKey: env.YOUTUBE_API_KEY || "",
    openaiApiKey: optional(env.OPENAI_API_KEY),
    deepseekApiKey: optional(env.DEEPSEEK_API_KEY),
    anthropicApiKey: optional(env.ANTHROPIC_API_KEY),

    aiProvider: provider,
    summaryModel: env.SUMMARY_MODEL || DEFAULT_SUMMARY_MODELS[provider],
    maxSummaryTokens: intFromEnv(env.MAX_SUMMARY_TOKENS, 20000),

    sttBaseUrl: (env.STT_BASE_URL || "https://api.openai.com/v1").replace(/\/+$/, ""),
    whisperModel: env.WHISPER_MODEL || DEFAULT_WHISPER_MODEL,
    sttTimeoutMs: Math.max(60000, intFromEnv(env.STT_TIMEOUT_MS, 600000)),

    audioDir,
    ffmpegCmd: env.FFMPEG_CMD || "ffmpeg",
    ytdlpCmd: env.YTDLP_CMD || "yt-dlp",
    commandTimeoutMs: intFromEnv(env.COMMAND_TIMEOUT_MS, 1800000),

    transport,
    port: intFromEnv(env.PORT, 8080),
    host: env.HOST || "0.0.0.0",
    apiKey: optional(env.API_KEY),
    logLevel: env.LOG_LEVEL || "info",

    serverName: env.MCP_SERVER_NAME || "youtube-channel-digest",
    serverVersion: env.MCP_SERVER_VERSION || "0.1.0",
  };
}

/** Names of the environment variables the configured providers still need. */
export function validateKeys(cfg: ServiceConfig): string[] {
  const missing: string[] = [];
  if (!cfg.youtubeApiKey) missing.push("YOUTUBE_API_KEY");

  // Whisper transcription always goes through the OpenAI key
  if (!cfg.openaiApiKey) missing.push("OPENAI_API_KEY");

  if (cfg.aiProvider === "deepseek" && !cfg.deepseekApiKey) {
    missing.push("DEEPSEEK_API_KEY");
  } else if (cfg.aiProvider === "anthropic" && !cfg.anthropicApiKey) {
    missing.push("ANTHROPIC_API_KEY");
  }
  return missing;
}
