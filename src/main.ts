import { loadConfig, validateKeys, type ServiceConfig } from "./config.js";
import { buildMcpServer, startStdio } from "./mcp.js";
import { ffmpegTranscoder } from "./pipeline/compress.js";
import { YtDlpMediaSource } from "./pipeline/media.js";
import { WhisperApiClient } from "./pipeline/transcribe.js";
import { createTranscriptPipeline } from "./pipeline/transcript.js";
import { buildServer } from "./server.js";
import { createSummarizer } from "./summarize/index.js";
import { createTools, type Tool } from "./tools/index.js";
import { createLogger, type Logger } from "./utils/logger.js";
import { YouTubeClient } from "./youtube/client.js";

function wireTools(cfg: ServiceConfig, logger: Logger): Tool[] {
  const media = new YtDlpMediaSource({
    ytdlpCmd: cfg.ytdlpCmd,
    ffmpegCmd: cfg.ffmpegCmd,
    audioDir: cfg.audioDir,
    timeoutMs: cfg.commandTimeoutMs,
    logger,
  });

  const speechToText = new WhisperApiClient({
    baseUrl: cfg.sttBaseUrl,
    apiKey: cfg.openaiApiKey ?? "",
    model: cfg.whisperModel,
    timeoutMs: cfg.sttTimeoutMs,
    logger,
  });

  const transcripts = createTranscriptPipeline({
    media,
    speechToText,
    transcode: ffmpegTranscoder(cfg.ffmpegCmd, cfg.commandTimeoutMs),
    logger,
  });

  return createTools({
    youtube: new YouTubeClient({ apiKey: cfg.youtubeApiKey, logger }),
    transcripts,
    summarizer: createSummarizer(cfg, logger),
    logger,
  });
}

async function start() {
  const cfg = loadConfig();
  const logger = createLogger(cfg.logLevel, cfg.transport === "stdio");

  const missing = validateKeys(cfg);
  if (missing.length > 0) {
    logger.fatal({ missing }, `Missing required environment variables: ${missing.join(", ")}`);
    process.exit(1);
  }

  const tools = wireTools(cfg, logger);

  if (cfg.transport === "stdio") {
    const server = buildMcpServer({ name: cfg.serverName, version: cfg.serverVersion, tools });
    await startStdio(server);
    logger.info({ provider: cfg.aiProvider, model: cfg.summaryModel }, "MCP server running on stdio");
    return;
  }

  const app = buildServer({ tools, logger, apiKey: cfg.apiKey });
  await app.listen({ port: cfg.port, host: cfg.host });
  app.log.info({ provider: cfg.aiProvider, model: cfg.summaryModel }, `listening on :${cfg.port}`);
}

start().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});

process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));
