import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { loadConfig, validateKeys } from "../config.js";

let audioDir: string;

beforeEach(() => {
  audioDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "digest-cfg-")), "audio");
});

afterEach(() => {
  fs.rmSync(path.dirname(audioDir), { recursive: true, force: true });
});

describe("loadConfig", () => {
  it("applies defaults", () => {
    const cfg = loadConfig({ AUDIO_DIR: audioDir }, []);

    expect(cfg.aiProvider).toBe("openai");
    expect(cfg.summaryModel).toBe("gpt-4-turbo-preview");
    expect(cfg.maxSummaryTokens).toBe(20000);
    expect(cfg.sttBaseUrl).toBe("https://api.openai.com/v1");
    expect(cfg.whisperModel).toBe("whisper-1");
    expect(cfg.sttTimeoutMs).toBe(600000);
    expect(cfg.transport).toBe("http");
    expect(cfg.port).toBe(8080);
    expect(cfg.host).toBe("0.0.0.0");
    expect(cfg.apiKey).toBeUndefined();
    expect(cfg.ytdlpCmd).toBe("yt-dlp");
    expect(cfg.ffmpegCmd).toBe("ffmpeg");
  });

  it("creates the audio directory", () => {
    const cfg = loadConfig({ AUDIO_DIR: audioDir }, []);
    expect(cfg.audioDir).toBe(audioDir);
    expect(fs.existsSync(audioDir)).toBe(true);
  });

  it("reads provider, model and limits from the environment", () => {
    const cfg = loadConfig(
      {
        AUDIO_DIR: audioDir,
        AI_PROVIDER: "Anthropic",
        SUMMARY_MODEL: "claude-test",
        MAX_SUMMARY_TOKENS: "4000",
        STT_BASE_URL: "https://stt.test/v1//",
        STT_TIMEOUT_MS: "5000",
        PORT: "9090",
        API_KEY: "test-secret",
      },
      []
    );

    expect(cfg.aiProvider).toBe("anthropic");
    expect(cfg.summaryModel).toBe("claude-test");
    expect(cfg.maxSummaryTokens).toBe(4000);
    expect(cfg.sttBaseUrl).toBe("https://stt.test/v1");
    expect(cfg.sttTimeoutMs).toBe(60000);
    expect(cfg.port).toBe(9090);
    expect(cfg.apiKey).toBe("test-secret");
  });

  it("selects stdio from the first argument or MCP_TRANSPORT", () => {
    expect(loadConfig({ AUDIO_DIR: audioDir }, ["stdio"]).transport).toBe("stdio");
    expect(loadConfig({ AUDIO_DIR: audioDir, MCP_TRANSPORT: "stdio" }, []).transport).toBe("stdio");
    expect(loadConfig({ AUDIO_DIR: audioDir, MCP_TRANSPORT: "stdio" }, ["http"]).transport).toBe("http");
  });

  it("rejects unknown providers", () => {
    expect(() => loadConfig({ AUDIO_DIR: audioDir, AI_PROVIDER: "gemini" }, [])).toThrow(
      "Unsupported AI provider: gemini"
    );
  });
});

describe("validateKeys", () => {
  it("lists every missing key for the chosen provider", () => {
    expect(validateKeys(loadConfig({ AUDIO_DIR: audioDir, AI_PROVIDER: "deepseek" }, []))).toEqual([
      "YOUTUBE_API_KEY",
      "OPENAI_API_KEY",
      "DEEPSEEK_API_KEY",
    ]);
  });

  it("passes when the keys are present", () => {
    const cfg = loadConfig(
      {
        AUDIO_DIR: audioDir,
        AI_PROVIDER: "anthropic",
        YOUTUBE_API_KEY: "test-youtube",
        OPENAI_API_KEY: "test-openai",
        ANTHROPIC_API_KEY: "test-anthropic",
      },
      []
    );
    expect(validateKeys(cfg)).toEqual([]);
  });
});
