import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterAll } from "vitest";

const { createCompletion, createMessage, openAiOptions } = vi.hoisted(() => {
  const openAiOptions: unknown[] = [];
  return { createCompletion: vi.fn(), createMessage: vi.fn(), openAiOptions };
});

vi.mock("openai", () => ({
  default: class {
    chat = { completions: { create: createCompletion } };
    constructor(options: unknown) {
      openAiOptions.push(options);
    }
  },
}));

vi.mock("@anthropic-ai/sdk", () => ({
  default: class {
    messages = { create: createMessage };
  },
}));

import { loadConfig } from "../../config.js";
import { DEEPSEEK_BASE_URL, MAX_TRANSCRIPT_CHARS } from "../../constants.js";
import { silentLogger, type Logger } from "../../utils/logger.js";
import { memoryLogger, WARN } from "../../__tests__/memoryLogger.js";
import { AnthropicSummarizer } from "../anthropic.js";
import { createSummarizer } from "../index.js";
import { OpenAiSummarizer } from "../openai.js";
import { SYSTEM_PROMPT } from "../prompt.js";
import { ChatSummarizer } from "../summarizer.js";

const input = { title: "T", description: "D", transcriptText: "words" };
const userPrompt =
  "Title: T\n\nDescription: D\n\nTranscript:\nwords\n\nPlease analyze this video and provide a structured summary.";
const reply = JSON.stringify({ summary: "S", key_points: ["k1"], highlights: [], topics: ["t"] });
const parsed = { summary: "S", keyPoints: ["k1"], highlights: [], topics: ["t"] };

class ScriptedSummarizer extends ChatSummarizer {
  readonly provider = "scripted";
  prompts: string[] = [];

  constructor(private readonly reply: string | Error, logger: Logger = silentLogger) {
    super("scripted-1", 100, logger);
  }

  protected async complete(_system: string, user: string): Promise<string> {
    this.prompts.push(user);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

beforeEach(() => {
  vi.clearAllMocks();
  openAiOptions.length = 0;
});

describe("ChatSummarizer", () => {
  it("parses a fenced reply", async () => {
    const summarizer = new ScriptedSummarizer("```json\n" + reply + "\n```");
    expect(await summarizer.summarize(input)).toEqual(parsed);
    expect(summarizer.prompts).toEqual([userPrompt]);
  });

  it("falls back when the provider call fails", async () => {
    const summarizer = new ScriptedSummarizer(new Error("429 rate limited"));
    expect(await summarizer.summarize(input)).toEqual({
      summary: "Summary generation failed. Title: T",
      keyPoints: ["Unable to generate summary"],
      highlights: [],
      topics: [],
    });
  });

  it("falls back on a blank or malformed reply", async () => {
    expect((await new ScriptedSummarizer("  ").summarize(input)).keyPoints).toEqual(["Unable to generate summary"]);
    expect((await new ScriptedSummarizer('{"summary": 1}').summarize(input)).keyPoints).toEqual([
      "Unable to generate summary",
    ]);
  });

  it("truncates long transcripts with a warning", async () => {
    const { logger, entries } = memoryLogger();
    const summarizer = new ScriptedSummarizer(reply, logger);

    await summarizer.summarize({ ...input, transcriptText: "x".repeat(MAX_TRANSCRIPT_CHARS + 10) });

    expect(summarizer.prompts[0]).toContain(`Transcript:\n${"x".repeat(MAX_TRANSCRIPT_CHARS)}...\n\n`);
    expect(entries).toContainEqual(
      expect.objectContaining({ level: WARN, title: "T", chars: MAX_TRANSCRIPT_CHARS, msg: "Transcript truncated" })
    );
  });
});

describe("OpenAiSummarizer", () => {
  it("requests a JSON chat completion", async () => {
    createCompletion.mockResolvedValue({ choices: [{ message: { content: reply } }] });
    const summarizer = new OpenAiSummarizer({
      apiKey: "test-secret",
      model: "gpt-test",
      maxTokens: 2000,
      logger: silentLogger,
    });

    expect(await summarizer.summarize(input)).toEqual(parsed);
    expect(summarizer.provider).toBe("openai");
    expect(createCompletion).toHaveBeenCalledWith({
      model: "gpt-test",
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: userPrompt },
      ],
      temperature: 0.3,
      max_tokens: 2000,
      response_format: { type: "json_object" },
    });
  });

  it("falls back when the completion has no choices", async () => {
    createCompletion.mockResolvedValue({ choices: [] });
    const summarizer = new OpenAiSummarizer({ apiKey: "test-secret", model: "m", maxTokens: 10, logger: silentLogger });
    expect((await summarizer.summarize(input)).summary).toBe("Summary generation failed. Title: T");
  });
});

describe("AnthropicSummarizer", () => {
  it("joins the text blocks of the message", async () => {
    const half = Math.floor(reply.length / 2);
    createMessage.mockResolvedValue({
      content: [
        { type: "text", text: reply.slice(0, half) },
        { type: "tool_use", id: "t1", name: "noop", input: {} },
        { type: "text", text: reply.slice(half) },
      ],
    });
    const summarizer = new AnthropicSummarizer({
      apiKey: "test-secret",
      model: "claude-test",
      maxTokens: 4000,
      logger: silentLogger,
    });

    expect(await summarizer.summarize(input)).toEqual(parsed);
    expect(createMessage).toHaveBeenCalledWith({
      model: "claude-test",
      max_tokens: 4000,
      temperature: 0.3,
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: userPrompt }],
    });
  });
});

describe("createSummarizer", () => {
  const audioDir = fs.mkdtempSync(path.join(os.tmpdir(), "digest-config-"));
  afterAll(() => fs.rmSync(audioDir, { recursive: true, force: true }));

  it("points DeepSeek at its OpenAI-compatible endpoint", () => {
    const cfg = loadConfig({ AI_PROVIDER: "deepseek", DEEPSEEK_API_KEY: "test-secret", AUDIO_DIR: audioDir }, []);
    const summarizer = createSummarizer(cfg, silentLogger);

    expect(summarizer).toBeInstanceOf(OpenAiSummarizer);
    expect(summarizer.provider).toBe("deepseek");
    expect(summarizer.model).toBe("deepseek-chat");
    expect(openAiOptions).toEqual([{ apiKey: "test-secret", baseURL: DEEPSEEK_BASE_URL }]);
  });

  it("builds the Anthropic summarizer", () => {
    const cfg = loadConfig({ AI_PROVIDER: "anthropic", ANTHROPIC_API_KEY: "test-secret", AUDIO_DIR: audioDir }, []);
    const summarizer = createSummarizer(cfg, silentLogger);
    expect(summarizer).toBeInstanceOf(AnthropicSummarizer);
    expect(summarizer.model).toBe("claude-3-5-sonnet-20241022");
  });

  it("requires the provider's key", () => {
    const cfg = loadConfig({ AUDIO_DIR: audioDir }, []);
    expect(() => createSummarizer(cfg, silentLogger)).toThrow("OpenAI API key is required");
  });
});
