import type { ServiceConfig } from "../config.js";
import { DEEPSEEK_BASE_URL } from "../constants.js";
import type { Logger } from "../utils/logger.js";
import { AnthropicSummarizer } from "./anthropic.js";
import { OpenAiSummarizer } from "./openai.js";
import type { Summarizer } from "./summarizer.js";

export type { Summarizer } from "./summarizer.js";
export type { SummaryInput } from "./prompt.js";

function requireKey(value: string | undefined, name: string): string {
  if (!value) throw new Error(`${name} is required`);
  return value;
}

/** Picks the provider implementation once, at startup. */
export function createSummarizer(cfg: ServiceConfig, logger: Logger): Summarizer {
  const log = logger.child({ component: "summarizer" });
  const common = { model: cfg.summaryModel, maxTokens: cfg.maxSummaryTokens, logger: log };

  switch (cfg.aiProvider) {
    case "openai":
      return new OpenAiSummarizer({ ...common, apiKey: requireKey(cfg.openaiApiKey, "OpenAI API key") });
    case "deepseek":
      return new OpenAiSummarizer({
        ...common,
        apiKey: requireKey(cfg.deepseekApiKey, "DeepSeek API key"),
        baseURL: DEEPSEEK_BASE_URL,
        provider: "deepseek",
      });
    case "anthropic":
      return new AnthropicSummarizer({ ...common, apiKey: requireKey(cfg.anthropicApiKey, "Anthropic API key") });
  }
}
