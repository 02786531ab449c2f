import OpenAI from "openai";
import { SUMMARY_TEMPERATURE } from "../constants.js";
import type { Logger } from "../utils/logger.js";
import { ChatSummarizer } from "./summarizer.js";

export interface OpenAiSummarizerOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  logger: Logger;
  baseURL?: string; // OpenAI-compatible providers such as DeepSeek
  provider?: string;
}

/** Chat-completions summarizer for OpenAI and OpenAI-compatible APIs. */
export class OpenAiSummarizer extends ChatSummarizer {
  readonly provider: string;
  private readonly client: OpenAI;

  constructor(opts: OpenAiSummarizerOptions) {
    super(opts.model, opts.maxTokens, opts.logger);
    this.provider = opts.provider ?? "openai";
    this.client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
  }

  protected async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
      temperature: SUMMARY_TEMPERATURE,
      max_tokens: this.maxTokens,
      response_format: { type: "json_object" },
    });
    // deepseek-reasoner puts its chain of thought in reasoning_content; content holds the answer
    return response.choices[0]?.message.content ?? "";
  }
}
