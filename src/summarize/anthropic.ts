import Anthropic from "@anthropic-ai/sdk";
import { SUMMARY_TEMPERATURE } from "../constants.js";
import type { Logger } from "../utils/logger.js";
import { ChatSummarizer } from "./summarizer.js";

export interface AnthropicSummarizerOptions {
  apiKey: string;
  model: string;
  maxTokens: number;
  logger: Logger;
}

export class AnthropicSummarizer extends ChatSummarizer {
  readonly provider = "anthropic";
  private readonly client: Anthropic;

  constructor(opts: AnthropicSummarizerOptions) {
    super(opts.model, opts.maxTokens, opts.logger);
    this.client = new Anthropic({ apiKey: opts.apiKey });
  }

  protected async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: SUMMARY_TEMPERATURE,
      system: systemPrompt,
      messages: [{ role: "user", content: userPrompt }],
    });
    let text = "";
    for (const block of response.content) {
      if (block.type === "text") text += block.text;
    }
    return text;
  }
}
