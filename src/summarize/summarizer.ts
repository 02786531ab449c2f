import type { SummaryContent } from "../types.js";
import type { Logger } from "../utils/logger.js";
import {
  SYSTEM_PROMPT,
  buildUserPrompt,
  fallbackSummary,
  parseSummaryReply,
  truncateTranscript,
  type SummaryInput,
} from "./prompt.js";

export interface Summarizer {
  readonly provider: string;
  readonly model: string;
  summarize(input: SummaryInput): Promise<SummaryContent>;
}

/**
 * Shared prompt and reply handling. Providers only implement the completion
 * call; any failure there or in parsing yields the fallback summary.
 */
export abstract class ChatSummarizer implements Summarizer {
  abstract readonly provider: string;

  constructor(
    readonly model: string,
    protected readonly maxTokens: number,
    protected readonly logger: Logger
  ) {}

  protected abstract complete(systemPrompt: string, userPrompt: string): Promise<string>;

  async summarize(input: SummaryInput): Promise<SummaryContent> {
    const { text, truncated } = truncateTranscript(input.transcriptText);
    if (truncated) {
      this.logger.warn({ title: input.title, chars: text.length - 3 }, "Transcript truncated");
    }

    try {
      this.logger.info({ provider: this.provider, model: this.model }, "Requesting summary");
      const content = await this.complete(SYSTEM_PROMPT, buildUserPrompt(input, text));
      if (!content.trim()) {
        throw new Error("Empty response from API");
      }
      return parseSummaryReply(content);
    } catch (err) {
      this.logger.error({ err, provider: this.provider }, "Summary generation failed");
      return fallbackSummary(input.title);
    }
  }
}
