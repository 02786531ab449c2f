import { z } from "zod";
import { MAX_TRANSCRIPT_CHARS } from "../constants.js";
import type { SummaryContent } from "../types.js";

export const SYSTEM_PROMPT = `You are an expert at analyzing and summarizing YouTube video content.
Given a video's title, description, and transcript, provide a comprehensive summary.

Your response must be in JSON format with the following structure:
{
    "summary": "A 2-3 paragraph summary of the main content",
    "key_points": ["Point 1", "Point 2", "Point 3", ...],
    "highlights": ["Important quote or moment 1", "Important quote or moment 2", ...],
    "topics": ["Topic/Tag 1", "Topic/Tag 2", ...]
}

Guidelines:
- summary: Capture the main message and key insights (2-3 paragraphs)
- key_points: List 3-7 main points discussed (concise bullet points)
- highlights: 2-5 notable quotes, statistics, or moments (if applicable)
- topics: 3-8 relevant tags/categories for content classification
`;

export interface SummaryInput {
  title: string;
  description: string;
  transcriptText: string;
}

export function truncateTranscript(text: string, max = MAX_TRANSCRIPT_CHARS): { text: string; truncated: boolean } {
  return text.length > max
    ? { text: `${text.slice(0, max)}...`, truncated: true }
    : { text, truncated: false };
}

export function buildUserPrompt(input: SummaryInput, transcriptText: string): string {
  return `Title: ${input.title}

Description: ${input.description}

Transcript:
${transcriptText}

Please analyze this video and provide a structured summary.`;
}

const SummaryReplySchema = z.object({
  summary: z.string(),
  key_points: z.array(z.string()),
  highlights: z.array(z.string()).nullish(),
  topics: z.array(z.string()).nullish(),
});

// Some providers wrap the JSON object in a markdown code fence
export function stripCodeFence(content: string): string {
  let text = content.trim();
  if (text.startsWith("```json")) text = text.slice(7);
  if (text.startsWith("```")) text = text.slice(3);
  if (text.endsWith("```")) text = text.slice(0, -3);
  return text.trim();
}

/** Parses a provider reply; throws when it is not a valid summary object. */
export function parseSummaryReply(content: string): SummaryContent {
  const parsed = SummaryReplySchema.safeParse(JSON.parse(stripCodeFence(content)));
  if (!parsed.success) {
    throw new Error("Invalid summary format from AI");
  }
  return {
    summary: parsed.data.summary,
    keyPoints: parsed.data.key_points,
    highlights: parsed.data.highlights ?? [],
    topics: parsed.data.topics ?? [],
  };
}

export function fallbackSummary(title: string): SummaryContent {
  return {
    summary: `Summary generation failed. Title: ${title}`,
    keyPoints: ["Unable to generate summary"],
    highlights: [],
    topics: [],
  };
}
