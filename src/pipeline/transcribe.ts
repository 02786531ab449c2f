import fs from "node:fs";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { fetch, FormData, File } from "undici";
import { z } from "zod";
import type { TranscriptSegment } from "../types.js";
import type { Logger } from "../utils/logger.js";

export interface SpeechToTextRequest {
  filePath: string;
  language?: string; // hint; omitted means auto-detect
}

export interface SpeechToTextResult {
  text: string;
  language?: string;
  segments?: TranscriptSegment[];
}

export interface SpeechToText {
  transcribe(request: SpeechToTextRequest): Promise<SpeechToTextResult>;
}

export class SpeechToTextError extends Error {
  constructor(readonly status: number, body: string) {
    super(`Speech-to-text request failed: ${status} ${body.slice(0, 200)}`);
    this.name = "SpeechToTextError";
  }

  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

// OpenAI-compatible verbose_json: { text, language, duration, segments: [{ id, start, end, text }] }
const VerboseJsonSchema = z.object({
  text: z.string(),
  language: z.string().nullish(),
  segments: z
    .array(z.object({ start: z.number(), end: z.number(), text: z.string() }))
    .nullish(),
});

export interface WhisperApiOptions {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  logger: Logger;
  // Wait before each retry of a 429/5xx response
  retryDelaysMs?: number[];
}

const MIME_TYPES: Record<string, string> = {
  ".mp3": "audio/mpeg",
  ".m4a": "audio/mp4",
  ".wav": "audio/wav",
  ".webm": "audio/webm",
  ".ogg": "audio/ogg",
};

export class WhisperApiClient implements SpeechToText {
  private readonly log: Logger;
  private readonly retryDelaysMs: number[];

  constructor(private readonly opts: WhisperApiOptions) {
    this.log = opts.logger.child({ component: "speech-to-text" });
    this.retryDelaysMs = opts.retryDelaysMs ?? [1000, 3000];
  }

  async transcribe(request: SpeechToTextRequest): Promise<SpeechToTextResult> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.transcribeOnce(request);
      } catch (err) {
        const delay = this.retryDelaysMs[attempt];
        if (err instanceof SpeechToTextError && err.retryable && delay !== undefined) {
          this.log.warn({ status: err.status, attempt: attempt + 1, delay }, "Retrying transcription");
          await sleep(delay);
          continue;
        }
        throw err;
      }
    }
  }

  private async transcribeOnce(request: SpeechToTextRequest): Promise<SpeechToTextResult> {
    const fileName = path.basename(request.filePath);
    const form = new FormData();
    const buf = fs.readFileSync(request.filePath);
    form.append(
      "file",
      new File([buf], fileName, {
        type: MIME_TYPES[path.extname(fileName).toLowerCase()] ?? "application/octet-stream",
      })
    );
    form.append("model", this.opts.model);
    if (request.language) form.append("language", request.language);
    form.append("response_format", "verbose_json");

    this.log.info({ file: fileName, language: request.language ?? "auto" }, "Calling transcription API");
    const res = await fetch(`${this.opts.baseUrl}/audio/transcriptions`, {
      method: "POST",
      headers: { Authorization: `Bearer ${this.opts.apiKey}` },
      body: form,
      signal: AbortSignal.timeout(this.opts.timeoutMs),
    });
    if (!res.ok) {
      throw new SpeechToTextError(res.status, await res.text());
    }

    const raw = VerboseJsonSchema.parse(await res.json());
    const segments = (raw.segments ?? []).map((s) => ({
      start: s.start,
      end: s.end,
      text: s.text.trim(),
    }));
    return {
      text: raw.text.trim(),
      language: raw.language ?? undefined,
      segments: segments.length > 0 ? segments : undefined,
    };
  }
}
