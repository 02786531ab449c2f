import { DEFAULT_CAPTION_LANGUAGE, MAX_UPLOAD_BYTES } from "../constants.js";
import type { LanguageMetadata, Transcript } from "../types.js";
import type { Logger } from "../utils/logger.js";
import type { AudioTranscoder } from "./compress.js";
import type { MediaSource } from "./media.js";
import { CaptionStrategy } from "./strategy_captions.js";
import { SpeechToTextStrategy } from "./strategy_speech.js";
import type { SpeechToText } from "./transcribe.js";

export interface TranscriptRequest {
  videoId: string;
  preferredLanguage: string;
  metadata?: LanguageMetadata;
}

/** One way of obtaining a transcript. Undefined means "try the next one". */
export interface TranscriptStrategy {
  readonly name: string;
  attempt(request: TranscriptRequest): Promise<Transcript | undefined>;
}

export interface TranscriptOptions {
  preferredLanguage?: string;
  metadata?: LanguageMetadata;
}

export interface TranscriptProvider {
  getTranscript(videoId: string, options?: TranscriptOptions): Promise<Transcript | undefined>;
}

export class TranscriptPipeline implements TranscriptProvider {
  constructor(
    private readonly strategies: TranscriptStrategy[],
    private readonly logger: Logger
  ) {}

  /**
   * Runs the strategies in order and returns the first non-empty transcript.
   * Never throws: a failing strategy is logged and the next one runs.
   */
  async getTranscript(videoId: string, options: TranscriptOptions = {}): Promise<Transcript | undefined> {
    const request: TranscriptRequest = {
      videoId,
      preferredLanguage: options.preferredLanguage ?? DEFAULT_CAPTION_LANGUAGE,
      metadata: options.metadata,
    };

    for (const strategy of this.strategies) {
      try {
        const transcript = await strategy.attempt(request);
        if (transcript && transcript.text.trim()) {
          this.logger.info(
            { videoId, source: transcript.source, language: transcript.language, chars: transcript.text.length },
            "Transcript acquired"
          );
          return transcript;
        }
      } catch (err) {
        this.logger.error({ err, videoId, strategy: strategy.name }, "Transcript strategy failed");
      }
    }

    this.logger.warn({ videoId }, "No transcript available");
    return undefined;
  }
}

export interface PipelineDeps {
  media: MediaSource;
  speechToText: SpeechToText;
  transcode: AudioTranscoder;
  logger: Logger;
  maxUploadBytes?: number;
}

export function createTranscriptPipeline(deps: PipelineDeps): TranscriptPipeline {
  const logger = deps.logger.child({ component: "transcripts" });
  return new TranscriptPipeline(
    [
      new CaptionStrategy(deps.media, logger),
      new SpeechToTextStrategy({
        media: deps.media,
        speechToText: deps.speechToText,
        transcode: deps.transcode,
        maxUploadBytes: deps.maxUploadBytes ?? MAX_UPLOAD_BYTES,
        logger,
      }),
    ],
    logger
  );
}
