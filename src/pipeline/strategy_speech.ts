import type { Transcript } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { withArtifactScope } from "./artifact.js";
import { ensureWithinLimit, type AudioTranscoder } from "./compress.js";
import { detectLanguage } from "./language.js";
import type { MediaSource } from "./media.js";
import type { SpeechToText } from "./transcribe.js";
import type { TranscriptRequest, TranscriptStrategy } from "./transcript.js";

export interface SpeechStrategyDeps {
  media: MediaSource;
  speechToText: SpeechToText;
  transcode: AudioTranscoder;
  maxUploadBytes: number;
  logger: Logger;
}

/** Downloads the audio track and runs it through the speech-to-text backend. */
export class SpeechToTextStrategy implements TranscriptStrategy {
  readonly name = "speech_to_text";

  constructor(private readonly deps: SpeechStrategyDeps) {}

  async attempt(request: TranscriptRequest): Promise<Transcript | undefined> {
    const { videoId } = request;
    const { media, speechToText, transcode, maxUploadBytes, logger } = this.deps;

    const language = detectLanguage(request.metadata);
    if (language) {
      logger.info({ videoId, language }, "Detected language");
    } else {
      logger.info({ videoId }, "No language metadata found, backend will auto-detect");
    }

    return withArtifactScope<Transcript | undefined>(logger, async (scope) => {
      const downloaded = await media.downloadAudio(videoId);
      if (!downloaded) return undefined;
      scope.track(downloaded);

      const audio = await ensureWithinLimit(downloaded, maxUploadBytes, transcode, logger);
      if (!audio) return undefined;
      scope.track(audio);

      const result = await speechToText.transcribe({ filePath: audio.filePath, language });
      if (!result.text) return undefined;

      return {
        videoId,
        language: result.language || language || "unknown",
        source: "speech_to_text",
        text: result.text,
        segments: result.segments,
      };
    });
  }
}
