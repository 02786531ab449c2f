import { CAPTION_EXT_PREFERENCE } from "../constants.js";
import type { CaptionCatalog, CaptionTrack, Transcript } from "../types.js";
import type { Logger } from "../utils/logger.js";
import { parseCaptions } from "./captions.js";
import type { MediaSource } from "./media.js";
import type { TranscriptRequest, TranscriptStrategy } from "./transcript.js";

function pickFormat(formats: CaptionTrack[]): CaptionTrack | undefined {
  for (const ext of CAPTION_EXT_PREFERENCE) {
    const match = formats.find((f) => f.ext === ext);
    if (match) return match;
  }
  return formats[0];
}

/**
 * Manual tracks win whenever any exist. Within the chosen set the preferred
 * language is used if present, else the first listed language.
 */
export function selectCaptionTrack(
  catalog: CaptionCatalog,
  preferredLanguage: string
): CaptionTrack | undefined {
  const set = Object.keys(catalog.manual).length > 0 ? catalog.manual : catalog.automatic;
  const languages = Object.keys(set);
  if (languages.length === 0) return undefined;

  const language = languages.includes(preferredLanguage) ? preferredLanguage : languages[0];
  return pickFormat(set[language]);
}

export class CaptionStrategy implements TranscriptStrategy {
  readonly name = "captions";

  constructor(
    private readonly media: MediaSource,
    private readonly logger: Logger
  ) {}

  async attempt(request: TranscriptRequest): Promise<Transcript | undefined> {
    const { videoId } = request;
    const catalog = await this.media.listCaptionTracks(videoId);
    const track = selectCaptionTrack(catalog, request.preferredLanguage);
    if (!track) {
      this.logger.info({ videoId }, "No subtitles found");
      return undefined;
    }

    this.logger.info(
      { videoId, language: track.language, ext: track.ext, origin: track.origin },
      "Downloading caption track"
    );
    const raw = await this.media.downloadCaption(track);
    if (raw === undefined) return undefined;

    const text = parseCaptions(raw, track.format, this.logger);
    if (!text) return undefined;

    return {
      videoId,
      language: track.language,
      source: track.origin === "manual" ? "platform_manual_captions" : "platform_auto_captions",
      text,
    };
  }
}
