import path from "node:path";
import fs from "node:fs";
import { fetch } from "undici";
import { z } from "zod";
import { DOWNLOAD_AUDIO_QUALITY, watchUrl } from "../constants.js";
import type { CaptionCatalog, CaptionOrigin, CaptionTrack } from "../types.js";
import { runCommand } from "../utils/process.js";
import type { Logger } from "../utils/logger.js";
import { AudioArtifact } from "./artifact.js";
import { captionFormatFromExt } from "./captions.js";

/**
 * What the pipeline needs from the video platform. Every operation reports
 * failure as an empty/undefined result.
 */
export interface MediaSource {
  listCaptionTracks(videoId: string): Promise<CaptionCatalog>;
  downloadCaption(track: CaptionTrack): Promise<string | undefined>;
  downloadAudio(videoId: string): Promise<AudioArtifact | undefined>;
}

export interface YtDlpOptions {
  ytdlpCmd: string;
  ffmpegCmd: string;
  audioDir: string;
  timeoutMs?: number;
  logger: Logger;
}

const SubtitleListSchema = z.record(
  z.array(z.object({ ext: z.string().optional(), url: z.string().optional() }))
);

const InfoSchema = z.object({
  subtitles: SubtitleListSchema.nullish(),
  automatic_captions: SubtitleListSchema.nullish(),
});

type SubtitleList = z.infer<typeof SubtitleListSchema>;

export function emptyCatalog(): CaptionCatalog {
  return { manual: {}, automatic: {} };
}

function toTracks(list: SubtitleList | null | undefined, origin: CaptionOrigin) {
  const tracks: Record<string, CaptionTrack[]> = {};
  for (const [language, formats] of Object.entries(list ?? {})) {
    const usable: CaptionTrack[] = [];
    for (const f of formats) {
      if (!f.ext || !f.url) continue;
      usable.push({ language, origin, ext: f.ext, url: f.url, format: captionFormatFromExt(f.ext) });
    }
    if (usable.length > 0) tracks[language] = usable;
  }
  return tracks;
}

export class YtDlpMediaSource implements MediaSource {
  private readonly log: Logger;

  constructor(private readonly opts: YtDlpOptions) {
    this.log = opts.logger.child({ component: "media" });
  }

  async listCaptionTracks(videoId: string): Promise<CaptionCatalog> {
    try {
      const { stdout } = await runCommand(
        this.opts.ytdlpCmd,
        ["--dump-single-json", "--skip-download", "--no-warnings", watchUrl(videoId)],
        { timeoutMs: this.opts.timeoutMs }
      );
      const info = InfoSchema.safeParse(JSON.parse(stdout));
      if (!info.success) {
        this.log.warn({ videoId, issues: info.error.issues }, "Unexpected yt-dlp metadata shape");
        return emptyCatalog();
      }
      return {
        manual: toTracks(info.data.subtitles, "manual"),
        automatic: toTracks(info.data.automatic_captions, "automatic"),
      };
    } catch (err) {
      this.log.error({ err, videoId }, "Error listing caption tracks");
      return emptyCatalog();
    }
  }

  async downloadCaption(track: CaptionTrack): Promise<string | undefined> {
    try {
      const res = await fetch(track.url, {
        signal: AbortSignal.timeout(this.opts.timeoutMs ?? 60000),
      });
      if (!res.ok) {
        this.log.warn(
          { status: res.status, language: track.language, ext: track.ext },
          "Caption download failed"
        );
        return undefined;
      }
      return await res.text();
    } catch (err) {
      this.log.error({ err, language: track.language, ext: track.ext }, "Error downloading caption track");
      return undefined;
    }
  }

  async downloadAudio(videoId: string): Promise<AudioArtifact | undefined> {
    // Named by video id so concurrent invocations for other videos never collide
    const outPath = path.join(this.opts.audioDir, `${videoId}.mp3`);
    try {
      await runCommand(
        this.opts.ytdlpCmd,
        [
          "--format", "bestaudio/best",
          "--extract-audio",
          "--audio-format", "mp3",
          "--audio-quality", DOWNLOAD_AUDIO_QUALITY,
          ...this.ffmpegLocationArgs(),
          "--no-progress",
          "--no-warnings",
          "--output", path.join(this.opts.audioDir, `${videoId}.%(ext)s`),
          watchUrl(videoId),
        ],
        { timeoutMs: this.opts.timeoutMs }
      );
    } catch (err) {
      this.log.error({ err, videoId }, "Error downloading audio");
      this.removePartials(videoId);
      return undefined;
    }

    if (!fs.existsSync(outPath)) {
      this.log.error({ videoId, outPath }, "yt-dlp did not produce the mp3 file");
      this.removePartials(videoId);
      return undefined;
    }
    return new AudioArtifact(outPath);
  }

  // yt-dlp leaves <id>.webm.part, <id>.m4a and the like behind when it is killed
  private removePartials(videoId: string): void {
    const prefix = `${videoId}.`;
    try {
      for (const name of fs.readdirSync(this.opts.audioDir)) {
        if (name.startsWith(prefix)) {
          fs.rmSync(path.join(this.opts.audioDir, name), { force: true });
        }
      }
    } catch (err) {
      this.log.warn({ err, videoId }, "Cleanup warning");
    }
  }

  // A bare command name is left to yt-dlp's own PATH lookup
  private ffmpegLocationArgs(): string[] {
    const cmd = this.opts.ffmpegCmd;
    return path.isAbsolute(cmd) || cmd.includes(path.sep) ? ["--ffmpeg-location", cmd] : [];
  }
}
