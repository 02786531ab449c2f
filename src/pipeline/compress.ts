import fs from "node:fs";
import path from "node:path";
import { COMPRESSION_PROFILE } from "../constants.js";
import { runCommand } from "../utils/process.js";
import type { Logger } from "../utils/logger.js";
import { AudioArtifact } from "./artifact.js";

/** Writes a down-converted copy of `inputPath` to `outputPath`. */
export type AudioTranscoder = (inputPath: string, outputPath: string) => Promise<void>;

export function ffmpegTranscoder(ffmpegCmd: string, timeoutMs?: number): AudioTranscoder {
  return async (inputPath, outputPath) => {
    await runCommand(
      ffmpegCmd,
      [
        "-i", inputPath,
        "-b:a", `${COMPRESSION_PROFILE.bitrateKbps}k`,
        "-ac", String(COMPRESSION_PROFILE.channels),
        "-ar", String(COMPRESSION_PROFILE.sampleRateHz),
        "-y",
        outputPath,
      ],
      { timeoutMs }
    );
  };
}

export function compressedPathFor(filePath: string): string {
  const { dir, name } = path.parse(filePath);
  return path.join(dir, `${name}_compressed.mp3`);
}

/**
 * Returns the artifact untouched when it fits the limit. Otherwise transcodes
 * it and returns the compressed copy, or undefined if transcoding failed.
 * Once the transcoder has run the original is gone either way.
 */
export async function ensureWithinLimit(
  artifact: AudioArtifact,
  limitBytes: number,
  transcode: AudioTranscoder,
  logger: Logger
): Promise<AudioArtifact | undefined> {
  const size = artifact.sizeBytes;
  if (size <= limitBytes) {
    return artifact;
  }

  logger.warn(
    { file: artifact.filePath, sizeMb: +(size / 1024 / 1024).toFixed(1) },
    "Audio file too large, compressing"
  );
  const outputPath = compressedPathFor(artifact.filePath);
  try {
    await transcode(artifact.filePath, outputPath);
  } catch (err) {
    logger.error({ err, file: artifact.filePath }, "Error compressing audio");
    fs.rmSync(outputPath, { force: true });
    return undefined;
  } finally {
    artifact.discard();
  }

  const compressed = new AudioArtifact(outputPath);
  if (!compressed.exists()) {
    logger.error({ file: outputPath }, "Transcoder did not produce an output file");
    return undefined;
  }
  logger.info(
    { file: outputPath, sizeMb: +(compressed.sizeBytes / 1024 / 1024).toFixed(1) },
    "Compressed audio"
  );
  return compressed;
}
