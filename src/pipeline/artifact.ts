import fs from "node:fs";
import type { Logger } from "../utils/logger.js";

/** An audio file in the audio directory, owned by one pipeline invocation. */
export class AudioArtifact {
  constructor(readonly filePath: string) {}

  get sizeBytes(): number {
    return fs.statSync(this.filePath).size;
  }

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  discard(): void {
    fs.rmSync(this.filePath, { force: true });
  }
}

/**
 * Tracks every artifact created while it is open and removes them all when
 * released.
 */
export class ArtifactScope {
  private readonly owned: AudioArtifact[] = [];

  constructor(private readonly logger: Logger) {}

  track(artifact: AudioArtifact): AudioArtifact {
    this.owned.push(artifact);
    return artifact;
  }

  release(): void {
    for (const artifact of this.owned.splice(0)) {
      try {
        artifact.discard();
        this.logger.debug({ file: artifact.filePath }, "Deleted audio file");
      } catch (err) {
        this.logger.warn({ err, file: artifact.filePath }, "Cleanup warning");
      }
    }
  }
}

export async function withArtifactScope<T>(
  logger: Logger,
  fn: (scope: ArtifactScope) => Promise<T>
): Promise<T> {
  const scope = new ArtifactScope(logger);
  try {
    return await fn(scope);
  } finally {
    scope.release();
  }
}
