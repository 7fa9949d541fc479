import crypto from "crypto";
import fs from "fs/promises";
import os from "os";
import path from "path";

export type ScratchHandle = {
  readonly id: string;
  readonly label: string;
  readonly path: string;
  readonly createdAt: number;
};

export type ScratchTrackerConfig = {
  rootDir: string;
};

export class ScratchReleaseError extends Error {
  constructor(readonly handleId: string) {
    super(`scratch artifact already released: ${handleId}`);
    this.name = "ScratchReleaseError";
  }
}

/**
 * Owns every temporary file the bot creates. A handle is live from
 * {@link ScratchTracker.create} until its single {@link ScratchTracker.release};
 * releasing twice throws.
 */
export class ScratchTracker {
  private readonly config: ScratchTrackerConfig;
  private readonly live = new Map<string, ScratchHandle>();
  private releasedCount = 0;

  constructor(config?: Partial<ScratchTrackerConfig>) {
    this.config = {
      rootDir: config?.rootDir ?? process.env.SCRATCH_DIR ?? path.join(os.tmpdir(), "voice-scribe")
    };
  }

  getRootDir(): string {
    return this.config.rootDir;
  }

  async create(label: string, extension: string): Promise<ScratchHandle> {
    await fs.mkdir(this.config.rootDir, { recursive: true });

    const id = crypto.randomUUID();
    const filename = `${sanitizeLabel(label)}-${id}.${sanitizeExtension(extension)}`;
    const handle: ScratchHandle = {
      id,
      label,
      path: path.join(this.config.rootDir, filename),
      createdAt: Date.now()
    };

    // Reserve the name on disk so the path exists even before anything is written.
    await fs.writeFile(handle.path, "");
    this.live.set(id, handle);
    return handle;
  }

  async release(handle: ScratchHandle): Promise<void> {
    if (!this.live.delete(handle.id)) {
      throw new ScratchReleaseError(handle.id);
    }
    this.releasedCount += 1;
    await fs.rm(handle.path, { force: true });
  }

  isLive(handle: ScratchHandle): boolean {
    return this.live.has(handle.id);
  }

  liveCount(): number {
    return this.live.size;
  }

  getReleasedCount(): number {
    return this.releasedCount;
  }

  async releaseAll(): Promise<number> {
    const handles = Array.from(this.live.values());
    for (const handle of handles) {
      try {
        await this.release(handle);
      } catch (error) {
        console.error(`[scratch] failed to release ${handle.path}:`, error);
      }
    }
    return handles.length;
  }
}

function sanitizeLabel(input: string): string {
  const normalized = input.replace(/[^A-Za-z0-9._-]/g, "_");
  return normalized || "scratch";
}

function sanitizeExtension(input: string): string {
  const normalized = input.toLowerCase().replace(/[^a-z0-9]/g, "");
  return normalized || "dat";
}
