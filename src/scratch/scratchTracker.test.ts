import test from "node:test";
import assert from "node:assert/strict";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { ScratchReleaseError, ScratchTracker } from "./scratchTracker";

async function withTracker(run: (tracker: ScratchTracker, rootDir: string) => Promise<void>): Promise<void> {
  const rootDir = await fs.mkdtemp(path.join(os.tmpdir(), "voice-scribe-scratch-"));
  try {
    await run(new ScratchTracker({ rootDir }), rootDir);
  } finally {
    await fs.rm(rootDir, { recursive: true, force: true });
  }
}

test("create reserves an empty file under the root", async () => {
  await withTracker(async (tracker, rootDir) => {
    const handle = await tracker.create("audio", "OGG");

    assert.equal(path.dirname(handle.path), rootDir);
    assert.match(path.basename(handle.path), /^audio-[0-9a-f-]{36}\.ogg$/);
    assert.equal((await fs.stat(handle.path)).size, 0);
    assert.equal(tracker.isLive(handle), true);
    assert.equal(tracker.liveCount(), 1);
  });
});

test("release removes the file and a second release throws", async () => {
  await withTracker(async (tracker) => {
    const handle = await tracker.create("render", "txt");
    await fs.writeFile(handle.path, "hello");

    await tracker.release(handle);
    await assert.rejects(fs.access(handle.path));
    assert.equal(tracker.isLive(handle), false);
    assert.equal(tracker.getReleasedCount(), 1);

    await assert.rejects(tracker.release(handle), ScratchReleaseError);
    assert.equal(tracker.getReleasedCount(), 1);
  });
});

test("release tolerates a file that is already gone from disk", async () => {
  await withTracker(async (tracker) => {
    const handle = await tracker.create("audio", "ogg");
    await fs.rm(handle.path);

    await tracker.release(handle);
    assert.equal(tracker.liveCount(), 0);
  });
});

test("releaseAll empties the tracker", async () => {
  await withTracker(async (tracker, rootDir) => {
    await tracker.create("audio", "ogg");
    await tracker.create("render", "pdf");

    assert.equal(await tracker.releaseAll(), 2);
    assert.equal(tracker.liveCount(), 0);
    assert.deepEqual(await fs.readdir(rootDir), []);
  });
});

test("labels and extensions are sanitized", async () => {
  await withTracker(async (tracker) => {
    const handle = await tracker.create("../evil name", ".m4a!");

    assert.match(path.basename(handle.path), /^\.\._evil_name-[0-9a-f-]{36}\.m4a$/);
  });
});
