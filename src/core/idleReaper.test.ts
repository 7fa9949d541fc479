import test from "node:test";
import assert from "node:assert/strict";
import { InboundEvent } from "../types";
import { IdleReaper } from "./idleReaper";
import { SessionManager } from "./sessionManager";
import { SessionStore } from "./sessionStore";

function seed(store: SessionStore, id: string, updatedAt: number): void {
  store.create({
    id,
    state: "awaiting_correction",
    progress: { chatId: id, messageId: 1 },
    audio: { id: `audio-${id}`, label: "audio", path: `/tmp/${id}.ogg`, createdAt: updatedAt },
    rawText: "text",
    language: "en",
    createdAt: updatedAt,
    updatedAt
  });
}

test("sweep queues an expire event for each idle session", async () => {
  const store = new SessionStore();
  seed(store, "stale", 0);
  seed(store, "active", 9000);

  const events: InboundEvent[] = [];
  const manager = new SessionManager({
    handle: async (event) => {
      events.push(event);
    }
  });
  const reaper = new IdleReaper(store, manager, { idleTimeoutMs: 5000, sweepIntervalMs: 1000 }, () => 10000);

  assert.deepEqual(reaper.sweep(), ["stale"]);
  await manager.drain();

  assert.deepEqual(events, [{ kind: "expire", identity: "stale" }]);
});

test("start and stop are idempotent", () => {
  const reaper = new IdleReaper(
    new SessionStore(),
    new SessionManager({ handle: async () => undefined }),
    { idleTimeoutMs: 1000, sweepIntervalMs: 1000 }
  );

  reaper.start();
  reaper.start();
  reaper.stop();
  reaper.stop();
});

test("expireAll forces an expire event for every stored session", async () => {
  const store = new SessionStore();
  seed(store, "a", 9900);
  seed(store, "b", 9950);

  const events: InboundEvent[] = [];
  const manager = new SessionManager({
    handle: async (event) => {
      events.push(event);
    }
  });
  const reaper = new IdleReaper(store, manager, { idleTimeoutMs: 5000, sweepIntervalMs: 1000 }, () => 10000);

  assert.deepEqual(await reaper.expireAll(), ["a", "b"]);
  assert.deepEqual(events, [
    { kind: "expire", identity: "a", force: true },
    { kind: "expire", identity: "b", force: true }
  ]);
});
