import test from "node:test";
import assert from "node:assert/strict";
import { AddressInfo } from "net";
import express from "express";
import { fetch } from "undici";
import { SessionManager } from "../core/sessionManager";
import { InboundEvent } from "../types";
import { TELEGRAM_WEBHOOK_PATH, TelegramWebhookIngressAdapter, isTelegramUpdate } from "./telegramWebhook";

const SECRET = "test-secret";

async function withWebhook(run: (url: string, events: InboundEvent[]) => Promise<void>): Promise<void> {
  const events: InboundEvent[] = [];
  const manager = new SessionManager({
    handle: async (event) => {
      events.push(event);
    }
  });
  const app = express();
  app.use(express.json());
  new TelegramWebhookIngressAdapter(SECRET).register(app, manager);

  const server = app.listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address: AddressInfo | string | null = server.address();
  if (!address || typeof address === "string") {
    assert.fail("server has no TCP address");
  }

  try {
    await run(`http://127.0.0.1:${address.port}${TELEGRAM_WEBHOOK_PATH}`, events);
    await manager.drain();
  } finally {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  }
}

function post(url: string, body: unknown, secret?: string) {
  return fetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      ...(secret !== undefined ? { "X-Telegram-Bot-Api-Secret-Token": secret } : {})
    },
    body: JSON.stringify(body)
  });
}

const update = { update_id: 9, message: { message_id: 3, chat: { id: 42 }, text: "/start" } };

test("isTelegramUpdate requires a numeric update_id", () => {
  assert.equal(isTelegramUpdate({ update_id: 1 }), true);
  assert.equal(isTelegramUpdate({ update_id: "1" }), false);
  assert.equal(isTelegramUpdate({ message: {} }), false);
  assert.equal(isTelegramUpdate(null), false);
  assert.equal(isTelegramUpdate("update"), false);
});

test("webhook rejects a missing or wrong secret token", async () => {
  await withWebhook(async (url, events) => {
    const missing = await post(url, update);
    assert.equal(missing.status, 401);
    await missing.text();

    const wrong = await post(url, update, "other-secret");
    assert.equal(wrong.status, 401);
    await wrong.text();

    assert.deepEqual(events, []);
  });
});

test("webhook rejects a body that is not an update", async () => {
  await withWebhook(async (url, events) => {
    const res = await post(url, { message: { text: "hi" } }, SECRET);

    assert.equal(res.status, 400);
    assert.equal(await res.text(), "invalid update");
    assert.deepEqual(events, []);
  });
});

test("webhook acknowledges a valid update and queues one event", async () => {
  await withWebhook(async (url, events) => {
    const res = await post(url, update, SECRET);

    assert.equal(res.status, 200);
    assert.equal(await res.text(), "ok");
    await new Promise((resolve) => setImmediate(resolve));
    assert.deepEqual(events, [{ kind: "command", identity: "42", chatId: "42", command: "start" }]);
  });
});
