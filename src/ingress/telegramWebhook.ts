import crypto from "crypto";
import { Express, Request, Response as ExResponse } from "express";
import { IngressAdapter } from "./types";
import { SessionManager } from "../core/sessionManager";
import { parseTelegramUpdate } from "../messaging/telegram/updates";
import { TelegramUpdate } from "../messaging/telegram/types";

export const TELEGRAM_WEBHOOK_PATH = "/ingress/telegram";
const SECRET_HEADER = "x-telegram-bot-api-secret-token";

export class TelegramWebhookIngressAdapter implements IngressAdapter {
  private readonly secret: string;

  constructor(secret?: string) {
    this.secret = secret ?? process.env.TELEGRAM_WEBHOOK_SECRET ?? "";
  }

  register(app: Express, sessionManager: SessionManager): void {
    app.post(TELEGRAM_WEBHOOK_PATH, (req: Request, res: ExResponse) => {
      if (this.secret && !matchesSecret(this.secret, req.header(SECRET_HEADER))) {
        res.status(401).send("invalid secret token");
        return;
      }

      const body: unknown = req.body;
      if (!isTelegramUpdate(body)) {
        res.status(400).send("invalid update");
        return;
      }

      // Telegram retries until it gets a 2xx, so acknowledge before the workflow runs.
      res.status(200).send("ok");

      const event = parseTelegramUpdate(body);
      if (!event) {
        return;
      }
      sessionManager.enqueue(event).catch((error) => {
        console.error(`[telegram] update ${body.update_id} failed:`, error);
      });
    });
  }
}

export function isTelegramUpdate(input: unknown): input is TelegramUpdate {
  return (
    typeof input === "object" &&
    input !== null &&
    "update_id" in input &&
    typeof input.update_id === "number"
  );
}

function matchesSecret(expected: string, provided: string | undefined): boolean {
  if (!provided) {
    return false;
  }
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}
