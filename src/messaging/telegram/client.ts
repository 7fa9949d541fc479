import { Blob } from "buffer";
import fs from "fs/promises";
import { FormData, fetch } from "undici";
import { parseInteger } from "../../config";
import { withDeadline } from "../../core/deadline";
import { AudioRef, ChoiceOption, MessageRef } from "../../types";
import { MessagingPort } from "../port";
import {
  TelegramApiResponse,
  TelegramFile,
  TelegramMessage,
  TelegramReplyMarkup,
  TelegramUpdate
} from "./types";

export type TelegramBotClientConfig = {
  token: string;
  apiBaseUrl: string;
  choicesPerRow: number;
  requestTimeoutMs: number;
};

type CallOptions = {
  signal?: AbortSignal;
  timeoutMs?: number;
};

export class TelegramApiError extends Error {
  constructor(readonly method: string, readonly code: number, readonly description: string) {
    super(`telegram ${method} error ${code}: ${description}`);
    this.name = "TelegramApiError";
  }
}

export class TelegramBotClient implements MessagingPort {
  private readonly config: TelegramBotClientConfig;

  constructor(config?: Partial<TelegramBotClientConfig>) {
    this.config = {
      token: config?.token ?? process.env.TELEGRAM_BOT_TOKEN ?? "",
      apiBaseUrl: (config?.apiBaseUrl ?? process.env.TELEGRAM_API_BASE_URL ?? "https://api.telegram.org").replace(
        /\/$/,
        ""
      ),
      choicesPerRow: config?.choicesPerRow ?? 2,
      requestTimeoutMs:
        config?.requestTimeoutMs ?? parseInteger(process.env.TELEGRAM_REQUEST_TIMEOUT_MS, 30000)
    };
  }

  async sendMessage(chatId: string, text: string, choices?: ChoiceOption[]): Promise<MessageRef> {
    const message = await this.call<TelegramMessage>("sendMessage", {
      chat_id: chatId,
      text,
      ...(choices ? { reply_markup: buildInlineKeyboard(choices, this.config.choicesPerRow) } : {})
    });
    return { chatId: String(message.chat.id), messageId: message.message_id };
  }

  async editMessage(ref: MessageRef, text: string, choices?: ChoiceOption[]): Promise<void> {
    await this.call<TelegramMessage | boolean>("editMessageText", {
      chat_id: ref.chatId,
      message_id: ref.messageId,
      text,
      ...(choices ? { reply_markup: buildInlineKeyboard(choices, this.config.choicesPerRow) } : {})
    });
  }

  async deleteMessage(ref: MessageRef): Promise<void> {
    await this.call<boolean>("deleteMessage", {
      chat_id: ref.chatId,
      message_id: ref.messageId
    });
  }

  async acknowledgeChoice(callbackId: string, text?: string): Promise<void> {
    await this.call<boolean>("answerCallbackQuery", {
      callback_query_id: callbackId,
      ...(text ? { text } : {})
    });
  }

  async sendDocument(chatId: string, filePath: string, displayName: string): Promise<void> {
    const data = await fs.readFile(filePath);
    await this.request("sendDocument", {}, async (signal) => {
      const form = new FormData();
      form.append("chat_id", chatId);
      form.append("document", new Blob([data]), displayName);
      const res = await fetch(this.methodUrl("sendDocument"), {
        method: "POST",
        body: form,
        signal
      });
      return this.unwrap<TelegramMessage>("sendDocument", res.status, await res.json());
    });
  }

  async downloadAudio(audio: AudioRef, targetPath: string, signal?: AbortSignal): Promise<void> {
    const file = await this.call<TelegramFile>("getFile", { file_id: audio.fileId }, { signal });
    if (!file.file_path) {
      throw new Error(`telegram getFile returned no file_path for ${audio.fileId}`);
    }

    const url = `${this.config.apiBaseUrl}/file/bot${this.requireToken()}/${file.file_path}`;
    const res = await fetch(url, { method: "GET", signal });
    if (!res.ok) {
      throw new Error(`telegram file download http ${res.status}`);
    }

    const buffer = Buffer.from(await res.arrayBuffer());
    await fs.writeFile(targetPath, buffer);
  }

  async getUpdates(offset: number | undefined, timeoutSec: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    return this.call<TelegramUpdate[]>(
      "getUpdates",
      {
        timeout: timeoutSec,
        allowed_updates: ["message", "callback_query"],
        ...(offset !== undefined ? { offset } : {})
      },
      // The server holds a long poll open for up to timeoutSec.
      { signal, timeoutMs: timeoutSec * 1000 + this.config.requestTimeoutMs }
    );
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    await this.call<boolean>("setWebhook", {
      url,
      allowed_updates: ["message", "callback_query"],
      ...(secretToken ? { secret_token: secretToken } : {})
    });
  }

  async deleteWebhook(): Promise<void> {
    await this.call<boolean>("deleteWebhook", { drop_pending_updates: false });
  }

  private async call<T>(method: string, body: Record<string, unknown>, options: CallOptions = {}): Promise<T> {
    return this.request(method, options, async (signal) => {
      const res = await fetch(this.methodUrl(method), {
        method: "POST",
        headers: {
          "Content-Type": "application/json"
        },
        body: JSON.stringify(body),
        signal
      });
      return this.unwrap<T>(method, res.status, await res.json());
    });
  }

  /** Every Bot API request runs under a deadline, linked to the caller's signal if one is given. */
  private request<T>(method: string, options: CallOptions, send: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const timeoutMs = options.timeoutMs ?? this.config.requestTimeoutMs;
    return withDeadline(`telegram ${method}`, timeoutMs, async (deadlineSignal) => {
      const linked = linkSignals(deadlineSignal, options.signal);
      try {
        return await send(linked.signal);
      } finally {
        linked.dispose();
      }
    });
  }

  private unwrap<T>(method: string, status: number, payload: unknown): T {
    const data = payload as TelegramApiResponse<T>;
    if (!data.ok || data.result === undefined) {
      throw new TelegramApiError(method, data.error_code ?? status, data.description ?? "unknown error");
    }
    return data.result;
  }

  private methodUrl(method: string): string {
    return `${this.config.apiBaseUrl}/bot${this.requireToken()}/${method}`;
  }

  private requireToken(): string {
    if (!this.config.token) {
      throw new Error("TELEGRAM_BOT_TOKEN missing");
    }
    return this.config.token;
  }
}

export function buildInlineKeyboard(choices: ChoiceOption[], perRow: number): TelegramReplyMarkup {
  const rows: TelegramReplyMarkup["inline_keyboard"] = [];
  for (let i = 0; i < choices.length; i += perRow) {
    rows.push(
      choices.slice(i, i + perRow).map((choice) => ({
        text: choice.label,
        callback_data: choice.signal
      }))
    );
  }
  return { inline_keyboard: rows };
}

function linkSignals(primary: AbortSignal, secondary?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  if (!secondary) {
    return { signal: primary, dispose: () => undefined };
  }

  const controller = new AbortController();
  const abort = () => controller.abort();
  if (primary.aborted || secondary.aborted) {
    abort();
  } else {
    primary.addEventListener("abort", abort, { once: true });
    secondary.addEventListener("abort", abort, { once: true });
  }
  return {
    signal: controller.signal,
    dispose: () => {
      primary.removeEventListener("abort", abort);
      secondary.removeEventListener("abort", abort);
    }
  };
}
