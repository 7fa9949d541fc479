import { AudioRef, InboundEvent } from "../../types";
import { TelegramMessage, TelegramUpdate } from "./types";

const COMMANDS = new Map<string, "start" | "cancel">([
  ["start", "start"],
  ["help", "start"],
  ["cancel", "cancel"]
]);

export function parseTelegramUpdate(update: TelegramUpdate): InboundEvent | null {
  const callback = update.callback_query;
  if (callback) {
    if (!callback.message || typeof callback.data !== "string") {
      return null;
    }
    const chatId = String(callback.message.chat.id);
    return {
      kind: "choice",
      identity: chatId,
      chatId,
      callbackId: callback.id,
      messageId: callback.message.message_id,
      signal: callback.data
    };
  }

  const message = update.message;
  if (!message) {
    return null;
  }

  const chatId = String(message.chat.id);
  const audio = extractAudio(message);
  if (audio) {
    return { kind: "audio", identity: chatId, chatId, messageId: message.message_id, audio };
  }

  const command = parseCommand(message.text);
  if (command) {
    return { kind: "command", identity: chatId, chatId, command };
  }

  return { kind: "unsupported", identity: chatId, chatId };
}

function extractAudio(message: TelegramMessage): AudioRef | null {
  if (message.voice) {
    return {
      fileId: message.voice.file_id,
      mimeType: message.voice.mime_type ?? "audio/ogg",
      fileSize: message.voice.file_size,
      durationSec: message.voice.duration
    };
  }

  if (message.audio) {
    return {
      fileId: message.audio.file_id,
      mimeType: message.audio.mime_type,
      fileName: message.audio.file_name,
      fileSize: message.audio.file_size,
      durationSec: message.audio.duration
    };
  }

  const document = message.document;
  if (document && (document.mime_type ?? "").toLowerCase().startsWith("audio/")) {
    return {
      fileId: document.file_id,
      mimeType: document.mime_type,
      fileName: document.file_name,
      fileSize: document.file_size
    };
  }

  return null;
}

function parseCommand(text: string | undefined): "start" | "cancel" | null {
  const match = text?.trim().match(/^\/([A-Za-z_]+)(?:@\S+)?(?:\s|$)/);
  if (!match?.[1]) {
    return null;
  }
  return COMMANDS.get(match[1].toLowerCase()) ?? null;
}
