import { AudioRef, ChoiceOption, MessageRef } from "../types";

/**
 * Outbound side of the messenger. Presenting a choice is sending or editing a
 * message with `choices` attached.
 */
export interface MessagingPort {
  downloadAudio(audio: AudioRef, targetPath: string, signal?: AbortSignal): Promise<void>;
  sendMessage(chatId: string, text: string, choices?: ChoiceOption[]): Promise<MessageRef>;
  editMessage(ref: MessageRef, text: string, choices?: ChoiceOption[]): Promise<void>;
  deleteMessage(ref: MessageRef): Promise<void>;
  sendDocument(chatId: string, filePath: string, displayName: string): Promise<void>;
  acknowledgeChoice(callbackId: string, text?: string): Promise<void>;
}
