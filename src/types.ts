import type { ScratchHandle } from "./scratch/scratchTracker";

export type MessageRef = {
  chatId: string;
  messageId: number;
};

export type AudioRef = {
  fileId: string;
  mimeType?: string;
  fileName?: string;
  fileSize?: number;
  durationSec?: number;
};

export type ChoiceOption = {
  label: string;
  signal: string;
};

export type FormatTag = "inline" | "txt" | "docx" | "pdf";

export const CHOICE_SIGNALS = {
  acceptCorrection: "corr_yes",
  declineCorrection: "corr_no",
  formatInline: "fmt_msg",
  formatTxt: "fmt_txt",
  formatDocx: "fmt_docx",
  formatPdf: "fmt_pdf"
} as const;

// Keyed by client-supplied button data.
const FORMAT_BY_SIGNAL = new Map<string, FormatTag>([
  [CHOICE_SIGNALS.formatInline, "inline"],
  [CHOICE_SIGNALS.formatTxt, "txt"],
  [CHOICE_SIGNALS.formatDocx, "docx"],
  [CHOICE_SIGNALS.formatPdf, "pdf"]
]);

export function formatFromSignal(signal: string): FormatTag | undefined {
  return FORMAT_BY_SIGNAL.get(signal);
}

export type InboundEvent =
  | {
      kind: "audio";
      identity: string;
      chatId: string;
      messageId: number;
      audio: AudioRef;
    }
  | {
      kind: "command";
      identity: string;
      chatId: string;
      command: "start" | "cancel";
    }
  | {
      kind: "unsupported";
      identity: string;
      chatId: string;
    }
  | {
      kind: "choice";
      identity: string;
      chatId: string;
      callbackId: string;
      messageId: number;
      signal: string;
    }
  | {
      kind: "expire";
      identity: string;
      /** Skip the idle check; used when the process shuts down. */
      force?: boolean;
    };

export type SessionState = "awaiting_correction" | "awaiting_format";

type SessionBase = {
  id: string;
  progress: MessageRef;
  audio: ScratchHandle;
  rawText: string;
  language: string;
  createdAt: number;
  updatedAt: number;
};

export type AwaitingCorrectionSession = SessionBase & {
  state: "awaiting_correction";
};

export type AwaitingFormatSession = SessionBase & {
  state: "awaiting_format";
  finalText: string;
  corrected: boolean;
  correctionFailed: boolean;
};

export type Session = AwaitingCorrectionSession | AwaitingFormatSession;

export type WorkflowOutcome =
  | "delivered"
  | "input_rejected"
  | "transcription_empty"
  | "transcription_failed"
  | "render_failed"
  | "delivery_failed"
  | "cancelled"
  | "expired";
