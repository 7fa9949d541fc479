import { CHOICE_SIGNALS, ChoiceOption } from "../types";

export const MESSAGES = {
  greeting: "Hi! Send me a voice message or an audio file and I will transcribe it.",
  notAudio: "Please send a voice message or an audio file.",
  busy: "You already have a transcription in progress. Finish it first or send /cancel.",
  tooLarge: (limitBytes: number) =>
    `The audio file is too large. The limit is ${Math.floor(limitBytes / (1024 * 1024))} MB.`,
  receiving: "📥 Receiving audio...",
  recognizing: "🔄 Recognizing speech...",
  speechNotRecognized: "❌ Could not recognize speech.",
  error: (detail: string) => `⚠️ Error: ${detail}`,
  correctionPrompt: (language: string) =>
    `Transcript is ready! Language: ${language.toUpperCase()}\n\nShould I correct the errors?`,
  formatPrompt: "Which format should I send the transcript in?",
  renderFailed: (detail: string) => `❌ Failed to create file: ${detail}`,
  cancelled: "Cancelled.",
  nothingToCancel: "Nothing to cancel.",
  expired: "Session expired. Send the audio again."
} as const;

export const CORRECTION_CHOICES: ChoiceOption[] = [
  { label: "✅ Yes", signal: CHOICE_SIGNALS.acceptCorrection },
  { label: "❌ No", signal: CHOICE_SIGNALS.declineCorrection }
];

export const FORMAT_CHOICES: ChoiceOption[] = [
  { label: "📩 Message", signal: CHOICE_SIGNALS.formatInline },
  { label: "📄 TXT", signal: CHOICE_SIGNALS.formatTxt },
  { label: "📝 DOCX", signal: CHOICE_SIGNALS.formatDocx },
  { label: "📄 PDF", signal: CHOICE_SIGNALS.formatPdf }
];
