export { STTRuntime, createSTTProviderFromEnv } from "./runtime";
export { MockSTTProvider } from "./mockProvider";
export { FastWhisperSTTProvider, parseFastWhisperOutput } from "./fastWhisperProvider";
export type { STTProvider, STTInput, Transcriber, TranscriptionResult } from "./types";
