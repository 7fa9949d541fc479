import { FastWhisperSTTProvider } from "./fastWhisperProvider";
import { MockSTTProvider } from "./mockProvider";
import { STTInput, STTProvider, Transcriber, TranscriptionResult } from "./types";

const DEFAULT_STT_PROVIDER = "fast-whisper";

export type STTRuntimeOptions = {
  defaultLanguage: string;
};

export class STTRuntime implements Transcriber {
  private readonly provider: STTProvider;
  private readonly options: STTRuntimeOptions;

  constructor(provider?: STTProvider, options?: Partial<STTRuntimeOptions>) {
    this.provider = provider ?? createSTTProviderFromEnv();
    this.options = {
      defaultLanguage: normalizeLanguage(options?.defaultLanguage ?? process.env.STT_DEFAULT_LANGUAGE) || "en"
    };
  }

  getProviderName(): string {
    return this.provider.name;
  }

  async init(): Promise<void> {
    if (!this.provider.ensureReady) {
      return;
    }
    await this.provider.ensureReady();
  }

  /**
   * Errors from the provider propagate unchanged. A clip without speech yields
   * an empty `text`, never an error.
   */
  async transcribe(input: STTInput): Promise<TranscriptionResult> {
    const output = await this.provider.transcribe(input);
    return {
      text: output.text.trim(),
      language: normalizeLanguage(output.language) || this.options.defaultLanguage
    };
  }
}

export function createSTTProviderFromEnv(env: NodeJS.ProcessEnv = process.env): STTProvider {
  const providerName = normalizeProviderName(env.STT_PROVIDER);
  if (providerName === "mock") {
    return new MockSTTProvider();
  }
  if (providerName === "fast-whisper") {
    return new FastWhisperSTTProvider();
  }

  console.warn(`[stt] unknown STT_PROVIDER=${env.STT_PROVIDER}, fallback to ${DEFAULT_STT_PROVIDER}`);
  return new FastWhisperSTTProvider();
}

function normalizeProviderName(input: string | undefined): string {
  const normalized = (input ?? DEFAULT_STT_PROVIDER).trim().toLowerCase();
  if (normalized === "fast_whisper" || normalized === "fastwhisper") {
    return "fast-whisper";
  }
  return normalized;
}

function normalizeLanguage(input: string | undefined): string {
  if (!input) {
    return "";
  }
  return input.trim().toLowerCase();
}
