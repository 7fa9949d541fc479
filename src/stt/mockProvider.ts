import { STTInput, STTProvider, TranscriptionResult } from "./types";

export type MockSTTProviderConfig = {
  text: string;
  language: string;
};

export class MockSTTProvider implements STTProvider {
  readonly name = "mock";
  private readonly config: MockSTTProviderConfig;

  constructor(config?: Partial<MockSTTProviderConfig>) {
    this.config = {
      text: config?.text ?? process.env.STT_MOCK_TEXT ?? "",
      language: config?.language ?? process.env.STT_MOCK_LANGUAGE ?? "en"
    };
  }

  async transcribe(_input: STTInput): Promise<TranscriptionResult> {
    return { text: this.config.text, language: this.config.language };
  }
}
