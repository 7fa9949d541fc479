export type STTInput = {
  audioPath: string;
  signal?: AbortSignal;
};

export type TranscriptionResult = {
  text: string;
  language: string;
};

export interface STTProvider {
  readonly name: string;
  ensureReady?(): Promise<void>;
  transcribe(input: STTInput): Promise<TranscriptionResult>;
}

export interface Transcriber {
  transcribe(input: STTInput): Promise<TranscriptionResult>;
}
