/** One engine instance is bound to a single language for its whole life. */
export interface CorrectionEngine {
  readonly language: string;
  check(text: string, signal?: AbortSignal): Promise<string>;
}

export type CorrectionEngineFactory = (language: string) => CorrectionEngine;

export type CorrectionOutcome = {
  text: string;
  applied: boolean;
  error?: string;
};

export interface Corrector {
  correct(text: string, language: string): Promise<CorrectionOutcome>;
}
