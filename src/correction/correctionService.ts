import { parseInteger } from "../config";
import { withDeadline } from "../core/deadline";
import { describeError } from "../errors";
import { LanguageToolCorrector } from "./languageToolCorrector";
import { CorrectionEngine, CorrectionEngineFactory, CorrectionOutcome, Corrector } from "./types";

type PoolEntry = {
  engine: CorrectionEngine;
  tail: Promise<void>;
};

export type CorrectionServiceConfig = {
  timeoutMs: number;
};

/**
 * Language-keyed pool of correction engines. Calls for one language queue up on
 * that language's instance; different languages never share an instance, so
 * concurrent sessions cannot re-target each other's engine.
 *
 * `correct` never rejects. On an engine fault or deadline the input text comes
 * back with `applied: false`.
 */
export class CorrectionService implements Corrector {
  private readonly pool = new Map<string, PoolEntry>();
  private readonly factory: CorrectionEngineFactory;
  private readonly config: CorrectionServiceConfig;

  constructor(factory?: CorrectionEngineFactory, config?: Partial<CorrectionServiceConfig>) {
    this.factory = factory ?? ((language) => new LanguageToolCorrector(language));
    this.config = {
      timeoutMs: config?.timeoutMs ?? parseInteger(process.env.CORRECTION_TIMEOUT_MS, 30000)
    };
  }

  getLanguages(): string[] {
    return Array.from(this.pool.keys());
  }

  async correct(text: string, language: string): Promise<CorrectionOutcome> {
    const key = language.trim().toLowerCase();

    try {
      const entry = this.acquire(key);
      const run = entry.tail.then(() =>
        withDeadline(`correction (${key})`, this.config.timeoutMs, (signal) => entry.engine.check(text, signal))
      );
      entry.tail = run.then(
        () => undefined,
        () => undefined
      );

      const corrected = await run;
      return { text: corrected, applied: true };
    } catch (error) {
      const message = describeError(error);
      console.warn(`[correction] ${key} failed, keeping original text: ${message}`);
      return { text, applied: false, error: message };
    }
  }

  private acquire(language: string): PoolEntry {
    const existing = this.pool.get(language);
    if (existing) {
      return existing;
    }
    const entry: PoolEntry = {
      engine: this.factory(language),
      tail: Promise.resolve()
    };
    this.pool.set(language, entry);
    return entry;
  }
}
