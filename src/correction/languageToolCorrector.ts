import { URLSearchParams } from "url";
import { fetch } from "undici";
import { CorrectionEngine } from "./types";

export type LanguageToolMatch = {
  offset: number;
  length: number;
  replacements: Array<{ value: string }>;
};

export type LanguageToolConfig = {
  baseUrl: string;
};

// Short codes without a regional variant get grammar rules only, no spell check.
const LANGUAGE_VARIANTS: Record<string, string> = {
  en: "en-US",
  de: "de-DE",
  pt: "pt-PT",
  nl: "nl-NL"
};

export class LanguageToolCorrector implements CorrectionEngine {
  readonly language: string;
  private readonly config: LanguageToolConfig;

  constructor(language: string, config?: Partial<LanguageToolConfig>) {
    this.language = language;
    this.config = {
      baseUrl: config?.baseUrl ?? process.env.LANGUAGETOOL_URL ?? "http://localhost:8081"
    };
  }

  async check(text: string, signal?: AbortSignal): Promise<string> {
    const url = this.config.baseUrl.replace(/\/$/, "") + "/v2/check";
    const res = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Accept: "application/json"
      },
      body: new URLSearchParams({
        text,
        language: resolveLanguageToolCode(this.language)
      }).toString(),
      signal
    });

    if (!res.ok) {
      throw new Error(`LanguageTool HTTP ${res.status}: ${(await res.text()).slice(0, 200)}`);
    }

    return applyCorrections(text, normalizeMatches(await res.json()));
  }
}

export function resolveLanguageToolCode(language: string): string {
  const normalized = language.trim();
  return LANGUAGE_VARIANTS[normalized.toLowerCase()] ?? normalized;
}

/**
 * Applies the first suggested replacement of each match. Offsets refer to the
 * original text; a match overlapping an already applied one is skipped.
 */
export function applyCorrections(text: string, matches: LanguageToolMatch[]): string {
  const ordered = matches
    .filter((match) => match.replacements.length > 0)
    .sort((a, b) => a.offset - b.offset);

  let output = "";
  let cursor = 0;
  for (const match of ordered) {
    if (match.offset < cursor || match.offset + match.length > text.length) {
      continue;
    }
    output += text.slice(cursor, match.offset) + match.replacements[0].value;
    cursor = match.offset + match.length;
  }
  return output + text.slice(cursor);
}

export function normalizeMatches(data: unknown): LanguageToolMatch[] {
  const rawMatches = isRecord(data) ? data.matches : undefined;
  if (!Array.isArray(rawMatches)) {
    throw new Error("LanguageTool response missing matches");
  }

  const matches: LanguageToolMatch[] = [];
  for (const raw of rawMatches) {
    if (!isRecord(raw) || typeof raw.offset !== "number" || typeof raw.length !== "number") {
      continue;
    }
    const replacements = (Array.isArray(raw.replacements) ? raw.replacements : [])
      .map((item) => (isRecord(item) ? item.value : undefined))
      .filter((value): value is string => typeof value === "string")
      .map((value) => ({ value }));
    matches.push({ offset: raw.offset, length: raw.length, replacements });
  }
  return matches;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
