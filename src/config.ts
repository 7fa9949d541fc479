import os from "os";
import path from "path";

export type IngressMode = "polling" | "webhook";

export type AppConfig = {
  telegramToken: string;
  telegramApiBaseUrl: string;
  ingressMode: IngressMode;
  webhookUrl: string;
  webhookSecret: string;
  pollTimeoutSec: number;
  telegramRequestTimeoutMs: number;
  port: number;
  scratchDir: string;
  maxAudioBytes: number;
  correctionEnabled: boolean;
  documentTitle: string;
  auditEnabled: boolean;
  timeouts: {
    downloadMs: number;
    transcribeMs: number;
    correctionMs: number;
    renderMs: number;
  };
  sessionIdleTimeoutMs: number;
  sessionSweepIntervalMs: number;
};

export const DEFAULT_DOCUMENT_TITLE = "Audio transcript";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    telegramToken: (env.TELEGRAM_BOT_TOKEN ?? "").trim(),
    telegramApiBaseUrl: env.TELEGRAM_API_BASE_URL ?? "https://api.telegram.org",
    ingressMode: parseIngressMode(env.TELEGRAM_INGRESS_MODE),
    webhookUrl: (env.TELEGRAM_WEBHOOK_URL ?? "").trim(),
    webhookSecret: (env.TELEGRAM_WEBHOOK_SECRET ?? "").trim(),
    pollTimeoutSec: parseInteger(env.TELEGRAM_POLL_TIMEOUT_SEC, 30),
    telegramRequestTimeoutMs: parseInteger(env.TELEGRAM_REQUEST_TIMEOUT_MS, 30000),
    port: parseInteger(env.PORT, 3000),
    scratchDir: env.SCRATCH_DIR?.trim() || path.join(os.tmpdir(), "voice-scribe"),
    maxAudioBytes: parseInteger(env.MAX_AUDIO_BYTES, 20 * 1024 * 1024),
    correctionEnabled: parseBoolean(env.CORRECTION_ENABLED, true),
    documentTitle: env.DOCUMENT_TITLE?.trim() || DEFAULT_DOCUMENT_TITLE,
    auditEnabled: parseBoolean(env.AUDIT_ENABLED, true),
    timeouts: {
      downloadMs: parseInteger(env.DOWNLOAD_TIMEOUT_MS, 60000),
      transcribeMs: parseInteger(env.TRANSCRIBE_TIMEOUT_MS, 300000),
      correctionMs: parseInteger(env.CORRECTION_TIMEOUT_MS, 30000),
      renderMs: parseInteger(env.RENDER_TIMEOUT_MS, 60000)
    },
    sessionIdleTimeoutMs: parseInteger(env.SESSION_IDLE_TIMEOUT_MS, 30 * 60 * 1000),
    sessionSweepIntervalMs: parseInteger(env.SESSION_SWEEP_INTERVAL_MS, 60000)
  };
}

export function parseBoolean(input: string | undefined, fallback: boolean): boolean {
  if (!input) {
    return fallback;
  }

  const normalized = input.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }
  return fallback;
}

export function parseInteger(input: string | undefined, fallback: number): number {
  if (!input) {
    return fallback;
  }
  const value = Number.parseInt(input, 10);
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return value;
}

function parseIngressMode(input: string | undefined): IngressMode {
  const normalized = (input ?? "polling").trim().toLowerCase();
  if (normalized === "webhook") {
    return "webhook";
  }
  if (normalized !== "polling") {
    console.warn(`[config] unknown TELEGRAM_INGRESS_MODE=${input}, fallback to polling`);
  }
  return "polling";
}
