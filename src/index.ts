import "dotenv/config";
import express from "express";
import { createFileAuditSink, noopAuditSink } from "./auditLogger";
import { loadConfig } from "./config";
import { CorrectionService } from "./correction/correctionService";
import { IdleReaper } from "./core/idleReaper";
import { SessionManager } from "./core/sessionManager";
import { SessionStore } from "./core/sessionStore";
import { TranscriptionWorkflow } from "./core/workflow";
import { HttpIngressAdapter } from "./ingress/http";
import { TelegramPollingIngress } from "./ingress/telegramPolling";
import { TelegramWebhookIngressAdapter } from "./ingress/telegramWebhook";
import { TelegramBotClient } from "./messaging/telegram/client";
import { DocumentRenderer } from "./render/documentRenderer";
import { PdfEncoder } from "./render/pdfEncoder";
import { ScratchTracker } from "./scratch/scratchTracker";
import { STTRuntime } from "./stt";

const config = loadConfig();

if (!config.telegramToken) {
  console.error("[init] TELEGRAM_BOT_TOKEN is not set. Add it to your .env file.");
  process.exit(1);
}

const app = express();
app.use(express.json({ limit: "1mb" }));

const telegram = new TelegramBotClient({
  token: config.telegramToken,
  apiBaseUrl: config.telegramApiBaseUrl,
  requestTimeoutMs: config.telegramRequestTimeoutMs
});
const scratch = new ScratchTracker({ rootDir: config.scratchDir });
const sessions = new SessionStore();
const sttRuntime = new STTRuntime();
const corrector = new CorrectionService(undefined, { timeoutMs: config.timeouts.correctionMs });
const renderer = new DocumentRenderer(
  scratch,
  { pdf: new PdfEncoder({ timeoutMs: config.timeouts.renderMs }) },
  { title: config.documentTitle }
);

const workflow = new TranscriptionWorkflow(
  {
    port: telegram,
    sessions,
    scratch,
    transcriber: sttRuntime,
    corrector,
    renderer,
    audit: config.auditEnabled ? createFileAuditSink() : noopAuditSink
  },
  {
    timeouts: {
      downloadMs: config.timeouts.downloadMs,
      transcribeMs: config.timeouts.transcribeMs,
      renderMs: config.timeouts.renderMs
    },
    maxAudioBytes: config.maxAudioBytes,
    correctionEnabled: config.correctionEnabled,
    idleTimeoutMs: config.sessionIdleTimeoutMs
  }
);
const sessionManager = new SessionManager(workflow);
const reaper = new IdleReaper(sessions, sessionManager, {
  idleTimeoutMs: config.sessionIdleTimeoutMs,
  sweepIntervalMs: config.sessionSweepIntervalMs
});
const polling = new TelegramPollingIngress(telegram, sessionManager, { timeoutSec: config.pollTimeoutSec });

new HttpIngressAdapter(sessions).register(app, sessionManager);
if (config.ingressMode === "webhook") {
  new TelegramWebhookIngressAdapter(config.webhookSecret).register(app, sessionManager);
}

async function startServer() {
  try {
    console.log("[init] Initializing STT runtime...");
    await sttRuntime.init();
    console.log(`[init] STT runtime ready: provider=${sttRuntime.getProviderName()}`);

    if (config.ingressMode === "webhook") {
      if (config.webhookUrl) {
        await telegram.setWebhook(config.webhookUrl, config.webhookSecret || undefined);
        console.log(`[init] Telegram webhook registered: ${config.webhookUrl}`);
      }
    } else {
      await telegram.deleteWebhook();
      polling.start();
      console.log(`[init] Telegram long polling started (timeout=${config.pollTimeoutSec}s)`);
    }

    reaper.start();
    console.log(`[init] Idle reaper started (idle=${config.sessionIdleTimeoutMs}ms)`);

    app.listen(config.port, () => {
      console.log(`[init] Ingress listening on :${config.port}`);
    });
  } catch (error) {
    console.error("[init] Failed to start server:", error);
    process.exit(1);
  }
}

async function shutdown(signal: string) {
  console.log(`[shutdown] ${signal} received`);
  reaper.stop();
  await polling.stop();
  await sessionManager.drain();
  const abandoned = await reaper.expireAll();
  console.log(`[shutdown] expired ${abandoned.length} open session(s)`);
  const released = await scratch.releaseAll();
  console.log(`[shutdown] released ${released} scratch artifact(s)`);
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error) => {
      console.error("[shutdown] failed:", error);
      process.exit(1);
    });
  });
}

void startServer();
