import { SessionManager } from "../core/sessionManager";
import { describeError } from "../errors";
import { TelegramUpdate } from "../messaging/telegram/types";
import { parseTelegramUpdate } from "../messaging/telegram/updates";

export interface TelegramUpdateSource {
  getUpdates(offset: number | undefined, timeoutSec: number, signal?: AbortSignal): Promise<TelegramUpdate[]>;
}

export type TelegramPollingConfig = {
  timeoutSec: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
};

export class TelegramPollingIngress {
  private readonly source: TelegramUpdateSource;
  private readonly sessionManager: SessionManager;
  private readonly config: TelegramPollingConfig;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private offset: number | undefined;

  constructor(source: TelegramUpdateSource, sessionManager: SessionManager, config?: Partial<TelegramPollingConfig>) {
    this.source = source;
    this.sessionManager = sessionManager;
    this.config = {
      timeoutSec: config?.timeoutSec ?? 30,
      retryDelayMs: config?.retryDelayMs ?? 1000,
      maxRetryDelayMs: config?.maxRetryDelayMs ?? 30000
    };
  }

  start(): void {
    if (this.loop) {
      return;
    }
    this.controller = new AbortController();
    this.loop = this.run(this.controller.signal);
  }

  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
  }

  /** One getUpdates round; returns how many updates were dispatched. */
  async pollOnce(signal?: AbortSignal): Promise<number> {
    const updates = await this.source.getUpdates(this.offset, this.config.timeoutSec, signal);
    for (const update of updates) {
      this.offset = Math.max(this.offset ?? 0, update.update_id + 1);
      const event = parseTelegramUpdate(update);
      if (!event) {
        continue;
      }
      this.sessionManager.enqueue(event).catch((error) => {
        console.error(`[telegram] update ${update.update_id} failed:`, error);
      });
    }
    return updates.length;
  }

  getOffset(): number | undefined {
    return this.offset;
  }

  private async run(signal: AbortSignal): Promise<void> {
    let delay = this.config.retryDelayMs;
    while (!signal.aborted) {
      try {
        await this.pollOnce(signal);
        delay = this.config.retryDelayMs;
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        console.warn(`[telegram] getUpdates failed, retrying in ${delay}ms: ${describeError(error)}`);
        await sleep(delay, signal);
        delay = Math.min(delay * 2, this.config.maxRetryDelayMs);
      }
    }
    console.log("[telegram] polling stopped");
  }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    }
    signal.addEventListener("abort", done, { once: true });
  });
}
