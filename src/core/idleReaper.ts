import { SessionManager } from "./sessionManager";
import { SessionStore } from "./sessionStore";

export type IdleReaperConfig = {
  idleTimeoutMs: number;
  sweepIntervalMs: number;
};

/**
 * Periodically queues an `expire` event for sessions nobody has touched for
 * `idleTimeoutMs`. The event goes through the session queue, so it never races
 * a choice the user is making at the same moment.
 */
export class IdleReaper {
  private readonly store: SessionStore;
  private readonly sessionManager: SessionManager;
  private readonly config: IdleReaperConfig;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    store: SessionStore,
    sessionManager: SessionManager,
    config: IdleReaperConfig,
    now: () => number = Date.now
  ) {
    this.store = store;
    this.sessionManager = sessionManager;
    this.config = config;
    this.now = now;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => {
      this.sweep();
    }, this.config.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
  }

  sweep(): string[] {
    const idle = this.store.findIdle(this.now(), this.config.idleTimeoutMs);
    for (const identity of idle) {
      this.sessionManager.enqueue({ kind: "expire", identity }).catch((error) => {
        console.error(`[reaper] failed to expire session ${identity}:`, error);
      });
    }
    return idle;
  }

  /** Expires every stored session regardless of idle time and waits for each to finish. */
  async expireAll(): Promise<string[]> {
    const ids = this.store.list().map((session) => session.id);
    const results = await Promise.allSettled(
      ids.map((identity) => this.sessionManager.enqueue({ kind: "expire", identity, force: true }))
    );
    results.forEach((result, index) => {
      if (result.status === "rejected") {
        console.error(`[reaper] failed to expire session ${ids[index]}:`, result.reason);
      }
    });
    return ids;
  }
}
