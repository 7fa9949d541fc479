import { InboundEvent } from "../types";

export interface InboundEventHandler {
  handle(event: InboundEvent): Promise<void>;
}

/**
 * Serializes events per identity so each session has a single logical worker.
 * Different identities proceed concurrently.
 */
export class SessionManager {
  private readonly handler: InboundEventHandler;
  private readonly queues = new Map<string, Promise<void>>();

  constructor(handler: InboundEventHandler) {
    this.handler = handler;
  }

  enqueue(event: InboundEvent): Promise<void> {
    const identity = event.identity;
    const prior = this.queues.get(identity) ?? Promise.resolve();

    const next = prior
      .catch(() => undefined)
      .then(() => this.handler.handle(event));

    this.queues.set(identity, next);

    const clear = () => {
      if (this.queues.get(identity) === next) {
        this.queues.delete(identity);
      }
    };
    void next.then(clear, clear);

    return next;
  }

  getPendingIdentities(): string[] {
    return Array.from(this.queues.keys());
  }

  async drain(): Promise<void> {
    await Promise.allSettled(Array.from(this.queues.values()));
  }
}
