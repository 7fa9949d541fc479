import { AwaitingCorrectionSession, Session, SessionState } from "../types";

const STATE_RANK: Record<SessionState, number> = {
  awaiting_correction: 1,
  awaiting_format: 2
};

export class SessionTransitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionTransitionError";
  }
}

export type SessionSummary = {
  id: string;
  state: SessionState;
  language: string;
  ageMs: number;
  idleMs: number;
};

/** In-memory identity → session map. At most one session per identity. */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  create(session: AwaitingCorrectionSession): void {
    if (this.sessions.has(session.id)) {
      throw new SessionTransitionError(`session already active: ${session.id}`);
    }
    this.sessions.set(session.id, session);
  }

  /** Replaces the stored session; only forward moves are accepted. */
  advance(next: Session): void {
    const current = this.sessions.get(next.id);
    if (!current) {
      throw new SessionTransitionError(`no active session: ${next.id}`);
    }
    if (STATE_RANK[next.state] <= STATE_RANK[current.state]) {
      throw new SessionTransitionError(`illegal transition ${current.state} -> ${next.state} for ${next.id}`);
    }
    this.sessions.set(next.id, next);
  }

  delete(id: string): Session | undefined {
    const session = this.sessions.get(id);
    this.sessions.delete(id);
    return session;
  }

  findIdle(now: number, idleTimeoutMs: number): string[] {
    const out: string[] = [];
    for (const session of this.sessions.values()) {
      if (now - session.updatedAt >= idleTimeoutMs) {
        out.push(session.id);
      }
    }
    return out;
  }

  list(): Session[] {
    return Array.from(this.sessions.values());
  }

  summarize(now: number): SessionSummary[] {
    return this.list().map((session) => ({
      id: session.id,
      state: session.state,
      language: session.language,
      ageMs: now - session.createdAt,
      idleMs: now - session.updatedAt
    }));
  }

  size(): number {
    return this.sessions.size;
  }
}
