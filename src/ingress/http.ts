import { Express } from "express";
import { IngressAdapter } from "./types";
import { SessionManager } from "../core/sessionManager";
import { SessionStore } from "../core/sessionStore";

export class HttpIngressAdapter implements IngressAdapter {
  private readonly store: SessionStore;

  constructor(store: SessionStore) {
    this.store = store;
  }

  register(app: Express, sessionManager: SessionManager): void {
    app.get("/health", (_req, res) => {
      res.json({ ok: true });
    });

    app.get("/sessions", (_req, res) => {
      res.json({
        sessions: this.store.summarize(Date.now()),
        pending: sessionManager.getPendingIdentities()
      });
    });
  }
}
