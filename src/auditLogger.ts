import fs from "fs";
import path from "path";
import { FormatTag, WorkflowOutcome } from "./types";

export type AuditEntry = {
  sessionId: string;
  outcome: WorkflowOutcome;
  latencyMs: number;
  language?: string;
  format?: FormatTag;
  corrected?: boolean;
  correctionFailed?: boolean;
  transcriptLength?: number;
  error?: string;
};

export type AuditSink = (entry: AuditEntry) => void;

export function createFileAuditSink(filePath?: string): AuditSink {
  const auditPath = path.resolve(
    process.cwd(),
    filePath ?? process.env.AUDIT_LOG_PATH ?? path.join("data", "audit.jsonl")
  );

  return (entry) => {
    try {
      const dir = path.dirname(auditPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      const line = JSON.stringify({
        ...entry,
        ts: new Date().toISOString()
      });
      fs.appendFileSync(auditPath, line + "\n", "utf-8");
    } catch (error) {
      console.error(`[audit] failed to write ${auditPath}:`, error);
    }
  };
}

export const noopAuditSink: AuditSink = () => undefined;
