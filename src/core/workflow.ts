import { AuditEntry, AuditSink, noopAuditSink } from "../auditLogger";
import { loadConfig } from "../config";
import { Corrector } from "../correction/types";
import { describeError } from "../errors";
import { MessagingPort } from "../messaging/port";
import { Deliverable, DocumentRenderer } from "../render/documentRenderer";
import { ScratchTracker } from "../scratch/scratchTracker";
import { Transcriber } from "../stt/types";
import {
  AwaitingCorrectionSession,
  AwaitingFormatSession,
  CHOICE_SIGNALS,
  FormatTag,
  InboundEvent,
  MessageRef,
  Session,
  WorkflowOutcome,
  formatFromSignal
} from "../types";
import { inferAudioExtension } from "./audio";
import { DeadlineExceededError, withDeadline } from "./deadline";
import { CORRECTION_CHOICES, FORMAT_CHOICES, MESSAGES } from "./messages";
import { InboundEventHandler } from "./sessionManager";
import { SessionStore } from "./sessionStore";

type AudioEvent = Extract<InboundEvent, { kind: "audio" }>;
type CommandEvent = Extract<InboundEvent, { kind: "command" }>;
type UnsupportedEvent = Extract<InboundEvent, { kind: "unsupported" }>;
type ChoiceEvent = Extract<InboundEvent, { kind: "choice" }>;
type ExpireEvent = Extract<InboundEvent, { kind: "expire" }>;

export type WorkflowTimeouts = {
  downloadMs: number;
  transcribeMs: number;
  renderMs: number;
};

export type TranscriptionWorkflowDeps = {
  port: MessagingPort;
  sessions: SessionStore;
  scratch: ScratchTracker;
  transcriber: Transcriber;
  corrector: Corrector;
  renderer: DocumentRenderer;
  audit?: AuditSink;
};

export type TranscriptionWorkflowOptions = {
  timeouts: WorkflowTimeouts;
  maxAudioBytes: number;
  correctionEnabled: boolean;
  idleTimeoutMs: number;
  now: () => number;
};

/**
 * Per-identity state machine:
 *
 *   Idle --audio--> (processing) --> awaiting_correction --> awaiting_format --> Idle
 *
 * Processing is never stored; a failure there releases the audio before the
 * session would have been created. From awaiting_format every path runs through
 * {@link TranscriptionWorkflow.finish}, which releases the audio exactly once.
 *
 * Events for one identity must arrive one at a time (see SessionManager).
 */
export class TranscriptionWorkflow implements InboundEventHandler {
  private readonly port: MessagingPort;
  private readonly sessions: SessionStore;
  private readonly scratch: ScratchTracker;
  private readonly transcriber: Transcriber;
  private readonly corrector: Corrector;
  private readonly renderer: DocumentRenderer;
  private readonly audit: AuditSink;
  private readonly options: TranscriptionWorkflowOptions;

  constructor(deps: TranscriptionWorkflowDeps, options?: Partial<TranscriptionWorkflowOptions>) {
    this.port = deps.port;
    this.sessions = deps.sessions;
    this.scratch = deps.scratch;
    this.transcriber = deps.transcriber;
    this.corrector = deps.corrector;
    this.renderer = deps.renderer;
    this.audit = deps.audit ?? noopAuditSink;

    const defaults = loadConfig();
    this.options = {
      timeouts: options?.timeouts ?? {
        downloadMs: defaults.timeouts.downloadMs,
        transcribeMs: defaults.timeouts.transcribeMs,
        renderMs: defaults.timeouts.renderMs
      },
      maxAudioBytes: options?.maxAudioBytes ?? defaults.maxAudioBytes,
      correctionEnabled: options?.correctionEnabled ?? defaults.correctionEnabled,
      idleTimeoutMs: options?.idleTimeoutMs ?? defaults.sessionIdleTimeoutMs,
      now: options?.now ?? Date.now
    };
  }

  async handle(event: InboundEvent): Promise<void> {
    switch (event.kind) {
      case "audio":
        return this.handleAudio(event);
      case "command":
        return this.handleCommand(event);
      case "unsupported":
        return this.handleUnsupported(event);
      case "choice":
        return this.handleChoice(event);
      case "expire":
        return this.handleExpire(event);
    }
  }

  private async handleCommand(event: CommandEvent): Promise<void> {
    if (event.command === "start") {
      await this.port.sendMessage(event.chatId, MESSAGES.greeting);
      return;
    }

    const session = this.sessions.get(event.identity);
    if (!session) {
      await this.port.sendMessage(event.chatId, MESSAGES.nothingToCancel);
      return;
    }

    this.sessions.delete(session.id);
    await this.bestEffort("mark progress cancelled", () => this.port.editMessage(session.progress, MESSAGES.cancelled));
    await this.finish(session, "cancelled");
  }

  private async handleUnsupported(event: UnsupportedEvent): Promise<void> {
    if (this.sessions.has(event.identity)) {
      // A pending choice stays pending; unrelated messages do not disturb it.
      console.debug(`[workflow] ${event.identity} sent a non-audio message while awaiting a choice`);
      return;
    }
    await this.port.sendMessage(event.chatId, MESSAGES.notAudio);
  }

  private async handleAudio(event: AudioEvent): Promise<void> {
    if (this.sessions.has(event.identity)) {
      await this.port.sendMessage(event.chatId, MESSAGES.busy);
      return;
    }

    const startedAt = this.options.now();
    const size = event.audio.fileSize;
    if (size !== undefined && size > this.options.maxAudioBytes) {
      await this.port.sendMessage(event.chatId, MESSAGES.tooLarge(this.options.maxAudioBytes));
      this.writeAudit({ sessionId: event.identity, outcome: "input_rejected", latencyMs: 0 });
      return;
    }

    const progress = await this.port.sendMessage(event.chatId, MESSAGES.receiving);
    const audio = await this.scratch.create("audio", inferAudioExtension(event.audio));
    let stage: "transcription" | "prompt" = "transcription";
    let handedOff = false;

    try {
      await withDeadline("audio download", this.options.timeouts.downloadMs, (signal) =>
        this.port.downloadAudio(event.audio, audio.path, signal)
      );
      await this.port.editMessage(progress, MESSAGES.recognizing);

      const result = await withDeadline("transcription", this.options.timeouts.transcribeMs, (signal) =>
        this.transcriber.transcribe({ audioPath: audio.path, signal })
      );
      const rawText = result.text.trim();

      if (!rawText) {
        console.log(`[workflow] ${event.identity} no speech recognized`);
        await this.report(progress, MESSAGES.speechNotRecognized);
        this.writeAudit({
          sessionId: event.identity,
          outcome: "transcription_empty",
          language: result.language,
          latencyMs: this.options.now() - startedAt
        });
        return;
      }

      const now = this.options.now();
      const session: AwaitingCorrectionSession = {
        id: event.identity,
        state: "awaiting_correction",
        progress,
        audio,
        rawText,
        language: result.language,
        createdAt: startedAt,
        updatedAt: now
      };
      console.log(
        `[workflow] ${event.identity} transcribed ${rawText.length} chars, language=${result.language}`
      );

      stage = "prompt";
      if (!this.options.correctionEnabled) {
        this.sessions.create(session);
        handedOff = true;
        await this.resolveCorrection(session, false);
        return;
      }

      await this.port.editMessage(progress, MESSAGES.correctionPrompt(result.language), CORRECTION_CHOICES);
      this.sessions.create(session);
      handedOff = true;
    } catch (error) {
      const detail = describeError(error);
      console.error(`[workflow] ${event.identity} ${stage} failed:`, error);
      await this.report(progress, MESSAGES.error(detail));
      this.writeAudit({
        sessionId: event.identity,
        outcome: stage === "prompt" ? "delivery_failed" : "transcription_failed",
        latencyMs: this.options.now() - startedAt,
        error: detail
      });
    } finally {
      if (!handedOff) {
        await this.scratch.release(audio);
      }
    }
  }

  private async handleChoice(event: ChoiceEvent): Promise<void> {
    await this.bestEffort("acknowledge choice", () => this.port.acknowledgeChoice(event.callbackId));

    const session = this.sessions.get(event.identity);
    if (!session) {
      console.debug(`[workflow] ${event.identity} pressed ${event.signal} without an active session`);
      return;
    }
    if (event.messageId !== session.progress.messageId) {
      console.debug(`[workflow] ${event.identity} pressed a button on a stale message ${event.messageId}`);
      return;
    }

    if (session.state === "awaiting_correction") {
      if (event.signal === CHOICE_SIGNALS.acceptCorrection) {
        await this.resolveCorrection(session, true);
      } else if (event.signal === CHOICE_SIGNALS.declineCorrection) {
        await this.resolveCorrection(session, false);
      } else {
        console.debug(`[workflow] ${event.identity} ignored ${event.signal} while awaiting correction choice`);
      }
      return;
    }

    const format = formatFromSignal(event.signal);
    if (!format) {
      console.debug(`[workflow] ${event.identity} ignored ${event.signal} while awaiting format choice`);
      return;
    }
    await this.deliver(session, format);
  }

  private async handleExpire(event: ExpireEvent): Promise<void> {
    const session = this.sessions.get(event.identity);
    if (!session) {
      return;
    }
    if (!event.force && this.options.now() - session.updatedAt < this.options.idleTimeoutMs) {
      return;
    }

    console.log(`[workflow] ${session.id} expired in state ${session.state}`);
    this.sessions.delete(session.id);
    await this.bestEffort("mark progress expired", () => this.port.editMessage(session.progress, MESSAGES.expired));
    await this.finish(session, "expired");
  }

  private async resolveCorrection(session: AwaitingCorrectionSession, accept: boolean): Promise<void> {
    let finalText = session.rawText;
    let corrected = false;
    let correctionFailed = false;

    if (accept) {
      try {
        const outcome = await this.corrector.correct(session.rawText, session.language);
        if (outcome.applied && outcome.text.trim()) {
          finalText = outcome.text;
          corrected = true;
        } else if (outcome.applied) {
          console.warn(`[workflow] ${session.id} correction produced empty text, keeping original`);
          correctionFailed = true;
        } else {
          correctionFailed = true;
        }
      } catch (error) {
        console.warn(`[workflow] ${session.id} correction failed, keeping original text: ${describeError(error)}`);
        correctionFailed = true;
      }
    }

    const next: AwaitingFormatSession = {
      ...session,
      state: "awaiting_format",
      finalText,
      corrected,
      correctionFailed,
      updatedAt: this.options.now()
    };
    this.sessions.advance(next);

    try {
      await this.port.editMessage(session.progress, MESSAGES.formatPrompt, FORMAT_CHOICES);
    } catch (error) {
      const detail = describeError(error);
      console.error(`[workflow] ${session.id} format prompt failed:`, error);
      this.sessions.delete(next.id);
      await this.report(session.progress, MESSAGES.error(detail));
      await this.finish(next, "delivery_failed", { error: detail });
    }
  }

  private async deliver(session: AwaitingFormatSession, format: FormatTag): Promise<void> {
    this.sessions.delete(session.id);
    await this.bestEffort("delete progress message", () => this.port.deleteMessage(session.progress));

    const chatId = session.progress.chatId;
    let outcome: WorkflowOutcome = "render_failed";
    let failure: string | undefined;

    try {
      const deliverable = await this.renderWithDeadline(session.finalText, format);
      outcome = "delivery_failed";
      await this.send(chatId, deliverable);
      outcome = "delivered";
    } catch (error) {
      failure = describeError(error);
      console.error(`[workflow] ${session.id} ${format} ${outcome === "render_failed" ? "render" : "delivery"} failed:`, error);
      await this.notify(chatId, MESSAGES.renderFailed(failure));
    } finally {
      await this.finish(session, outcome, { format, error: failure });
    }
  }

  private async renderWithDeadline(text: string, format: FormatTag): Promise<Deliverable> {
    const pending: { rendering?: Promise<Deliverable> } = {};
    try {
      return await withDeadline("render", this.options.timeouts.renderMs, (signal) => {
        pending.rendering = this.renderer.render(text, format, new Date(this.options.now()), signal);
        return pending.rendering;
      });
    } catch (error) {
      if (error instanceof DeadlineExceededError && pending.rendering) {
        // The encoder may still finish after the deadline; its file must not outlive the call.
        void pending.rendering.then(
          (late) => this.releaseDeliverable(late),
          () => undefined
        );
      }
      throw error;
    }
  }

  private async send(chatId: string, deliverable: Deliverable): Promise<void> {
    if (deliverable.kind === "messages") {
      for (const part of deliverable.parts) {
        await this.port.sendMessage(chatId, part);
      }
      return;
    }

    try {
      await this.port.sendDocument(chatId, deliverable.file.path, deliverable.displayName);
    } finally {
      await this.scratch.release(deliverable.file);
    }
  }

  private async releaseDeliverable(deliverable: Deliverable): Promise<void> {
    if (deliverable.kind !== "document") {
      return;
    }
    try {
      await this.scratch.release(deliverable.file);
    } catch (error) {
      console.error(`[workflow] failed to release late render output ${deliverable.file.path}:`, error);
    }
  }

  private async finish(
    session: Session,
    outcome: WorkflowOutcome,
    extra: Pick<AuditEntry, "format" | "error"> = {}
  ): Promise<void> {
    await this.scratch.release(session.audio);
    console.log(`[workflow] ${session.id} finished: ${outcome}`);
    this.writeAudit({
      sessionId: session.id,
      outcome,
      language: session.language,
      corrected: session.state === "awaiting_format" ? session.corrected : undefined,
      correctionFailed: session.state === "awaiting_format" ? session.correctionFailed : undefined,
      transcriptLength: session.rawText.length,
      latencyMs: this.options.now() - session.createdAt,
      ...extra
    });
  }

  /** User-visible failure notice: edit the progress message, or send a new one if that fails. */
  private async report(progress: MessageRef, text: string): Promise<void> {
    try {
      await this.port.editMessage(progress, text);
      return;
    } catch (error) {
      console.warn(`[workflow] could not edit progress message in ${progress.chatId}: ${describeError(error)}`);
    }
    await this.notify(progress.chatId, text);
  }

  private async notify(chatId: string, text: string): Promise<void> {
    try {
      await this.port.sendMessage(chatId, text);
    } catch (error) {
      console.error(`[workflow] could not deliver notice to ${chatId}:`, error);
    }
  }

  /** Cosmetic calls only; a failure here never changes the workflow outcome. */
  private async bestEffort(label: string, op: () => Promise<void>): Promise<void> {
    try {
      await op();
    } catch (error) {
      console.debug(`[workflow] ${label} skipped: ${describeError(error)}`);
    }
  }

  private writeAudit(entry: AuditEntry): void {
    this.audit(entry);
  }
}
