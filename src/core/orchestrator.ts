import type { EngineConfig, Rules } from "../config";
import { errorMessage, log } from "../utils/logging";
import { maskDigits } from "../utils/mask";
import { withTimeout } from "../utils/timeout";
import type { Message, Session, TerminationReason, WebhookReply, WebhookRequest } from "../utils/types";
import { AuditSink, noopAuditSink } from "./auditLog";
import { applyDispatch } from "./callback";
import type { CallbackDispatcher, DispatchOutcome } from "./callback";
import type { Classification, Classifier } from "./classifier";
import { IntelligenceExtractor, populatedHighValueFields } from "./extractor";
import { CompiledTerm, compileLexicon, matchLexicon } from "./lexicon";
import type { Responder } from "./responder";
import type { SessionStore } from "./sessionStore";
import { summarize } from "./summarizer";

/** Per-message state machine. Each step owns exactly the data the next one needs. */
export type TurnState =
  | { kind: "detect" }
  | { kind: "extract"; classification: Classification }
  | { kind: "respond"; classification: Classification }
  | { kind: "evaluate"; classification: Classification; reply: string }
  | { kind: "done"; reply: string; dispatch: DispatchOutcome | null };

export type TerminationPolicy = Pick<EngineConfig, "maxTurns" | "successFieldThreshold">;

export function afterDetect(classification: Classification): TurnState {
  return classification.level === "safe"
    ? { kind: "respond", classification }
    : { kind: "extract", classification };
}

/** Appends the inbound message and advances the turn counter by exactly one. */
export function applyInbound(session: Session, message: Message): Session {
  return {
    ...session,
    messages: [...session.messages, message],
    totalMessages: session.totalMessages + 1,
    turnCount: session.turnCount + 1
  };
}

export function applyReply(session: Session, reply: Message): Session {
  return {
    ...session,
    messages: [...session.messages, reply],
    totalMessages: session.totalMessages + 1
  };
}

/** A reason already recorded is kept; a live session only moves from `none` to a terminal reason. */
export function decideTermination(session: Session, quitRequested: boolean, policy: TerminationPolicy): TerminationReason {
  if (session.terminationReason !== "none") return session.terminationReason;
  if (
    session.scamLevel === "confirmed" &&
    populatedHighValueFields(session.extractedIntelligence) >= policy.successFieldThreshold
  ) {
    return "extracted_success";
  }
  if (quitRequested) return "user_quit";
  if (session.turnCount >= policy.maxTurns) return "max_turns";
  return "none";
}

export type OrchestratorDeps = {
  store: SessionStore;
  classifier: Classifier;
  extractor: IntelligenceExtractor;
  responder: Responder;
  dispatcher: CallbackDispatcher;
  audit?: AuditSink;
  rules: Pick<Rules, "fallbackReplies" | "quitPhrases">;
  engine: EngineConfig;
  llmTimeoutMs: number;
};

type RunFlags = {
  abandoned: boolean;
};

export class ConversationOrchestrator {
  private readonly quit: CompiledTerm[];
  private readonly audit: AuditSink;

  constructor(private readonly deps: OrchestratorDeps) {
    this.quit = compileLexicon(deps.rules.quitPhrases);
    this.audit = deps.audit ?? noopAuditSink;
  }

  private fallbackReply(turnCount: number): string {
    const replies = this.deps.rules.fallbackReplies;
    return replies[Math.abs(turnCount) % replies.length];
  }

  /** Never rejects: every path ends in a success-shaped reply. */
  async handle(request: WebhookRequest): Promise<WebhookReply> {
    const flags: RunFlags = { abandoned: false };
    try {
      const reply = await withTimeout(this.process(request, flags), this.deps.engine.requestTimeoutMs, "turn");
      return { status: "success", reply };
    } catch (err) {
      flags.abandoned = true;
      log.error("TURN", `session ${request.sessionId} abandoned: ${errorMessage(err)}`);
      return { status: "success", reply: this.fallbackReply(0) };
    }
  }

  private process(request: WebhookRequest, flags: RunFlags): Promise<string> {
    const { sessionId } = request;
    return this.deps.store.withLock(sessionId, async () => {
      const loaded = await this.deps.store.load(sessionId);
      const inbound: Message = {
        sender: "scammer",
        text: request.message.text,
        timestamp: request.message.timestamp
      };
      const history: readonly Message[] =
        request.conversationHistory.length > 0
          ? request.conversationHistory.map((m) => ({
              sender: m.sender === "scammer" ? "scammer" : "agent",
              text: m.text,
              timestamp: m.timestamp
            }))
          : loaded.messages;

      let session = applyInbound(loaded, inbound);
      log.info("TURN", `${sessionId} turn ${session.turnCount}: ${maskDigits(inbound.text)}`);

      let state: TurnState = { kind: "detect" };
      while (state.kind !== "done") {
        switch (state.kind) {
          case "detect": {
            const classification = await this.detect(request, history, session);
            session = { ...session, scamLevel: classification.level, scamConfidence: classification.confidence };
            state = afterDetect(classification);
            break;
          }
          case "extract": {
            const extractedIntelligence = await this.deps.extractor.extract(
              inbound.text,
              session.extractedIntelligence,
              history
            );
            session = { ...session, extractedIntelligence };
            state = { kind: "respond", classification: state.classification };
            break;
          }
          case "respond": {
            const reply = await this.respond(inbound.text, session, history);
            state = { kind: "evaluate", classification: state.classification, reply };
            break;
          }
          case "evaluate": {
            const quitRequested = matchLexicon(inbound.text, this.quit).length > 0;
            session = applyReply(session, { sender: "agent", text: state.reply, timestamp: new Date().toISOString() });
            session = { ...session, terminationReason: decideTermination(session, quitRequested, this.deps.engine) };
            session = { ...session, agentNotes: summarize(session) };
            const dispatch = await this.dispatch(session);
            session = applyDispatch(session, dispatch);
            state = { kind: "done", reply: state.reply, dispatch };
            break;
          }
        }
      }

      const claimTaken = state.dispatch !== null && state.dispatch.status !== "skipped";
      if (flags.abandoned && !claimTaken) {
        log.warn("TURN", `${sessionId} exceeded its deadline; turn ${session.turnCount} not committed`);
        return state.reply;
      }
      await this.deps.store.save(sessionId, session);
      await this.recordAudit(request, session, state.reply, state.dispatch);
      return state.reply;
    });
  }

  private async detect(request: WebhookRequest, history: readonly Message[], session: Session): Promise<Classification> {
    const { classifier } = this.deps;
    const ruled = classifier.classify(request.message, history, session.scamLevel);
    if (!ruled.ambiguous || ruled.level === "confirmed") return ruled;
    const signal = await classifier.secondarySignal(request.message.text, history, this.deps.llmTimeoutMs);
    return classifier.combine(ruled, signal);
  }

  private async respond(text: string, session: Session, history: readonly Message[]): Promise<string> {
    try {
      return await withTimeout(
        this.deps.responder.reply({ text, level: session.scamLevel, turnCount: session.turnCount, history }),
        this.deps.engine.responderTimeoutMs,
        "responder"
      );
    } catch (err) {
      log.warn("TURN", `responder failed, using fallback reply: ${errorMessage(err)}`);
      return this.fallbackReply(session.turnCount);
    }
  }

  private async dispatch(session: Session): Promise<DispatchOutcome | null> {
    try {
      return await this.deps.dispatcher.maybeDispatch(session);
    } catch (err) {
      log.error("CALLBACK", `dispatch crashed for ${session.sessionId}: ${errorMessage(err)}`);
      return null;
    }
  }

  private async recordAudit(
    request: WebhookRequest,
    session: Session,
    reply: string,
    dispatch: DispatchOutcome | null
  ): Promise<void> {
    const timestamp = new Date().toISOString();
    await this.audit.recordTurn({
      sessionId: session.sessionId,
      turnIndex: session.turnCount,
      scammerText: request.message.text,
      reply,
      scamLevel: session.scamLevel,
      terminationReason: session.terminationReason,
      timestamp,
      channel: request.metadata.channel
    });
    if (dispatch && dispatch.status !== "skipped") {
      await this.audit.recordReport({
        sessionId: session.sessionId,
        outcome: dispatch,
        totalMessagesExchanged: session.totalMessages,
        timestamp
      });
    }
  }
}
