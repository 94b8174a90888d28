import axios, { AxiosInstance } from "axios";
import type { CallbackConfig } from "../config";
import { CallbackDeliveryError } from "../utils/errors";
import { errorMessage, log } from "../utils/logging";
import { sleep } from "../utils/timeout";
import type { FinalReportPayload, Session } from "../utils/types";

export type DispatchOutcome =
  | {
      status: "skipped";
      reason: "not_confirmed" | "not_terminated" | "already_sent" | "no_endpoint" | "claimed_elsewhere";
    }
  | { status: "delivered"; attempts: number; httpStatus: number }
  | { status: "failed"; attempts: number; error: string };

/** The store capability the dispatcher depends on. */
export interface CallbackClaimer {
  tryClaimCallback(sessionId: string): Promise<boolean>;
}

export function buildReportPayload(session: Session): FinalReportPayload {
  const intel = session.extractedIntelligence;
  return {
    sessionId: session.sessionId,
    scamDetected: session.scamLevel === "confirmed",
    totalMessagesExchanged: session.totalMessages,
    extractedIntelligence: {
      bankAccounts: [...intel.bankAccounts],
      upiIds: [...intel.upiIds],
      phishingLinks: [...intel.phishingLinks],
      phoneNumbers: [...intel.phoneNumbers],
      suspiciousKeywords: [...intel.suspiciousKeywords]
    },
    agentNotes: session.agentNotes
  };
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Sends the final report at most once per session. The claim in the session store is the
 * only guard: whoever wins it delivers, everybody else returns `claimed_elsewhere`.
 * A claim is never released, so a failed delivery stays failed.
 */
export class CallbackDispatcher {
  private readonly http: AxiosInstance;

  constructor(
    private readonly claimer: CallbackClaimer,
    private readonly config: CallbackConfig,
    http?: AxiosInstance,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {
    this.http = http ?? axios.create();
  }

  private async post(payload: FinalReportPayload): Promise<number> {
    let status: number;
    try {
      const response = await this.http.post(this.config.url, payload, {
        timeout: this.config.timeoutMs,
        headers: { "Content-Type": "application/json" },
        validateStatus: () => true
      });
      status = response.status;
    } catch (err) {
      throw new CallbackDeliveryError(`callback request failed: ${errorMessage(err)}`, true);
    }
    if (status >= 200 && status < 300) return status;
    throw new CallbackDeliveryError(`callback rejected with status ${status}`, isRetryableStatus(status), status);
  }

  private async deliver(payload: FinalReportPayload): Promise<DispatchOutcome> {
    let lastError = "";
    for (let attempt = 0; attempt < this.config.maxRetries; attempt += 1) {
      if (attempt > 0) await this.wait(this.config.backoffMs * 2 ** (attempt - 1));
      try {
        const httpStatus = await this.post(payload);
        return { status: "delivered", attempts: attempt + 1, httpStatus };
      } catch (err) {
        lastError = errorMessage(err);
        const retryable = err instanceof CallbackDeliveryError && err.retryable;
        log.warn("CALLBACK", `attempt ${attempt + 1}/${this.config.maxRetries} failed: ${lastError}`);
        if (!retryable) return { status: "failed", attempts: attempt + 1, error: lastError };
      }
    }
    return { status: "failed", attempts: this.config.maxRetries, error: lastError };
  }

  /**
   * Claims and delivers the report for `session` without touching it; the caller records
   * the outcome with `applyDispatch`. With no endpoint configured nothing is claimed, so the
   * report can still go out once CALLBACK_URL is set.
   */
  async maybeDispatch(session: Session): Promise<DispatchOutcome> {
    if (session.scamLevel !== "confirmed") return { status: "skipped", reason: "not_confirmed" };
    if (session.terminationReason === "none") return { status: "skipped", reason: "not_terminated" };
    if (session.callbackSent) return { status: "skipped", reason: "already_sent" };
    if (!this.config.url) {
      log.error("CALLBACK", `CALLBACK_URL is not configured; final report for ${session.sessionId} held back`);
      return { status: "skipped", reason: "no_endpoint" };
    }

    const claimed = await this.claimer.tryClaimCallback(session.sessionId);
    if (!claimed) return { status: "skipped", reason: "claimed_elsewhere" };

    const payload = buildReportPayload(session);
    log.info("CALLBACK", `dispatching final report for ${session.sessionId}`, payload.extractedIntelligence);
    const outcome = await this.deliver(payload);
    if (outcome.status === "delivered") {
      log.info("CALLBACK", `delivered for ${session.sessionId} (status ${outcome.httpStatus}, attempts ${outcome.attempts})`);
    } else if (outcome.status === "failed") {
      log.error("CALLBACK", `delivery failed for ${session.sessionId}: ${outcome.error}`);
    }
    return outcome;
  }
}

/** The session as it should be stored after `outcome`. */
export function applyDispatch(session: Session, outcome: DispatchOutcome | null): Session {
  if (outcome === null) return session;
  switch (outcome.status) {
    case "delivered":
      return { ...session, callbackSent: true, callbackStatus: "delivered", callbackError: "" };
    case "failed":
      return { ...session, callbackSent: true, callbackStatus: "failed", callbackError: outcome.error };
    case "skipped":
      return outcome.reason === "claimed_elsewhere" ? { ...session, callbackSent: true } : session;
  }
}
