import type { StoreConfig } from "../config";
import { StoreUnavailableError } from "../utils/errors";
import { isRecord, stringArray } from "../utils/json";
import { errorMessage, log } from "../utils/logging";
import { clamp01 } from "../utils/mask";
import { withTimeout } from "../utils/timeout";
import {
  CallbackStatus,
  ExtractedIntelligence,
  Message,
  ScamLevel,
  Session,
  TerminationReason,
  createSession
} from "../utils/types";
import { KeyedMutex } from "./store/lock";
import { Clock, LruCache } from "./store/lruCache";
import type { RemoteKv } from "./store/upstash";

export type SessionStoreOptions = Pick<
  StoreConfig,
  "ttlSeconds" | "keyPrefix" | "claimKeyPrefix" | "timeoutMs" | "reprobeMs" | "fallbackCapacity" | "maxStoredMessages"
>;

type RemoteResult<T> = { ok: true; value: T } | { ok: false };

const STORED_TEXT_LIMIT = 80;
const STORED_BYTE_LIMIT = 1000;
const LEVELS: readonly ScamLevel[] = ["safe", "suspected", "confirmed"];
const REASONS: readonly TerminationReason[] = ["none", "max_turns", "extracted_success", "user_quit"];
const CALLBACK_STATUSES: readonly CallbackStatus[] = ["none", "delivered", "failed"];

function pickEnum<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  return allowed.find((item) => item === value) ?? fallback;
}

function hydrateMessages(raw: unknown): Message[] {
  if (!Array.isArray(raw)) return [];
  const messages: Message[] = [];
  for (const item of raw) {
    if (!isRecord(item) || typeof item.text !== "string") continue;
    messages.push({
      sender: item.sender === "agent" ? "agent" : "scammer",
      text: item.text,
      timestamp: typeof item.timestamp === "string" ? item.timestamp : ""
    });
  }
  return messages;
}

function hydrateIntelligence(raw: unknown): ExtractedIntelligence {
  const source = isRecord(raw) ? raw : {};
  return {
    bankAccounts: stringArray(source.bankAccounts),
    upiIds: stringArray(source.upiIds),
    phishingLinks: stringArray(source.phishingLinks),
    phoneNumbers: stringArray(source.phoneNumbers),
    suspiciousKeywords: stringArray(source.suspiciousKeywords)
  };
}

/** Rebuilds a session from stored JSON, filling anything missing or malformed with defaults. */
export function hydrateSession(sessionId: string, raw: unknown): Session {
  const base = createSession(sessionId);
  if (!isRecord(raw)) return base;
  const messages = hydrateMessages(raw.messages);
  const num = (value: unknown, fallback: number) =>
    typeof value === "number" && Number.isFinite(value) ? value : fallback;
  return {
    sessionId,
    messages,
    totalMessages: Math.max(num(raw.totalMessages, messages.length), messages.length),
    turnCount: Math.max(0, Math.floor(num(raw.turnCount, 0))),
    scamConfidence: clamp01(num(raw.scamConfidence, 0)),
    scamLevel: pickEnum(raw.scamLevel, LEVELS, "safe"),
    extractedIntelligence: hydrateIntelligence(raw.extractedIntelligence),
    terminationReason: pickEnum(raw.terminationReason, REASONS, "none"),
    callbackSent: raw.callbackSent === true,
    callbackStatus: pickEnum(raw.callbackStatus, CALLBACK_STATUSES, "none"),
    callbackError: typeof raw.callbackError === "string" ? raw.callbackError : "",
    agentNotes: typeof raw.agentNotes === "string" ? raw.agentNotes : "",
    createdAt: typeof raw.createdAt === "string" ? raw.createdAt : base.createdAt,
    updatedAt: typeof raw.updatedAt === "string" ? raw.updatedAt : base.updatedAt
  };
}

function recordBytes(session: Session): number {
  return Buffer.byteLength(JSON.stringify(session), "utf8");
}

/**
 * The stored form of a session: the newest messages with clipped text. Over the byte
 * budget, the oldest messages go first, then trailing keywords. High-value fields are
 * already bounded by the extractor and are never trimmed here.
 */
export function compactSession(session: Session, maxStoredMessages: number): Session {
  const messages = session.messages.slice(-maxStoredMessages).map((m) => ({
    sender: m.sender,
    text: m.text.length > STORED_TEXT_LIMIT ? m.text.slice(0, STORED_TEXT_LIMIT) : m.text,
    timestamp: m.timestamp
  }));
  const keywords = [...session.extractedIntelligence.suspiciousKeywords];
  const compact: Session = {
    ...session,
    messages,
    extractedIntelligence: { ...session.extractedIntelligence, suspiciousKeywords: keywords }
  };
  while (messages.length > 0 && recordBytes(compact) > STORED_BYTE_LIMIT) messages.shift();
  while (keywords.length > 0 && recordBytes(compact) > STORED_BYTE_LIMIT) keywords.pop();
  return compact;
}

/**
 * Two-tier session persistence. Remote Redis is primary; on any remote failure the store
 * switches to a bounded in-process LRU and re-probes the remote after `reprobeMs`.
 * Data written while degraded lives only in this process.
 *
 * `load` and `save` take no lock themselves: callers mutate a session inside `withLock`.
 * Claims are serialized per key in process and made atomic across instances by Redis SET NX.
 * The claim lives under its own key and `load` ORs it into `callbackSent`, so a save of an
 * older copy can never clear the flag.
 */
export class SessionStore {
  private readonly fallback: LruCache<string>;
  private readonly claims: LruCache<true>;
  private readonly locks = new KeyedMutex();
  private readonly claimLocks = new KeyedMutex();
  private degraded = false;
  private retryRemoteAt = 0;

  constructor(
    private readonly remote: RemoteKv | null,
    private readonly options: SessionStoreOptions,
    private readonly now: Clock = Date.now
  ) {
    this.fallback = new LruCache<string>(options.fallbackCapacity, now);
    this.claims = new LruCache<true>(options.fallbackCapacity, now);
    if (!remote) {
      log.warn("STORE", "no remote store configured; sessions are kept in process memory only");
    }
  }

  private sessionKey(sessionId: string): string {
    return `${this.options.keyPrefix}${sessionId}`;
  }

  private claimKey(sessionId: string): string {
    return `${this.options.claimKeyPrefix}${sessionId}`;
  }

  isUsingFallback(): boolean {
    return this.remote === null || this.degraded;
  }

  withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(sessionId, fn);
  }

  private async callRemote<T>(operation: string, fn: (remote: RemoteKv) => Promise<T>): Promise<RemoteResult<T>> {
    const remote = this.remote;
    if (!remote) return { ok: false };
    if (this.degraded && this.now() < this.retryRemoteAt) return { ok: false };
    try {
      const value = await withTimeout(fn(remote), this.options.timeoutMs, `remote ${operation}`);
      if (this.degraded) {
        this.degraded = false;
        log.info("STORE", "remote store reachable again; leaving fallback mode");
      }
      return { ok: true, value };
    } catch (err) {
      const failure = new StoreUnavailableError(operation, err);
      if (!this.degraded) {
        log.warn("STORE", `${failure.message}; degrading to in-process fallback`);
      } else {
        log.debug("STORE", failure.message);
      }
      this.degraded = true;
      this.retryRemoteAt = this.now() + this.options.reprobeMs;
      return { ok: false };
    }
  }

  private parse(sessionId: string, json: string | null | undefined, tier: string): Session | null {
    if (!json) return null;
    try {
      return hydrateSession(sessionId, JSON.parse(json));
    } catch (err) {
      log.warn("STORE", `discarding unreadable ${tier} record for ${sessionId}: ${errorMessage(err)}`);
      return null;
    }
  }

  async load(sessionId: string): Promise<Session> {
    const key = this.sessionKey(sessionId);
    const remoteRecord = await this.callRemote("get", (kv) => kv.get(key));
    const remoteClaim = await this.callRemote("get claim", (kv) => kv.get(this.claimKey(sessionId)));

    const fromRemote = remoteRecord.ok ? this.parse(sessionId, remoteRecord.value, "remote") : null;
    const fromLocal = this.parse(sessionId, this.fallback.get(key), "fallback");

    let session: Session;
    if (fromRemote && fromLocal) {
      session = fromLocal.updatedAt > fromRemote.updatedAt ? fromLocal : fromRemote;
    } else {
      session = fromRemote ?? fromLocal ?? createSession(sessionId, new Date(this.now()).toISOString());
    }

    const claimed = (remoteClaim.ok && remoteClaim.value !== null) || this.claims.has(this.claimKey(sessionId));
    session.callbackSent = session.callbackSent || claimed;
    return session;
  }

  async save(sessionId: string, session: Session, ttlSeconds: number = this.options.ttlSeconds): Promise<void> {
    const key = this.sessionKey(sessionId);
    const record = compactSession(
      { ...session, sessionId, updatedAt: new Date(this.now()).toISOString() },
      this.options.maxStoredMessages
    );
    const json = JSON.stringify(record);
    const written = await this.callRemote("set", (kv) => kv.set(key, json, ttlSeconds));
    if (written.ok) {
      this.fallback.delete(key);
      return;
    }
    this.fallback.set(key, json, ttlSeconds);
  }

  /** Returns true for exactly one caller per session; the claim is never released. */
  tryClaimCallback(sessionId: string): Promise<boolean> {
    const key = this.claimKey(sessionId);
    return this.claimLocks.run(key, async () => {
      if (this.claims.has(key)) return false;
      const remoteClaim = await this.callRemote("claim", (kv) => kv.setIfAbsent(key, "1", this.options.ttlSeconds));
      if (remoteClaim.ok) {
        this.claims.set(key, true, this.options.ttlSeconds);
        return remoteClaim.value;
      }
      return this.claims.setIfAbsent(key, true, this.options.ttlSeconds);
    });
  }

  async delete(sessionId: string): Promise<void> {
    const key = this.sessionKey(sessionId);
    const claimKey = this.claimKey(sessionId);
    await this.callRemote("del", async (kv) => {
      await kv.del(key);
      await kv.del(claimKey);
    });
    this.fallback.delete(key);
    this.claims.delete(claimKey);
  }

  purgeExpired(): number {
    return this.fallback.purgeExpired() + this.claims.purgeExpired();
  }
}
