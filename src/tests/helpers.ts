import axios, { AxiosInstance, InternalAxiosRequestConfig } from "axios";
import { AppConfig, Rules, loadConfig, loadRules } from "../config";
import type { RemoteKv } from "../core/store/upstash";
import { setLogLevel } from "../utils/logging";
import type { WebhookRequest } from "../utils/types";

setLogLevel("silent");

export const rules: Rules = loadRules();

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadConfig(
    {
      CALLBACK_URL: "http://callback.test/report",
      CALLBACK_BACKOFF_MS: "0",
      STORE_REPROBE_MS: "0",
      ...env
    },
    rules
  );
}

/** Manually advanced clock shared by the fake remote and the store. */
export class TestClock {
  constructor(public ms: number = Date.UTC(2026, 0, 1)) {}

  readonly now = (): number => this.ms;

  advance(seconds: number): void {
    this.ms += seconds * 1000;
  }
}

/** In-process stand-in for the Redis REST backend, with TTLs and an outage switch. */
export class FakeKv implements RemoteKv {
  down = false;
  readonly ops: string[] = [];
  private readonly data = new Map<string, { value: string; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  private touch(op: string): void {
    this.ops.push(op);
    if (this.down) throw new Error("connect ECONNREFUSED");
  }

  private live(key: string): string | null {
    const entry = this.data.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.now()) {
      this.data.delete(key);
      return null;
    }
    return entry.value;
  }

  async get(key: string): Promise<string | null> {
    this.touch("get");
    return this.live(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.touch("set");
    this.data.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    this.touch("setnx");
    if (this.live(key) !== null) return false;
    this.data.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
    return true;
  }

  async del(key: string): Promise<void> {
    this.touch("del");
    this.data.delete(key);
  }

  keys(): string[] {
    return Array.from(this.data.keys());
  }

  raw(key: string): string | null {
    return this.live(key);
  }
}

export type Reply = number | Error;

/** Axios instance whose adapter records every request body and answers from `replies` (default 200). */
export function recordingHttp(replies: Reply[] = []): { http: AxiosInstance; bodies: unknown[]; urls: string[] } {
  const bodies: unknown[] = [];
  const urls: string[] = [];
  const http = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      urls.push(config.url ?? "");
      bodies.push(typeof config.data === "string" ? JSON.parse(config.data) : config.data);
      const next = replies.shift() ?? 200;
      if (next instanceof Error) throw next;
      return { data: {}, status: next, statusText: String(next), headers: {}, config };
    }
  });
  return { http, bodies, urls };
}

export function webhook(sessionId: string, text: string, history: WebhookRequest["conversationHistory"] = []): WebhookRequest {
  return {
    sessionId,
    message: { sender: "scammer", text, timestamp: "2026-01-01T10:00:00.000Z" },
    conversationHistory: history,
    metadata: { channel: "SMS", language: "English", locale: "IN" }
  };
}

export const SBI_MESSAGE =
  "Your SBI account is blocked. Visit http://sbi-secure-kyc.com... Send 1 Rs to verify-bank@upi. Call 9876543210.";

export function noWait(): Promise<void> {
  return Promise.resolve();
}
