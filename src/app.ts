import cors from "cors";
import express, { Express } from "express";
import type { AxiosInstance } from "axios";
import type { IncomingMessage } from "http";
import type { AppConfig } from "./config";
import { AuditSink, createAuditSink } from "./core/auditLog";
import { CallbackDispatcher } from "./core/callback";
import { Classifier } from "./core/classifier";
import { IntelligenceExtractor } from "./core/extractor";
import { LlmClient, createLlmClient } from "./core/llm";
import { ConversationOrchestrator } from "./core/orchestrator";
import { LlmResponder, Responder, ScriptedResponder } from "./core/responder";
import { SessionStore } from "./core/sessionStore";
import type { Clock } from "./core/store/lruCache";
import { RemoteKv, UpstashKv } from "./core/store/upstash";
import { createHoneypotRouter, webhookErrorHandler } from "./routes/honeypot";

/** Seams that tests and alternative deployments replace. */
export type EngineOverrides = {
  remote?: RemoteKv | null;
  llm?: LlmClient | null;
  responder?: Responder;
  callbackHttp?: AxiosInstance;
  wait?: (ms: number) => Promise<void>;
  audit?: AuditSink;
  clock?: Clock;
};

export type Engine = {
  store: SessionStore;
  orchestrator: ConversationOrchestrator;
};

function createRemote(config: AppConfig): RemoteKv | null {
  const { upstashUrl, upstashToken, timeoutMs } = config.store;
  if (!upstashUrl || !upstashToken) return null;
  return new UpstashKv({ url: upstashUrl, token: upstashToken, timeoutMs });
}

export function createEngine(config: AppConfig, overrides: EngineOverrides = {}): Engine {
  const remote = overrides.remote !== undefined ? overrides.remote : createRemote(config);
  const llm = overrides.llm !== undefined ? overrides.llm : createLlmClient(config.llm);
  const store = new SessionStore(remote, config.store, overrides.clock);

  const extractor = new IntelligenceExtractor({
    rules: config.rules,
    sufficiencyThreshold: config.engine.extractionSufficiencyThreshold,
    llm
  });
  const classifier = new Classifier({ rules: config.rules, patterns: extractor.patterns, llm });
  const responder =
    overrides.responder ?? (llm ? new LlmResponder(llm, config.persona, config.rules) : new ScriptedResponder(config.rules));
  const dispatcher = new CallbackDispatcher(store, config.callback, overrides.callbackHttp, overrides.wait);

  const orchestrator = new ConversationOrchestrator({
    store,
    classifier,
    extractor,
    responder,
    dispatcher,
    audit: overrides.audit ?? createAuditSink(config.supabase),
    rules: config.rules,
    engine: config.engine,
    llmTimeoutMs: config.llm.timeoutMs
  });
  return { store, orchestrator };
}

export const SERVICE_NAME = "scam-honeypot-engine";
export const SERVICE_VERSION = "0.3.0";

/** Everything except form posts is parsed as JSON, including requests without a content type. */
function isJsonBody(req: IncomingMessage): boolean {
  const contentType = req.headers["content-type"] ?? "";
  return !contentType.toLowerCase().startsWith("application/x-www-form-urlencoded");
}

export function createApp(config: AppConfig, engine: Engine): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ type: isJsonBody, limit: "2mb" }));
  app.use(express.urlencoded({ extended: true }));

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      storeFallbackMode: engine.store.isUsingFallback()
    });
  });

  app.get("/", (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: ["POST /api/honeypot", "POST /webhook", "GET /health"]
    });
  });

  app.use(
    createHoneypotRouter({
      orchestrator: engine.orchestrator,
      apiKey: config.apiKey,
      neutralReply: config.rules.neutralReply
    })
  );
  app.use(webhookErrorHandler(config.rules.neutralReply));
  return app;
}
