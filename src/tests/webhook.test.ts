import assert from "node:assert/strict";
import test from "node:test";
import axios from "axios";

import { FakeKv, noWait, recordingHttp, rules, testConfig } from "./helpers";
import { SERVICE_NAME, SERVICE_VERSION, createApp, createEngine } from "../app";
import { noopAuditSink } from "../core/auditLog";
import { parseWebhookRequest } from "../utils/webhook";

const NOW = "2026-01-01T00:00:00.000Z";

test("parses the full webhook shape", () => {
  const parsed = parseWebhookRequest(
    {
      sessionId: " s-1 ",
      message: { sender: "scammer", text: "Your account is blocked", timestamp: "2026-01-01T09:00:00Z" },
      conversationHistory: [
        { sender: "scammer", text: "Hello", timestamp: "2026-01-01T08:59:00Z" },
        { sender: "user", text: "Who is this?", timestamp: "2026-01-01T08:59:30Z" },
        { sender: "user", text: "" },
        "not a message object"
      ],
      metadata: { channel: "WhatsApp", language: "English", locale: "IN" }
    },
    NOW
  );
  assert.deepEqual(parsed, {
    sessionId: "s-1",
    message: { sender: "scammer", text: "Your account is blocked", timestamp: "2026-01-01T09:00:00Z" },
    conversationHistory: [
      { sender: "scammer", text: "Hello", timestamp: "2026-01-01T08:59:00Z" },
      { sender: "user", text: "Who is this?", timestamp: "2026-01-01T08:59:30Z" },
      { sender: "scammer", text: "not a message object", timestamp: NOW }
    ],
    metadata: { channel: "WhatsApp", language: "English", locale: "IN" }
  });
});

test("accepts a bare text body and fills defaults", () => {
  assert.deepEqual(parseWebhookRequest({ sessionId: "s-2", text: "hello" }, NOW), {
    sessionId: "s-2",
    message: { sender: "scammer", text: "hello", timestamp: NOW },
    conversationHistory: [],
    metadata: { channel: "", language: undefined, locale: undefined }
  });
});

test("rejects bodies with nothing to process", () => {
  assert.equal(parseWebhookRequest(null), null);
  assert.equal(parseWebhookRequest("hello"), null);
  assert.equal(parseWebhookRequest({ message: { text: "hi" } }), null);
  assert.equal(parseWebhookRequest({ sessionId: "s", message: { text: "   " } }), null);
  assert.equal(parseWebhookRequest({ sessionId: "s", message: { sender: "scammer" } }), null);
});

async function withServer(run: (baseUrl: string) => Promise<void>): Promise<void> {
  const config = testConfig({ API_KEY: "test-secret" });
  const { http } = recordingHttp();
  const engine = createEngine(config, {
    remote: new FakeKv(),
    llm: null,
    callbackHttp: http,
    wait: noWait,
    audit: noopAuditSink
  });
  const server = createApp(config, engine).listen(0, "127.0.0.1");
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
  try {
    await run(`http://127.0.0.1:${address.port}`);
  } finally {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }
}

const client = axios.create({ validateStatus: () => true, headers: { "x-api-key": "test-secret" } });

test("http: webhook answers with the turn reply", async () => {
  await withServer(async (base) => {
    const res = await client.post(`${base}/api/honeypot`, {
      sessionId: "http-1",
      message: { sender: "scammer", text: "Hi dad, how are you?", timestamp: NOW },
      conversationHistory: [],
      metadata: { channel: "SMS" }
    });
    assert.equal(res.status, 200);
    assert.deepEqual(res.data, { status: "success", reply: "Hello? Sorry, who is this?" });
  });
});

test("http: a wrong api key is refused", async () => {
  await withServer(async (base) => {
    const res = await client.post(`${base}/webhook`, { sessionId: "x", text: "hi" }, { headers: { "x-api-key": "nope" } });
    assert.equal(res.status, 401);
    assert.deepEqual(res.data, { status: "error", reply: "" });
  });
});

test("http: malformed and empty bodies still get a success-shaped reply", async () => {
  await withServer(async (base) => {
    const broken = await client.post(`${base}/api/honeypot`, "{not json", {
      headers: { "Content-Type": "application/json" }
    });
    assert.equal(broken.status, 200);
    assert.deepEqual(broken.data, { status: "success", reply: "Hello? Sorry, who is this?" });

    const empty = await client.post(`${base}/webhook`, {});
    assert.equal(empty.status, 200);
    assert.deepEqual(empty.data, { status: "success", reply: "Hello? Sorry, who is this?" });
  });
});

test("http: form-encoded bodies reach the turn pipeline", async () => {
  await withServer(async (base) => {
    const res = await client.post(`${base}/webhook`, new URLSearchParams({ sessionId: "form-1", text: "share otp now" }));
    assert.equal(res.status, 200);
    assert.deepEqual(res.data, { status: "success", reply: rules.fallbackReplies[1] });
  });
});

test("http: health reports the store mode", async () => {
  await withServer(async (base) => {
    const res = await client.get(`${base}/health`);
    assert.equal(res.status, 200);
    assert.deepEqual(res.data, {
      status: "ok",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      storeFallbackMode: false
    });
  });
});
