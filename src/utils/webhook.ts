import { isRecord } from "./json";
import type { InboundMessage, WebhookReply, WebhookRequest } from "./types";

export const turnResponse = (reply: string): WebhookReply => ({ status: "success", reply });

function parseMessage(raw: unknown, now: string): InboundMessage | null {
  if (typeof raw === "string") {
    return raw.trim() ? { sender: "scammer", text: raw, timestamp: now } : null;
  }
  if (!isRecord(raw) || typeof raw.text !== "string" || !raw.text.trim()) return null;
  return {
    sender: typeof raw.sender === "string" && raw.sender.trim() ? raw.sender.trim() : "scammer",
    text: raw.text,
    timestamp: typeof raw.timestamp === "string" && raw.timestamp ? raw.timestamp : now
  };
}

/**
 * Validates an inbound webhook body. Returns null when there is nothing to process;
 * the route then answers with a neutral success-shaped reply.
 * Accepts the bare `{ text }` and `{ message: "..." }` shapes some testers send.
 */
export function parseWebhookRequest(body: unknown, now: string = new Date().toISOString()): WebhookRequest | null {
  if (!isRecord(body)) return null;
  const sessionId = typeof body.sessionId === "string" ? body.sessionId.trim() : "";
  if (!sessionId) return null;

  const message = parseMessage(body.message ?? body.text, now);
  if (!message) return null;

  const conversationHistory = Array.isArray(body.conversationHistory)
    ? body.conversationHistory
        .map((item) => parseMessage(item, now))
        .filter((item): item is InboundMessage => item !== null)
    : [];

  const metadata = isRecord(body.metadata) ? body.metadata : {};
  return {
    sessionId,
    message,
    conversationHistory,
    metadata: {
      channel: typeof metadata.channel === "string" ? metadata.channel : "",
      language: typeof metadata.language === "string" ? metadata.language : undefined,
      locale: typeof metadata.locale === "string" ? metadata.locale : undefined
    }
  };
}
