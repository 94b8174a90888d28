import type { IncomingHttpHeaders } from "http";
import { clip, maskDigits, maskSecret } from "./mask";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

const envLevel = process.env.LOG_LEVEL || "";
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function sanitizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === "undefined") continue;
    const lower = key.toLowerCase();
    const str = Array.isArray(value) ? value.join(",") : String(value);
    output[lower] = lower === "x-api-key" || lower === "authorization" ? maskSecret(str) : str;
  }
  return output;
}

export function safeStringify(value: unknown, maxLen: number): string {
  let text = "";
  try {
    text = typeof value === "string" ? value : JSON.stringify(value);
  } catch {
    text = String(value);
  }
  return clip(maskDigits(text), maxLen);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function write(level: LogLevel, tag: string, message: string, meta?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  const line = meta === undefined ? `[${tag}] ${message}` : `[${tag}] ${message} ${safeStringify(meta, 2000)}`;
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.info(line);
}

export const log = {
  debug: (tag: string, message: string, meta?: unknown) => write("debug", tag, message, meta),
  info: (tag: string, message: string, meta?: unknown) => write("info", tag, message, meta),
  warn: (tag: string, message: string, meta?: unknown) => write("warn", tag, message, meta),
  error: (tag: string, message: string, meta?: unknown) => write("error", tag, message, meta)
};
