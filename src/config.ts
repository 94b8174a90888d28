import fs from "fs";
import path from "path";
import { isRecord, stringArray } from "./utils/json";

export type Persona = {
  name: string;
  age: number;
  location: string;
  occupation: string;
  background: string;
  trait: string;
};

/** Lexicons and canned text; all externally supplied through the rules file. */
export type Rules = {
  confirmedKeywords: string[];
  suspectedKeywords: string[];
  anomalousSenderPatterns: string[];
  suspiciousKeywords: string[];
  bankContextWords: string[];
  emailDomains: string[];
  quitPhrases: string[];
  injectionPatterns: string[];
  fallbackReplies: string[];
  neutralReply: string;
  personas: Persona[];
};

export type StoreConfig = {
  upstashUrl: string;
  upstashToken: string;
  ttlSeconds: number;
  keyPrefix: string;
  claimKeyPrefix: string;
  timeoutMs: number;
  reprobeMs: number;
  fallbackCapacity: number;
  maxStoredMessages: number;
};

export type EngineConfig = {
  maxTurns: number;
  successFieldThreshold: number;
  extractionSufficiencyThreshold: number;
  requestTimeoutMs: number;
  responderTimeoutMs: number;
};

export type CallbackConfig = {
  url: string;
  timeoutMs: number;
  maxRetries: number;
  backoffMs: number;
};

export type LlmConfig = {
  geminiApiKey: string;
  geminiModels: string[];
  openaiApiKey: string;
  openaiModels: string[];
  timeoutMs: number;
};

export type AppConfig = {
  port: number;
  apiKey: string;
  store: StoreConfig;
  engine: EngineConfig;
  callback: CallbackConfig;
  llm: LlmConfig;
  supabase: { url: string; serviceRoleKey: string; enabled: boolean };
  rules: Rules;
  persona: Persona;
};

type Env = Record<string, string | undefined>;

export const DEFAULT_RULES_FILE = path.resolve(__dirname, "../config/rules.json");

function int(env: Env, key: string, fallback: number, min = 0): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${key} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function str(env: Env, key: string, fallback = ""): string {
  const raw = env[key];
  return raw === undefined ? fallback : raw.trim();
}

function models(primary: string, fallback: string): string[] {
  return [primary, fallback].filter((m, idx, arr) => m.length > 0 && arr.indexOf(m) === idx);
}

function parsePersona(raw: unknown): Persona | null {
  if (!isRecord(raw)) return null;
  const { name, age, location, occupation, background, trait } = raw;
  if (typeof name !== "string" || typeof age !== "number") return null;
  return {
    name,
    age,
    location: typeof location === "string" ? location : "",
    occupation: typeof occupation === "string" ? occupation : "",
    background: typeof background === "string" ? background : "",
    trait: typeof trait === "string" ? trait : ""
  };
}

export function parseRules(raw: unknown): Rules {
  if (!isRecord(raw)) throw new Error("rules file must contain a JSON object");
  const fallbackReplies = stringArray(raw.fallbackReplies);
  if (fallbackReplies.length === 0) throw new Error("rules file needs at least one fallbackReplies entry");
  const personas = Array.isArray(raw.personas)
    ? raw.personas.map(parsePersona).filter((p): p is Persona => p !== null)
    : [];
  if (personas.length === 0) throw new Error("rules file needs at least one persona");
  const anomalousSenderPatterns = stringArray(raw.anomalousSenderPatterns);
  for (const pattern of anomalousSenderPatterns) {
    // throws on an invalid pattern
    new RegExp(pattern);
  }
  return {
    confirmedKeywords: stringArray(raw.confirmedKeywords).map((k) => k.toLowerCase()),
    suspectedKeywords: stringArray(raw.suspectedKeywords).map((k) => k.toLowerCase()),
    anomalousSenderPatterns,
    suspiciousKeywords: stringArray(raw.suspiciousKeywords).map((k) => k.toLowerCase()),
    bankContextWords: stringArray(raw.bankContextWords).map((k) => k.toLowerCase()),
    emailDomains: stringArray(raw.emailDomains).map((k) => k.toLowerCase()),
    quitPhrases: stringArray(raw.quitPhrases).map((k) => k.toLowerCase()),
    injectionPatterns: stringArray(raw.injectionPatterns).map((k) => k.toLowerCase()),
    fallbackReplies,
    neutralReply: typeof raw.neutralReply === "string" && raw.neutralReply.trim() ? raw.neutralReply : fallbackReplies[0],
    personas
  };
}

export function loadRules(file: string = DEFAULT_RULES_FILE): Rules {
  const text = fs.readFileSync(file, "utf-8");
  return parseRules(JSON.parse(text));
}

export function resolvePersona(rules: Rules, name: string): Persona {
  if (name) {
    const wanted = name.toLowerCase();
    const match = rules.personas.find((p) => p.name.toLowerCase() === wanted);
    if (match) return match;
  }
  return rules.personas[0];
}

export function loadConfig(env: Env = process.env, rules?: Rules): AppConfig {
  const resolvedRules = rules ?? loadRules(str(env, "RULES_FILE") || DEFAULT_RULES_FILE);
  const supabaseUrl = str(env, "SUPABASE_URL");
  const supabaseKey = str(env, "SUPABASE_SERVICE_ROLE_KEY");

  return {
    port: int(env, "PORT", 3000, 1),
    apiKey: str(env, "API_KEY") || str(env, "API_SECRET_KEY"),
    store: {
      upstashUrl: str(env, "UPSTASH_REDIS_REST_URL").replace(/\/$/, ""),
      upstashToken: str(env, "UPSTASH_REDIS_REST_TOKEN"),
      ttlSeconds: int(env, "SESSION_TTL_SECONDS", 3600, 1),
      keyPrefix: str(env, "SESSION_KEY_PREFIX", "honeypot:session:"),
      claimKeyPrefix: str(env, "CALLBACK_KEY_PREFIX", "honeypot:callback:"),
      timeoutMs: int(env, "STORE_TIMEOUT_MS", 2000, 1),
      reprobeMs: int(env, "STORE_REPROBE_MS", 30000),
      fallbackCapacity: int(env, "MEMORY_CACHE_MAX_SIZE", 1000, 1),
      maxStoredMessages: int(env, "MAX_STORED_MESSAGES", 2, 2)
    },
    engine: {
      maxTurns: int(env, "MAX_TURNS", 10, 1),
      successFieldThreshold: int(env, "SUCCESS_FIELD_THRESHOLD", 1, 1),
      extractionSufficiencyThreshold: int(env, "EXTRACTION_SUFFICIENCY_THRESHOLD", 1),
      requestTimeoutMs: int(env, "REQUEST_TIMEOUT_MS", 28000, 1),
      responderTimeoutMs: int(env, "RESPONDER_TIMEOUT_MS", 8000, 1)
    },
    callback: {
      url: str(env, "CALLBACK_URL"),
      timeoutMs: int(env, "CALLBACK_TIMEOUT_MS", 5000, 1),
      maxRetries: int(env, "CALLBACK_MAX_RETRIES", 3, 1),
      backoffMs: int(env, "CALLBACK_BACKOFF_MS", 500)
    },
    llm: {
      geminiApiKey: str(env, "GEMINI_API_KEY") || str(env, "GOOGLE_API_KEY"),
      geminiModels: models(str(env, "GEMINI_MODEL", "gemini-2.0-flash"), str(env, "GEMINI_FALLBACK_MODEL", "gemini-1.5-flash")),
      openaiApiKey: str(env, "OPENAI_API_KEY"),
      openaiModels: models(str(env, "OPENAI_MODEL", "gpt-4o-mini"), str(env, "OPENAI_FALLBACK_MODEL")),
      timeoutMs: int(env, "LLM_TIMEOUT_MS", 4000, 1)
    },
    supabase: {
      url: supabaseUrl,
      serviceRoleKey: supabaseKey,
      enabled: Boolean(supabaseUrl && supabaseKey) && str(env, "ENABLE_SUPABASE_LOG") !== "false"
    },
    rules: resolvedRules,
    persona: resolvePersona(resolvedRules, str(env, "PERSONA"))
  };
}
