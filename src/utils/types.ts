export type ScamLevel = "safe" | "suspected" | "confirmed";

export type TerminationReason = "none" | "max_turns" | "extracted_success" | "user_quit";

export type CallbackStatus = "none" | "delivered" | "failed";

export type Sender = "scammer" | "agent";

export type Message = {
  readonly sender: Sender;
  readonly text: string;
  readonly timestamp: string;
};

export type ExtractedIntelligence = {
  bankAccounts: string[];
  upiIds: string[];
  phishingLinks: string[];
  phoneNumbers: string[];
  suspiciousKeywords: string[];
};

export type IntelField = keyof ExtractedIntelligence;

export type HighValueField = Exclude<IntelField, "suspiciousKeywords">;

export const HIGH_VALUE_FIELDS: readonly HighValueField[] = [
  "bankAccounts",
  "upiIds",
  "phishingLinks",
  "phoneNumbers"
];

export type Session = {
  sessionId: string;
  messages: Message[];
  totalMessages: number;
  turnCount: number;
  scamConfidence: number;
  scamLevel: ScamLevel;
  extractedIntelligence: ExtractedIntelligence;
  terminationReason: TerminationReason;
  callbackSent: boolean;
  callbackStatus: CallbackStatus;
  callbackError: string;
  agentNotes: string;
  createdAt: string;
  updatedAt: string;
};

export type InboundMessage = {
  sender: string;
  text: string;
  timestamp: string;
};

export type WebhookMetadata = {
  channel: string;
  language?: string;
  locale?: string;
};

export type WebhookRequest = {
  sessionId: string;
  message: InboundMessage;
  conversationHistory: InboundMessage[];
  metadata: WebhookMetadata;
};

export type WebhookReply = {
  status: "success" | "error";
  reply: string;
};

export type FinalReportPayload = {
  sessionId: string;
  scamDetected: boolean;
  totalMessagesExchanged: number;
  extractedIntelligence: ExtractedIntelligence;
  agentNotes: string;
};

export function emptyIntelligence(): ExtractedIntelligence {
  return {
    bankAccounts: [],
    upiIds: [],
    phishingLinks: [],
    phoneNumbers: [],
    suspiciousKeywords: []
  };
}

export function createSession(sessionId: string, now: string = new Date().toISOString()): Session {
  return {
    sessionId,
    messages: [],
    totalMessages: 0,
    turnCount: 0,
    scamConfidence: 0,
    scamLevel: "safe",
    extractedIntelligence: emptyIntelligence(),
    terminationReason: "none",
    callbackSent: false,
    callbackStatus: "none",
    callbackError: "",
    agentNotes: "",
    createdAt: now,
    updatedAt: now
  };
}
