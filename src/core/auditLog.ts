import { createClient, SupabaseClient } from "@supabase/supabase-js";
import type { AppConfig } from "../config";
import { errorMessage, log } from "../utils/logging";
import type { ScamLevel, TerminationReason } from "../utils/types";
import type { DispatchOutcome } from "./callback";

export type TurnRecord = {
  sessionId: string;
  turnIndex: number;
  scammerText: string;
  reply: string;
  scamLevel: ScamLevel;
  terminationReason: TerminationReason;
  timestamp: string;
  channel?: string;
};

export type ReportRecord = {
  sessionId: string;
  outcome: DispatchOutcome;
  totalMessagesExchanged: number;
  timestamp: string;
};

/** Write-only audit trail. Implementations log their own failures and never reject. */
export interface AuditSink {
  recordTurn(record: TurnRecord): Promise<void>;
  recordReport(record: ReportRecord): Promise<void>;
}

export const noopAuditSink: AuditSink = {
  async recordTurn() {},
  async recordReport() {}
};

export class SupabaseAuditSink implements AuditSink {
  constructor(private readonly client: SupabaseClient) {}

  private async insert(table: string, row: Record<string, unknown>): Promise<void> {
    try {
      const { error } = await this.client.from(table).insert(row);
      if (error) log.warn("AUDIT", `${table} insert rejected: ${error.message}`);
    } catch (err) {
      log.warn("AUDIT", `${table} insert failed: ${errorMessage(err)}`);
    }
  }

  async recordTurn(record: TurnRecord): Promise<void> {
    await this.insert("honeypot_messages", {
      session_id: record.sessionId,
      turn_index: record.turnIndex,
      scammer_text: record.scammerText,
      reply: record.reply,
      scam_level: record.scamLevel,
      termination_reason: record.terminationReason,
      channel: record.channel ?? "",
      ts: record.timestamp
    });
  }

  async recordReport(record: ReportRecord): Promise<void> {
    const { outcome } = record;
    await this.insert("honeypot_reports", {
      session_id: record.sessionId,
      status: outcome.status,
      attempts: outcome.status === "skipped" ? 0 : outcome.attempts,
      error: outcome.status === "failed" ? outcome.error : "",
      total_messages: record.totalMessagesExchanged,
      ts: record.timestamp
    });
  }
}

export function createAuditSink(config: AppConfig["supabase"]): AuditSink {
  if (!config.enabled) return noopAuditSink;
  const client = createClient(config.url, config.serviceRoleKey, { auth: { persistSession: false } });
  log.info("AUDIT", "recording turns to Supabase");
  return new SupabaseAuditSink(client);
}
