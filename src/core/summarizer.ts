import type { ExtractedIntelligence, Session } from "../utils/types";

const MAX_NOTES = 200;

function collected(intel: ExtractedIntelligence): string[] {
  const got: string[] = [];
  if (intel.upiIds.length > 0) got.push(`${intel.upiIds.length} UPI`);
  if (intel.bankAccounts.length > 0) got.push(`${intel.bankAccounts.length} bank account`);
  if (intel.phishingLinks.length > 0) got.push(`${intel.phishingLinks.length} link`);
  if (intel.phoneNumbers.length > 0) got.push(`${intel.phoneNumbers.length} phone`);
  return got;
}

/** One-paragraph analyst note stored on the session and sent with the final report. */
export function summarize(session: Session): string {
  const intel = session.extractedIntelligence;
  const got = collected(intel);
  const levelLine = `Scam level ${session.scamLevel} (${session.scamConfidence.toFixed(1)}) after ${session.turnCount} turns.`;
  const tacticLine =
    intel.suspiciousKeywords.length > 0 ? `Tactics: ${intel.suspiciousKeywords.slice(0, 6).join(", ")}.` : "";
  const gotLine = got.length > 0 ? `Collected: ${got.join(", ")}.` : "No payment details yet.";
  const endLine = session.terminationReason !== "none" ? `Ended: ${session.terminationReason}.` : "";

  const notes = [levelLine, tacticLine, gotLine, endLine].filter(Boolean).join(" ");
  return notes.length > MAX_NOTES ? notes.slice(0, MAX_NOTES) : notes;
}
