import type { ErrorCode } from "../core/errors";
import type { EngagementMetrics, ExtractedIntelligence, Message, TerminationReason } from "./types";
import { round2 } from "./numbers";

export type WireIntelligence = {
  bank_accounts: string[];
  upi_ids: string[];
  phishing_urls: string[];
  ifsc_codes: string[];
  phone_numbers: string[];
};

export type WireMetrics = {
  turn_count: number;
  engagement_duration_seconds: number;
  messages_exchanged: number;
};

export type HoneypotResponse = {
  conversation_id: string;
  response_message: string;
  scam_detected: boolean;
  confidence_score: number;
  extracted_intelligence: WireIntelligence;
  engagement_metrics: WireMetrics;
  agent_active: boolean;
  status: "success";
};

export type ConversationView = {
  status: "success";
  conversation_id: string;
  messages: Message[];
  scam_detected: boolean;
  confidence_score: number;
  agent_active: boolean;
  end_reason: TerminationReason | null;
  extracted_intelligence: WireIntelligence;
  engagement_metrics: WireMetrics;
};

export type ErrorResponse = {
  status: "error";
  message: string;
  error_code: ErrorCode;
};

export function toWireIntelligence(intel: ExtractedIntelligence): WireIntelligence {
  return {
    bank_accounts: [...intel.bankAccounts],
    upi_ids: [...intel.upiIds],
    phishing_urls: [...intel.phishingUrls],
    ifsc_codes: [...intel.ifscCodes],
    phone_numbers: [...intel.phoneNumbers]
  };
}

export function toWireMetrics(metrics: EngagementMetrics): WireMetrics {
  return {
    turn_count: metrics.turnCount,
    engagement_duration_seconds: round2(metrics.engagementDurationSeconds),
    messages_exchanged: metrics.messagesExchanged
  };
}

export function makeErrorResponse(message: string, code: ErrorCode): ErrorResponse {
  return { status: "error", message, error_code: code };
}
