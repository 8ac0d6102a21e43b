export type Sender = "scammer" | "agent";

export type Message = {
  readonly sender: Sender;
  readonly text: string;
  readonly timestamp: string;
};

export const INTEL_CATEGORIES = [
  "bankAccounts",
  "upiIds",
  "phishingUrls",
  "ifscCodes",
  "phoneNumbers"
] as const;

export type IntelCategory = (typeof INTEL_CATEGORIES)[number];

export type ExtractedIntelligence = Record<IntelCategory, string[]>;

export type IntelligenceSets = Record<IntelCategory, Set<string>>;

export type ScamVerdict = {
  isScam: boolean;
  confidence: number;
  signals: string[];
  degraded: boolean;
};

export type SessionStatus = "NEW" | "ACTIVE" | "ENDED";

export type TerminationReason = "max_turns" | "stale_intelligence" | "confidence_dropped";

export type EngagementMetrics = {
  turnCount: number;
  engagementDurationSeconds: number;
  messagesExchanged: number;
};

export function emptyIntelligence(): ExtractedIntelligence {
  return {
    bankAccounts: [],
    upiIds: [],
    phishingUrls: [],
    ifscCodes: [],
    phoneNumbers: []
  };
}

export function emptyIntelligenceSets(): IntelligenceSets {
  return {
    bankAccounts: new Set<string>(),
    upiIds: new Set<string>(),
    phishingUrls: new Set<string>(),
    ifscCodes: new Set<string>(),
    phoneNumbers: new Set<string>()
  };
}
