import { ModelNotConfiguredError } from "./errors";
import { buildPersonaPrompt, PersonaProfile } from "./persona";
import { ChatTurn, CompletionRequest, ModelClient, completeWithTimeout } from "./providers/modelClient";
import { checkTermination, EngagementCounters } from "./termination";
import { cleanModelReply, validateReply } from "./validator";
import type { EngagementPolicy } from "../utils/config";
import { describeError, safeLog, safeWarn } from "../utils/logging";
import type { ExtractedIntelligence, Message, TerminationReason } from "../utils/types";

export type AgentTurn =
  | { kind: "reply"; text: string; source: "model" | "stall" | "tactical" }
  | { kind: "end"; text: string; reason: TerminationReason };

export type ReplyInput = {
  conversationId: string;
  history: readonly Message[];
  intelligence: ExtractedIntelligence;
  scamDetected: boolean;
  counters: EngagementCounters;
};

export type PersonaEngineOptions = {
  policy: EngagementPolicy;
  timeoutMs: number;
  historyWindow: number;
};

export const CLOSED_SESSION_REPLY = "Sorry ji, I cannot talk now. Namaste.";

export const STALLING_REPLIES = [
  "Sorry ji, network is very weak here. Can you repeat that?",
  "Sorry, I did not understand properly. Can you say it again slowly?",
  "Ek minute ji, my phone got stuck. What did you say?",
  "Sorry beta, the message came broken. Please repeat?"
];

const TACTICAL_RULES: Array<{ keywords: string[]; reply: string }> = [
  {
    keywords: ["account", "bank", "transfer", "ifsc"],
    reply: "Ji, which account should I send it to? Please tell the account number and IFSC slowly, I will write it."
  },
  {
    keywords: ["upi", "paytm", "phonepe", "gpay", "google pay"],
    reply: "I have UPI on my phone, my son set it up. What is your UPI id, where should I send?"
  },
  {
    keywords: ["link", "click", "website", "download", "app"],
    reply: "The link is not opening on my old phone. Can you send the full website address again?"
  },
  {
    keywords: ["otp", "code", "pin", "password"],
    reply: "Code? Which code ji, the one that comes on SMS? It has not come yet. Who should I tell it to, what is your number?"
  },
  {
    keywords: ["lottery", "prize", "you won", "winner", "reward"],
    reply: "Really, I won? Very wonderful! How much is the prize and how do I claim it?"
  },
  {
    keywords: ["kyc", "verify", "update", "blocked", "suspended"],
    reply: "Oh no, my pension comes in that account. Please guide me step by step, what should I do?"
  }
];

const GENERIC_TACTICAL = "Ji, I am interested. Please tell me more details, what should I do next?";
const NEUTRAL_REPLY = "Namaste ji, who is speaking? How can I help you?";

function deterministicPick(pool: string[], seed: string): number {
  let hash = 0;
  for (let i = 0; i < seed.length; i += 1) {
    hash = (hash * 31 + seed.charCodeAt(i)) % 100000;
  }
  return hash % pool.length;
}

export function stallingReply(seed: string, lastReplies: string[]): string {
  const start = deterministicPick(STALLING_REPLIES, seed);
  const last = lastReplies[lastReplies.length - 1];
  for (let offset = 0; offset < STALLING_REPLIES.length; offset += 1) {
    const candidate = STALLING_REPLIES[(start + offset) % STALLING_REPLIES.length];
    if (candidate !== last) return candidate;
  }
  return STALLING_REPLIES[start];
}

export function tacticalReply(scammerText: string, scamDetected: boolean, lastReplies: string[]): string {
  if (!scamDetected) return NEUTRAL_REPLY;
  const lower = scammerText.toLowerCase();
  const recent = new Set(lastReplies.slice(-3));
  for (const rule of TACTICAL_RULES) {
    if (!rule.keywords.some((k) => lower.includes(k))) continue;
    if (recent.has(rule.reply)) continue;
    return rule.reply;
  }
  return GENERIC_TACTICAL;
}

/**
 * Drives the persona. Termination is decided before any model call so an
 * exhausted conversation never spends one.
 */
export class PersonaEngine {
  constructor(
    private readonly model: ModelClient,
    private readonly persona: PersonaProfile,
    private readonly options: PersonaEngineOptions
  ) {}

  buildRequest(input: ReplyInput): CompletionRequest {
    return {
      system: buildPersonaPrompt(this.persona, input.intelligence, input.scamDetected),
      messages: input.history.slice(-this.options.historyWindow).map((m): ChatTurn => ({
        role: m.sender === "scammer" ? "user" : "assistant",
        content: m.text
      })),
      maxOutputTokens: 150,
      temperature: 0.7
    };
  }

  async nextReply(input: ReplyInput): Promise<AgentTurn> {
    const reason = checkTermination(input.counters, this.options.policy);
    if (reason) {
      return { kind: "end", text: this.persona.closingLines[reason], reason };
    }

    const lastReplies = input.history.filter((m) => m.sender === "agent").map((m) => m.text);
    const scammerMessages = input.history.filter((m) => m.sender === "scammer");
    const latest = scammerMessages.length > 0 ? scammerMessages[scammerMessages.length - 1].text : "";

    let raw: string;
    try {
      raw = await completeWithTimeout(this.model, this.buildRequest(input), this.options.timeoutMs);
    } catch (err) {
      if (err instanceof ModelNotConfiguredError) {
        return { kind: "reply", text: tacticalReply(latest, input.scamDetected, lastReplies), source: "tactical" };
      }
      safeWarn(`[AGENT] ${input.conversationId} model degraded: ${describeError(err)}`);
      const seed = `${input.conversationId}:${input.counters.turnCount}`;
      return { kind: "reply", text: stallingReply(seed, lastReplies), source: "stall" };
    }

    const candidate = cleanModelReply(raw);
    const check = validateReply(candidate, lastReplies);
    if (check.ok) return { kind: "reply", text: candidate, source: "model" };

    safeLog(`[AGENT] ${input.conversationId} model reply rejected: ${check.reason}`);
    return { kind: "reply", text: tacticalReply(latest, input.scamDetected, lastReplies), source: "tactical" };
  }
}
