import lexicon from "./data/scamLexicon.json";
import { UpstreamTimeoutError } from "./errors";
import { normalizeText } from "./extractor";
import { CompletionRequest, ModelClient, completeWithTimeout, extractJson } from "./providers/modelClient";
import { isRecord } from "../utils/guards";
import { describeError, safeWarn } from "../utils/logging";
import { clamp01, round2 } from "../utils/numbers";
import type { ExtractedIntelligence, Message, ScamVerdict } from "../utils/types";

export type HeuristicResult = {
  score: number;
  signals: string[];
};

export type ModelJudgment = {
  isScam: boolean;
  confidence: number;
  reason: string;
};

export type ScorerOptions = {
  threshold: number;
  timeoutMs: number;
  historyWindow: number;
};

const MODEL_WEIGHT = 0.7;

function escapeRegex(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const keywordCategories = lexicon.categories.map((category) => ({
  name: category.name,
  weight: category.weight,
  terms: category.terms.map((term) => ({ term, regex: new RegExp(`\\b${escapeRegex(term)}\\b`) }))
}));

const patternSignals = lexicon.patterns.map((pattern) => ({
  name: pattern.name,
  weight: pattern.weight,
  regex: new RegExp(pattern.regex, "i")
}));

/**
 * Lexicon score for a single message. Each category counts once no matter
 * how many of its terms appear.
 */
export function heuristicScore(message: string, delta: ExtractedIntelligence): HeuristicResult {
  const normalized = normalizeText(message);
  const signals: string[] = [];
  let score = 0;

  for (const category of keywordCategories) {
    const hits = category.terms.filter((t) => t.regex.test(normalized)).map((t) => t.term);
    if (hits.length === 0) continue;
    score += category.weight;
    signals.push(`keyword:${category.name}(${hits.slice(0, 3).join(", ")})`);
  }

  for (const pattern of patternSignals) {
    if (!pattern.regex.test(message)) continue;
    score += pattern.weight;
    signals.push(`pattern:${pattern.name}`);
  }

  const identifiers = delta.bankAccounts.length + delta.upiIds.length + delta.phishingUrls.length + delta.ifscCodes.length;
  if (identifiers > 0) {
    score += lexicon.identifierWeight;
    signals.push(`intel:${identifiers} identifier(s)`);
  }

  return { score: round2(clamp01(score)), signals };
}

export function parseModelJudgment(text: string): ModelJudgment | null {
  const parsed = extractJson(text);
  if (!isRecord(parsed)) return null;
  const raw = parsed.confidence;
  if (typeof raw !== "number" || !Number.isFinite(raw)) return null;
  const confidence = clamp01(raw);
  return {
    isScam: typeof parsed.is_scam === "boolean" ? parsed.is_scam : confidence > 0.5,
    confidence,
    reason: typeof parsed.reason === "string" ? parsed.reason.trim() : ""
  };
}

export function fuseScores(heuristic: number, model: number | null): number {
  if (model === null) return clamp01(heuristic);
  return round2(clamp01(MODEL_WEIGHT * model + (1 - MODEL_WEIGHT) * heuristic));
}

function transcript(history: readonly Message[]): string {
  if (history.length === 0) return "(no earlier messages)";
  return history.map((m) => `${m.sender === "scammer" ? "Sender" : "Recipient"}: ${m.text}`).join("\n");
}

export function buildClassificationRequest(message: string, history: readonly Message[]): CompletionRequest {
  const system = [
    "You classify messages received by an Indian mobile user.",
    "Decide whether the latest message is part of a scam attempt.",
    "Common scam types: lottery/prize, KYC update, OTP theft, fake job, loan, investment, bank or government impersonation.",
    "Respond with ONLY a JSON object, no markdown:",
    "{\"is_scam\": true, \"confidence\": 0.85, \"reason\": \"brief explanation\"}",
    "confidence is the probability (0 to 1) that the message is a scam."
  ].join(" ");
  return {
    system,
    messages: [
      {
        role: "user",
        content: [`Conversation so far:\n${transcript(history)}`, `Latest message: "${message}"`].join("\n\n")
      }
    ],
    maxOutputTokens: 120,
    temperature: 0.1
  };
}

export class ScamScorer {
  constructor(
    private readonly model: ModelClient,
    private readonly options: ScorerOptions
  ) {}

  get threshold(): number {
    return this.options.threshold;
  }

  async score(message: string, history: readonly Message[], delta: ExtractedIntelligence): Promise<ScamVerdict> {
    const heuristic = heuristicScore(message, delta);
    const signals = [...heuristic.signals];
    let judgment: ModelJudgment | null = null;

    try {
      const request = buildClassificationRequest(message, history.slice(-this.options.historyWindow));
      const text = await completeWithTimeout(this.model, request, this.options.timeoutMs);
      judgment = parseModelJudgment(text);
      if (judgment) {
        signals.push(`model:${judgment.confidence.toFixed(2)}${judgment.reason ? ` ${judgment.reason}` : ""}`);
      } else {
        signals.push("model:degraded(unparsable)");
      }
    } catch (err) {
      signals.push(`model:degraded(${err instanceof UpstreamTimeoutError ? "timeout" : "unavailable"})`);
      safeWarn(`[SCORER] model call degraded: ${describeError(err)}`);
    }

    const confidence = fuseScores(heuristic.score, judgment ? judgment.confidence : null);
    return {
      isScam: confidence > this.options.threshold,
      confidence,
      signals,
      degraded: judgment === null
    };
  }
}
