import { CLOSED_SESSION_REPLY, PersonaEngine } from "./agent";
import { InternalInvariantViolationError } from "./errors";
import { extractIntelligence, mergeIntelligence, snapshotIntelligence } from "./extractor";
import { ScamScorer } from "./scoring";
import { EngagementCounters, nextCounters } from "./termination";
import { describeError, safeError } from "../utils/logging";
import {
  EngagementMetrics,
  ExtractedIntelligence,
  IntelligenceSets,
  Message,
  ScamVerdict,
  Sender,
  SessionStatus,
  TerminationReason,
  emptyIntelligence,
  emptyIntelligenceSets
} from "../utils/types";

export type TurnContext = {
  scorer: ScamScorer;
  engine: PersonaEngine;
  now: () => Date;
};

export type RecordResult = {
  message: Message;
  delta: ExtractedIntelligence;
  added: number;
};

export type TurnOutcome = {
  reply: string;
  verdict: ScamVerdict | null;
  agentActive: boolean;
  endedThisTurn: TerminationReason | null;
  newIntel: number;
};

function failedVerdict(): ScamVerdict {
  return { isScam: false, confidence: 0, signals: ["scoring:failed"], degraded: true };
}

export class ConversationSession {
  readonly id: string;
  readonly startedAt: Date;
  private readonly messages: Message[] = [];
  private readonly intelligence: IntelligenceSets = emptyIntelligenceSets();
  private counters: EngagementCounters = { turnCount: 0, staleTurns: 0, lowConfidenceTurns: 0 };
  private state: SessionStatus = "NEW";
  private lastActivity: Date;
  private peak = 0;
  private flagged = false;
  private reason: TerminationReason | null = null;

  constructor(id: string, now: Date) {
    this.id = id;
    this.startedAt = now;
    this.lastActivity = now;
  }

  get status(): SessionStatus {
    return this.state;
  }

  get active(): boolean {
    return this.state !== "ENDED";
  }

  get scamDetected(): boolean {
    return this.flagged;
  }

  get peakConfidence(): number {
    return this.peak;
  }

  get endReason(): TerminationReason | null {
    return this.reason;
  }

  get lastActivityAt(): Date {
    return this.lastActivity;
  }

  get engagement(): Readonly<EngagementCounters> {
    return this.counters;
  }

  history(): readonly Message[] {
    return this.messages.slice();
  }

  intelligenceSnapshot(): ExtractedIntelligence {
    return snapshotIntelligence(this.intelligence);
  }

  metrics(): EngagementMetrics {
    const durationMs = Math.max(0, this.lastActivity.getTime() - this.startedAt.getTime());
    return {
      turnCount: this.counters.turnCount,
      engagementDurationSeconds: durationMs / 1000,
      messagesExchanged: this.messages.length
    };
  }

  /**
   * Appends a message. Only scammer-authored text is mined, so the persona's
   * own replies can never feed the intelligence sets.
   */
  record(sender: Sender, text: string, now: Date): RecordResult {
    const message: Message = Object.freeze({ sender, text, timestamp: now.toISOString() });
    this.messages.push(message);
    this.lastActivity = now;
    if (this.state === "NEW") this.state = "ACTIVE";
    if (sender !== "scammer") return { message, delta: emptyIntelligence(), added: 0 };

    let delta: ExtractedIntelligence;
    try {
      delta = extractIntelligence(text);
    } catch (err) {
      safeError(`[SESSION] ${this.id} extraction failed: ${describeError(err)}`);
      return { message, delta: emptyIntelligence(), added: 0 };
    }
    return { message, delta, added: mergeIntelligence(this.intelligence, delta) };
  }

  async processTurn(text: string, ctx: TurnContext): Promise<TurnOutcome> {
    const prior = this.messages.slice();
    const { delta, added } = this.record("scammer", text, ctx.now());

    if (this.state === "ENDED") {
      return { reply: CLOSED_SESSION_REPLY, verdict: null, agentActive: false, endedThisTurn: null, newIntel: added };
    }

    let verdict: ScamVerdict;
    try {
      verdict = await ctx.scorer.score(text, prior, delta);
    } catch (err) {
      safeError(`[SESSION] ${this.id} scoring failed: ${describeError(err)}`);
      verdict = failedVerdict();
    }

    this.counters = nextCounters(this.counters, {
      newIntel: added,
      isScam: verdict.isScam,
      flaggedBefore: this.flagged
    });
    this.flagged = this.flagged || verdict.isScam;
    this.peak = Math.max(this.peak, verdict.confidence);

    const turn = await ctx.engine.nextReply({
      conversationId: this.id,
      history: this.messages,
      intelligence: this.intelligenceSnapshot(),
      scamDetected: this.flagged,
      counters: this.counters
    });
    if (!turn.text.trim()) {
      throw new InternalInvariantViolationError(`persona produced an empty reply for ${this.id}`);
    }
    this.record("agent", turn.text, ctx.now());

    if (turn.kind === "end") {
      this.state = "ENDED";
      this.reason = turn.reason;
    }

    return {
      reply: turn.text,
      verdict,
      agentActive: this.active,
      endedThisTurn: turn.kind === "end" ? turn.reason : null,
      newIntel: added
    };
  }
}
