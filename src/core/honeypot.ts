import { PersonaEngine } from "./agent";
import { FinalReportPayload, FinalReporter } from "./callback";
import { ScamScorer } from "./scoring";
import { ConversationSession, TurnOutcome } from "./session";
import { SessionStore } from "./sessionStore";
import { describeError, maskDigits, safeError, safeLog, safeStringify } from "../utils/logging";
import { round2 } from "../utils/numbers";
import {
  ConversationView,
  HoneypotResponse,
  toWireIntelligence,
  toWireMetrics
} from "../utils/schema";

export type HoneypotRequest = {
  conversationId: string;
  message: string;
};

export type HoneypotServiceDeps = {
  store: SessionStore;
  scorer: ScamScorer;
  engine: PersonaEngine;
  reporter: FinalReporter;
  now?: () => Date;
};

type CycleResult = {
  outcome: TurnOutcome;
  response: HoneypotResponse;
  report: FinalReportPayload | null;
};

function composeResponse(session: ConversationSession, reply: string): HoneypotResponse {
  return {
    conversation_id: session.id,
    response_message: reply,
    scam_detected: session.scamDetected,
    confidence_score: round2(session.peakConfidence),
    extracted_intelligence: toWireIntelligence(session.intelligenceSnapshot()),
    engagement_metrics: toWireMetrics(session.metrics()),
    agent_active: session.active,
    status: "success"
  };
}

function finalReport(session: ConversationSession): FinalReportPayload | null {
  const reason = session.endReason;
  if (!reason || !session.scamDetected) return null;
  return {
    conversation_id: session.id,
    scam_detected: true,
    confidence_score: round2(session.peakConfidence),
    total_messages_exchanged: session.metrics().messagesExchanged,
    extracted_intelligence: toWireIntelligence(session.intelligenceSnapshot()),
    end_reason: reason
  };
}

/**
 * One request cycle per call, serialized per conversation by the store.
 */
export class HoneypotService {
  private readonly now: () => Date;

  constructor(private readonly deps: HoneypotServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  get activeConversations(): number {
    return this.deps.store.size;
  }

  async handleMessage(request: HoneypotRequest): Promise<HoneypotResponse> {
    const result = await this.deps.store.runExclusive(
      request.conversationId,
      async (session): Promise<CycleResult> => {
        const outcome = await session.processTurn(request.message, {
          scorer: this.deps.scorer,
          engine: this.deps.engine,
          now: this.now
        });
        return {
          outcome,
          response: composeResponse(session, outcome.reply),
          report: outcome.endedThisTurn ? finalReport(session) : null
        };
      }
    );

    const { outcome, response } = result;
    safeLog(`[HONEYPOT] ${maskDigits(outcome.reply)}`);
    safeLog(
      `[TURN] ${safeStringify(
        {
          conversationId: response.conversation_id,
          turn: response.engagement_metrics.turn_count,
          isScam: outcome.verdict?.isScam ?? null,
          confidence: outcome.verdict?.confidence ?? null,
          degraded: outcome.verdict?.degraded ?? null,
          signals: outcome.verdict?.signals ?? [],
          newIntel: outcome.newIntel,
          agentActive: response.agent_active,
          ended: outcome.endedThisTurn
        },
        2000
      )}`
    );

    if (result.report) this.dispatchReport(result.report);
    return response;
  }

  getConversation(conversationId: string): ConversationView {
    const session = this.deps.store.get(conversationId);
    return {
      status: "success",
      conversation_id: session.id,
      messages: [...session.history()],
      scam_detected: session.scamDetected,
      confidence_score: round2(session.peakConfidence),
      agent_active: session.active,
      end_reason: session.endReason,
      extracted_intelligence: toWireIntelligence(session.intelligenceSnapshot()),
      engagement_metrics: toWireMetrics(session.metrics())
    };
  }

  deleteConversation(conversationId: string): void {
    this.deps.store.delete(conversationId);
    safeLog(`[STORE] deleted ${conversationId}`);
  }

  private dispatchReport(payload: FinalReportPayload): void {
    this.deps.reporter
      .report(payload)
      .then((result) => {
        if (!result.ok && result.attempts > 0) {
          safeLog(`[CALLBACK] ${payload.conversation_id} not delivered`);
        }
      })
      .catch((err: unknown) => {
        safeError(`[CALLBACK] ${payload.conversation_id} reporter threw: ${describeError(err)}`);
      });
  }
}
