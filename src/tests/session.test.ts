import { describe, expect, it } from "vitest";
import { CLOSED_SESSION_REPLY, PersonaEngine } from "../core/agent";
import { DEFAULT_PERSONA } from "../core/persona";
import { ModelClient, UnconfiguredModelClient } from "../core/providers/modelClient";
import { InternalInvariantViolationError } from "../core/errors";
import { ScamScorer } from "../core/scoring";
import { ConversationSession, TurnContext } from "../core/session";
import type { EngagementPolicy } from "../utils/config";
import { ScriptedModelClient, WORKED_EXAMPLE, isClassification } from "./fakes";

const T0 = new Date("2024-05-01T10:00:00.000Z");

const ACCOUNT_REPLY =
  "Ji, which account should I send it to? Please tell the account number and IFSC slowly, I will write it.";

function context(model: ModelClient, policy: Partial<EngagementPolicy> = {}): TurnContext {
  let tick = 0;
  return {
    scorer: new ScamScorer(model, { threshold: 0.5, timeoutMs: 1000, historyWindow: 10 }),
    engine: new PersonaEngine(model, DEFAULT_PERSONA, {
      policy: { maxTurns: 20, staleTurnLimit: 6, lowConfidenceTurnLimit: 3, ...policy },
      timeoutMs: 1000,
      historyWindow: 10
    }),
    now: () => new Date(T0.getTime() + 1000 * tick++)
  };
}

// Judges by keyword and answers with a fresh question each turn.
function keywordModel(): ScriptedModelClient {
  let replies = 0;
  return new ScriptedModelClient((request) => {
    if (!isClassification(request)) {
      replies += 1;
      return `Okay ji, what next? (${"?".repeat(replies)})`;
    }
    const content = request.messages[0].content;
    const latest = content.slice(content.lastIndexOf("Latest message:"));
    return latest.includes("lottery")
      ? '{"is_scam": true, "confidence": 0.95, "reason": "prize bait"}'
      : '{"is_scam": false, "confidence": 0.05, "reason": "small talk"}';
  });
}

describe("ConversationSession", () => {
  it("starts empty and becomes active on the first message", () => {
    const session = new ConversationSession("c-1", T0);
    expect(session.status).toBe("NEW");
    session.record("scammer", "hello", T0);
    expect(session.status).toBe("ACTIVE");
  });

  it("never mines agent-authored messages", () => {
    const session = new ConversationSession("c-1", T0);
    const result = session.record("agent", "my account is 1234567890123", T0);
    expect(result.added).toBe(0);
    expect(session.intelligenceSnapshot().bankAccounts).toEqual([]);
  });

  it("handles the lottery example without a model", async () => {
    const session = new ConversationSession("c-1", T0);
    const outcome = await session.processTurn(WORKED_EXAMPLE, context(new UnconfiguredModelClient()));

    expect(outcome.verdict?.isScam).toBe(true);
    expect(outcome.verdict?.confidence).toBe(0.85);
    expect(outcome.agentActive).toBe(true);
    expect(outcome.newIntel).toBe(2);
    expect(outcome.reply).toBe(ACCOUNT_REPLY);

    expect(session.scamDetected).toBe(true);
    expect(session.intelligenceSnapshot().bankAccounts).toEqual(["1234567890123"]);
    expect(session.intelligenceSnapshot().upiIds).toEqual(["scammer@paytm"]);
    expect(session.history().map((m) => m.sender)).toEqual(["scammer", "agent"]);
    expect(session.metrics()).toEqual({ turnCount: 1, engagementDurationSeconds: 1, messagesExchanged: 2 });
  });

  it("keeps eliciting details across turns without a model", async () => {
    const session = new ConversationSession("c-1", T0);
    const ctx = context(new UnconfiguredModelClient(), { lowConfidenceTurnLimit: 10 });
    const replies: string[] = [];
    for (const text of [WORKED_EXAMPLE, "Pay via upi now, it is urgent", "Click the link to verify", "Share the OTP code now"]) {
      replies.push((await session.processTurn(text, ctx)).reply);
    }

    expect(replies).toEqual([
      ACCOUNT_REPLY,
      "I have UPI on my phone, my son set it up. What is your UPI id, where should I send?",
      "The link is not opening on my old phone. Can you send the full website address again?",
      "Code? Which code ji, the one that comes on SMS? It has not come yet. Who should I tell it to, what is your number?"
    ]);
    expect(session.status).toBe("ACTIVE");
  });

  it("scores against the history before the current message", async () => {
    const model = keywordModel();
    const session = new ConversationSession("c-1", T0);
    const ctx = context(model);
    await session.processTurn("hello", ctx);
    await session.processTurn("you won the lottery", ctx);

    const classifications = model.requests.filter(isClassification);
    expect(classifications).toHaveLength(2);
    expect(classifications[1].messages[0].content).toBe(
      'Conversation so far:\nSender: hello\nRecipient: Okay ji, what next? (?)\n\nLatest message: "you won the lottery"'
    );
  });

  it("ends at the turn limit and then answers with a stable closing reply", async () => {
    const session = new ConversationSession("c-1", T0);
    const ctx = context(new UnconfiguredModelClient(), { maxTurns: 2 });

    const first = await session.processTurn(WORKED_EXAMPLE, ctx);
    expect(first.agentActive).toBe(true);

    const second = await session.processTurn(WORKED_EXAMPLE, ctx);
    expect(second).toMatchObject({
      reply: DEFAULT_PERSONA.closingLines.max_turns,
      agentActive: false,
      endedThisTurn: "max_turns"
    });
    expect(session.status).toBe("ENDED");
    expect(session.endReason).toBe("max_turns");

    const third = await session.processTurn("hello? are you there", ctx);
    const fourth = await session.processTurn("send 9876543210 now", ctx);
    expect(third).toEqual({
      reply: CLOSED_SESSION_REPLY,
      verdict: null,
      agentActive: false,
      endedThisTurn: null,
      newIntel: 0
    });
    expect(fourth.reply).toBe(CLOSED_SESSION_REPLY);
    expect(fourth.newIntel).toBe(1);
    expect(session.engagement.turnCount).toBe(2);
    expect(session.history()).toHaveLength(6);
  });

  it("ends when the verdict keeps dropping after a flag, keeping the flag", async () => {
    const session = new ConversationSession("c-1", T0);
    const ctx = context(keywordModel(), { lowConfidenceTurnLimit: 2 });

    await session.processTurn("you won the lottery", ctx);
    expect(session.scamDetected).toBe(true);
    const peak = session.peakConfidence;
    expect(peak).toBeGreaterThan(0.5);

    const second = await session.processTurn("ok never mind", ctx);
    expect(second.agentActive).toBe(true);
    const third = await session.processTurn("good night", ctx);
    expect(third.endedThisTurn).toBe("confidence_dropped");
    expect(third.reply).toBe(DEFAULT_PERSONA.closingLines.confidence_dropped);
    expect(session.scamDetected).toBe(true);
    expect(session.peakConfidence).toBe(peak);
  });

  it("ends when no new intelligence arrives", async () => {
    const session = new ConversationSession("c-1", T0);
    const ctx = context(new UnconfiguredModelClient(), { staleTurnLimit: 2 });

    await session.processTurn("hello", ctx);
    const second = await session.processTurn("hello again", ctx);
    expect(second.endedThisTurn).toBe("stale_intelligence");
    expect(second.reply).toBe(DEFAULT_PERSONA.closingLines.stale_intelligence);
  });

  it("refuses to send an empty reply", async () => {
    const persona = { ...DEFAULT_PERSONA, closingLines: { ...DEFAULT_PERSONA.closingLines, max_turns: " " } };
    const model = new UnconfiguredModelClient();
    const session = new ConversationSession("c-1", T0);
    const ctx: TurnContext = {
      ...context(model),
      engine: new PersonaEngine(model, persona, {
        policy: { maxTurns: 1, staleTurnLimit: 6, lowConfidenceTurnLimit: 3 },
        timeoutMs: 1000,
        historyWindow: 10
      })
    };
    await expect(session.processTurn("hello", ctx)).rejects.toBeInstanceOf(InternalInvariantViolationError);
  });
});
