import { describe, expect, it } from "vitest";
import { PersonaEngine, ReplyInput, STALLING_REPLIES, stallingReply, tacticalReply } from "../core/agent";
import { DEFAULT_PERSONA, buildPersonaPrompt, missingAsks } from "../core/persona";
import { UnconfiguredModelClient } from "../core/providers/modelClient";
import { emptyIntelligence, Message } from "../utils/types";
import { ScriptedModelClient } from "./fakes";

const policy = { maxTurns: 20, staleTurnLimit: 6, lowConfidenceTurnLimit: 3 };
const options = { policy, timeoutMs: 1000, historyWindow: 10 };

function message(sender: Message["sender"], text: string): Message {
  return { sender, text, timestamp: "2024-01-01T00:00:00.000Z" };
}

function input(overrides: Partial<ReplyInput> = {}): ReplyInput {
  return {
    conversationId: "conv-1",
    history: [message("scammer", "Send the processing fee to my account")],
    intelligence: emptyIntelligence(),
    scamDetected: true,
    counters: { turnCount: 1, staleTurns: 1, lowConfidenceTurns: 0 },
    ...overrides
  };
}

const ACCOUNT_REPLY =
  "Ji, which account should I send it to? Please tell the account number and IFSC slowly, I will write it.";
const UPI_REPLY = "I have UPI on my phone, my son set it up. What is your UPI id, where should I send?";

describe("PersonaEngine", () => {
  it("ends with the closing line once the turn limit is reached, without calling the model", async () => {
    const model = new ScriptedModelClient(() => "Hello ji");
    const engine = new PersonaEngine(model, DEFAULT_PERSONA, options);
    const turn = await engine.nextReply(input({ counters: { turnCount: 20, staleTurns: 0, lowConfidenceTurns: 0 } }));
    expect(turn).toEqual({ kind: "end", text: DEFAULT_PERSONA.closingLines.max_turns, reason: "max_turns" });
    expect(model.requests).toHaveLength(0);
  });

  it("returns a cleaned model reply", async () => {
    const engine = new PersonaEngine(
      new ScriptedModelClient(() => 'Reply: "Which bank is this, beta?"'),
      DEFAULT_PERSONA,
      options
    );
    expect(await engine.nextReply(input())).toEqual({
      kind: "reply",
      text: "Which bank is this, beta?",
      source: "model"
    });
  });

  it("replaces a reply that leaks digits with a tactical question", async () => {
    const engine = new PersonaEngine(
      new ScriptedModelClient(() => "My account is 12345678, send there"),
      DEFAULT_PERSONA,
      options
    );
    expect(await engine.nextReply(input())).toEqual({ kind: "reply", text: ACCOUNT_REPLY, source: "tactical" });
  });

  it("replaces a reply that breaks character", async () => {
    const engine = new PersonaEngine(
      new ScriptedModelClient(() => "I am an AI assistant"),
      DEFAULT_PERSONA,
      options
    );
    const turn = await engine.nextReply(input());
    expect(turn.kind).toBe("reply");
    expect(turn.text).toBe(ACCOUNT_REPLY);
  });

  it("stalls when the model call fails", async () => {
    const failing = new ScriptedModelClient(() => {
      throw new Error("connection reset");
    });
    const engine = new PersonaEngine(failing, DEFAULT_PERSONA, options);
    const turn = await engine.nextReply(input());
    expect(turn).toEqual({ kind: "reply", text: stallingReply("conv-1:1", []), source: "stall" });
  });

  it("asks tactical questions when no model is configured", async () => {
    const engine = new PersonaEngine(new UnconfiguredModelClient(), DEFAULT_PERSONA, options);
    expect(await engine.nextReply(input())).toEqual({ kind: "reply", text: ACCOUNT_REPLY, source: "tactical" });
    expect(await engine.nextReply(input({ scamDetected: false }))).toEqual({
      kind: "reply",
      text: "Namaste ji, who is speaking? How can I help you?",
      source: "tactical"
    });
  });

  it("builds the request from the recent history window", () => {
    const engine = new PersonaEngine(new UnconfiguredModelClient(), DEFAULT_PERSONA, { ...options, historyWindow: 2 });
    const request = engine.buildRequest(
      input({
        history: [message("scammer", "one"), message("agent", "two"), message("scammer", "three")]
      })
    );
    expect(request.messages).toEqual([
      { role: "assistant", content: "two" },
      { role: "user", content: "three" }
    ]);
    expect(request.system.startsWith("You are Ramesh Kumar, a 58-year-old retired government clerk from Lucknow.")).toBe(
      true
    );
  });
});

describe("stallingReply", () => {
  it("is deterministic for a seed", () => {
    expect(stallingReply("conv-9:3", [])).toBe(stallingReply("conv-9:3", []));
    expect(STALLING_REPLIES).toContain(stallingReply("conv-9:3", []));
  });

  it("does not repeat the previous reply", () => {
    const first = stallingReply("conv-9:3", []);
    const second = stallingReply("conv-9:3", [first]);
    expect(second).not.toBe(first);
    expect(STALLING_REPLIES).toContain(second);
  });
});

describe("tacticalReply", () => {
  it("stays neutral before anything is flagged", () => {
    expect(tacticalReply("send money to my account", false, [])).toBe(
      "Namaste ji, who is speaking? How can I help you?"
    );
  });

  it("skips a question it asked recently", () => {
    expect(tacticalReply("send via upi to account", true, [ACCOUNT_REPLY])).toBe(UPI_REPLY);
  });

  it("does not read a refusal as a prize claim", () => {
    expect(tacticalReply("I won't do that", true, [])).toBe(
      "Ji, I am interested. Please tell me more details, what should I do next?"
    );
  });

  it("falls back to a generic prompt", () => {
    expect(tacticalReply("hello there", true, [])).toBe(
      "Ji, I am interested. Please tell me more details, what should I do next?"
    );
  });
});

describe("persona prompt", () => {
  it("asks for what is still missing", () => {
    const intel = { ...emptyIntelligence(), bankAccounts: ["1234567890123"] };
    expect(missingAsks(intel)[0]).toBe("the IFSC code or branch of that account");
    expect(buildPersonaPrompt(DEFAULT_PERSONA, intel, true)).toContain(
      "Try to find out: the IFSC code or branch of that account, and a UPI id to pay to."
    );
  });

  it("has no elicitation goals for an unflagged conversation", () => {
    expect(buildPersonaPrompt(DEFAULT_PERSONA, emptyIntelligence(), false)).toContain(
      "Reply naturally and politely, as this person would to a stranger."
    );
  });
});
