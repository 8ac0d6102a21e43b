import { describe, expect, it } from "vitest";
import { cleanModelReply, validateReply } from "../core/validator";

describe("validateReply", () => {
  it("accepts a short in-character question", () => {
    expect(validateReply("Which branch is this, ji?", [])).toEqual({ ok: true });
  });

  it.each([
    ["   ", "empty"],
    ["a".repeat(281), "too_long"],
    ["one\ntwo\nthree\nfour", "too_many_lines"],
    ["My pin is 4321", "digits"],
    ["Pay me at abc@ybl", "handle"],
    ["Are you a scammer?", "forbidden"],
    ["Is this a bot?", "forbidden"]
  ])("rejects %j as %s", (reply, reason) => {
    expect(validateReply(reply, [])).toEqual({ ok: false, reason });
  });

  it("does not flag forbidden words inside other words", () => {
    expect(validateReply("I will wait for the train, ji", [])).toEqual({ ok: true });
  });

  it("rejects a repeat of one of the last three replies", () => {
    expect(validateReply("Hello ji!", ["hello ji", "ok", "fine"])).toEqual({ ok: false, reason: "repeat" });
    expect(validateReply("Hello ji!", ["hello ji", "a", "b", "c"])).toEqual({ ok: true });
  });
});

describe("cleanModelReply", () => {
  it("strips labels and wrapping quotes", () => {
    expect(cleanModelReply('  Me: "Okay ji, tell me."  ')).toBe("Okay ji, tell me.");
    expect(cleanModelReply("“Which bank?”")).toBe("Which bank?");
  });
});
