const FORBIDDEN_WORDS = [
  "honeypot",
  "ai",
  "bot",
  "chatbot",
  "language model",
  "automated",
  "scam",
  "scammer",
  "fraud",
  "police complaint"
];

const MAX_LENGTH = 280;

function normalize(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function linesCount(text: string): number {
  return text.split("\n").filter((line) => line.trim().length > 0).length;
}

function containsLongDigits(text: string): boolean {
  return /\d{4,}/.test(text);
}

function containsHandle(text: string): boolean {
  return /[\w.-]+@[\w.-]+/.test(text);
}

function containsForbidden(text: string): boolean {
  const norm = ` ${normalize(text)} `;
  return FORBIDDEN_WORDS.some((w) => norm.includes(` ${w} `));
}

function repeatsLast(text: string, lastReplies: string[]): boolean {
  const norm = normalize(text);
  return lastReplies.slice(-3).some((r) => normalize(r) === norm);
}

export type ValidationResult = { ok: true } | { ok: false; reason: string };

/**
 * Guards what the persona is allowed to say: nothing that looks like a real
 * identifier, nothing that breaks character.
 */
export function validateReply(reply: string, lastReplies: string[]): ValidationResult {
  if (!reply || reply.trim().length === 0) return { ok: false, reason: "empty" };
  if (reply.length > MAX_LENGTH) return { ok: false, reason: "too_long" };
  if (linesCount(reply) > 3) return { ok: false, reason: "too_many_lines" };
  if (containsLongDigits(reply)) return { ok: false, reason: "digits" };
  if (containsHandle(reply)) return { ok: false, reason: "handle" };
  if (containsForbidden(reply)) return { ok: false, reason: "forbidden" };
  if (repeatsLast(reply, lastReplies)) return { ok: false, reason: "repeat" };
  return { ok: true };
}

export function cleanModelReply(raw: string): string {
  return raw
    .trim()
    .replace(/^(?:me|reply|response|assistant)\s*:\s*/i, "")
    .replace(/^["'“]+|["'”]+$/g, "")
    .trim();
}
