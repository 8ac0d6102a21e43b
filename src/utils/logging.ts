import type { IncomingHttpHeaders } from "http";

type Level = "info" | "warn" | "error";

const SECRET_HEADERS = new Set(["x-api-key", "authorization", "cookie"]);

// Long digit runs are account or phone numbers; only the tail stays readable.
export function maskDigits(input: string, keep: number = 2): string {
  return input.replace(/\d{3,}/g, (run) => "*".repeat(Math.max(0, run.length - keep)) + run.slice(-keep));
}

export function maskSecret(value?: string): string {
  if (!value) return "missing";
  if (value.length <= 4) return "*".repeat(value.length);
  return "*".repeat(value.length - 4) + value.slice(-4);
}

export function sanitizeHeaders(headers: IncomingHttpHeaders): Record<string, string> {
  const output: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    const name = key.toLowerCase();
    const joined = Array.isArray(value) ? value.join(",") : value;
    output[name] = SECRET_HEADERS.has(name) ? maskSecret(joined) : joined;
  }
  return output;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return `${err.name}: ${err.message}`;
  return String(err);
}

export function safeStringify(value: unknown, maxLen: number = 2000): string {
  let text: string;
  if (typeof value === "string") text = value;
  else if (value instanceof Error) text = describeError(value);
  else {
    try {
      text = JSON.stringify(value) ?? String(value);
    } catch {
      text = String(value);
    }
  }
  text = maskDigits(text);
  return text.length > maxLen ? `${text.slice(0, maxLen)}...(truncated)` : text;
}

function write(level: Level, message: string): void {
  try {
    console[level](message);
  } catch {
    // logging must never break a request
  }
}

export function safeLog(message: string): void {
  write("info", message);
}

export function safeWarn(message: string): void {
  write("warn", message);
}

export function safeError(message: string): void {
  write("error", message);
}
