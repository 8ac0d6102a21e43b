export type ModelProvider = "openai" | "gemini" | "none";

export type EngagementPolicy = {
  maxTurns: number;
  staleTurnLimit: number;
  lowConfidenceTurnLimit: number;
};

export type HoneypotConfig = {
  port: number;
  apiKey: string;
  provider: ModelProvider;
  openaiApiKey: string;
  openaiModel: string;
  geminiApiKey: string;
  geminiModel: string;
  modelTimeoutMs: number;
  scamThreshold: number;
  historyWindow: number;
  policy: EngagementPolicy;
  sessionIdleTimeoutMs: number;
  sessionSweepIntervalMs: number;
  callbackUrl: string;
  callbackTimeoutMs: number;
};

type Env = Record<string, string | undefined>;

function intFrom(value: string | undefined, fallback: number, min: number = 0): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min) return fallback;
  return Math.floor(parsed);
}

function ratioFrom(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) return fallback;
  return parsed;
}

function providerFrom(env: Env, openaiApiKey: string, geminiApiKey: string): ModelProvider {
  const raw = (env.LLM_PROVIDER || "").trim().toLowerCase();
  if (raw === "openai" || raw === "gemini" || raw === "none") return raw;
  if (raw) throw new Error(`Unknown LLM_PROVIDER "${raw}" (expected openai, gemini or none)`);
  if (openaiApiKey) return "openai";
  if (geminiApiKey) return "gemini";
  return "none";
}

export function loadConfig(env: Env = process.env): HoneypotConfig {
  const openaiApiKey = env.OPENAI_API_KEY || "";
  const geminiApiKey = env.GEMINI_API_KEY || env.GOOGLE_API_KEY || "";
  return {
    port: intFrom(env.PORT, 3000, 1),
    apiKey: env.HONEYPOT_API_KEY || "",
    provider: providerFrom(env, openaiApiKey, geminiApiKey),
    openaiApiKey,
    openaiModel: env.OPENAI_MODEL || "",
    geminiApiKey,
    geminiModel: env.GEMINI_MODEL || "",
    modelTimeoutMs: intFrom(env.MODEL_TIMEOUT_MS, 10000, 1),
    scamThreshold: ratioFrom(env.SCAM_THRESHOLD, 0.5),
    historyWindow: intFrom(env.HISTORY_WINDOW, 10, 1),
    policy: {
      maxTurns: intFrom(env.MAX_TURNS, 20, 1),
      staleTurnLimit: intFrom(env.STALE_TURN_LIMIT, 6, 1),
      lowConfidenceTurnLimit: intFrom(env.LOW_CONFIDENCE_TURN_LIMIT, 3, 1)
    },
    sessionIdleTimeoutMs: intFrom(env.SESSION_IDLE_TIMEOUT_MS, 30 * 60 * 1000),
    sessionSweepIntervalMs: intFrom(env.SESSION_SWEEP_INTERVAL_MS, 60 * 1000, 1),
    callbackUrl: env.CALLBACK_URL || "",
    callbackTimeoutMs: intFrom(env.CALLBACK_TIMEOUT_MS, 5000, 1)
  };
}
