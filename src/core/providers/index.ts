import type { HoneypotConfig } from "../../utils/config";
import { GeminiModelClient } from "./geminiClient";
import { ModelClient, UnconfiguredModelClient } from "./modelClient";
import { OpenAIModelClient } from "./openaiClient";

export function createModelClient(config: HoneypotConfig): ModelClient {
  if (config.provider === "openai" && config.openaiApiKey) {
    return new OpenAIModelClient({
      apiKey: config.openaiApiKey,
      model: config.openaiModel,
      timeoutMs: config.modelTimeoutMs
    });
  }
  if (config.provider === "gemini" && config.geminiApiKey) {
    return new GeminiModelClient({ apiKey: config.geminiApiKey, model: config.geminiModel });
  }
  return new UnconfiguredModelClient();
}
