import { GoogleGenerativeAI, type Content } from "@google/generative-ai";
import { UpstreamUnavailableError } from "../errors";
import type { ChatTurn, CompletionRequest, ModelClient } from "./modelClient";

export const DEFAULT_GEMINI_MODEL = "gemini-2.0-flash";

export type GeminiClientOptions = {
  apiKey: string;
  model?: string;
};

// Gemini rejects a conversation that opens with a model turn.
export function toGeminiContents(messages: ChatTurn[]): Content[] {
  const firstUser = messages.findIndex((m) => m.role === "user");
  if (firstUser === -1) return [];
  return messages.slice(firstUser).map((m) => ({
    role: m.role === "assistant" ? "model" : "user",
    parts: [{ text: m.content }]
  }));
}

export class GeminiModelClient implements ModelClient {
  readonly provider = "gemini";
  private readonly client: GoogleGenerativeAI;
  private readonly modelName: string;

  constructor(options: GeminiClientOptions) {
    this.client = new GoogleGenerativeAI(options.apiKey);
    this.modelName = options.model || DEFAULT_GEMINI_MODEL;
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    const contents = toGeminiContents(request.messages);
    if (contents.length === 0) {
      throw new UpstreamUnavailableError("gemini needs at least one user turn");
    }
    try {
      const model = this.client.getGenerativeModel({
        model: this.modelName,
        systemInstruction: request.system,
        generationConfig: {
          maxOutputTokens: request.maxOutputTokens ?? 160,
          temperature: request.temperature ?? 0.7
        }
      });
      const result = await model.generateContent({ contents }, { signal });
      return result.response.text().trim();
    } catch (err) {
      throw new UpstreamUnavailableError("gemini request failed", { cause: err });
    }
  }
}
