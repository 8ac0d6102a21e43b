import OpenAI from "openai";
import { UpstreamUnavailableError } from "../errors";
import type { CompletionRequest, ModelClient } from "./modelClient";

export const DEFAULT_OPENAI_MODEL = "gpt-4o-mini";

export type OpenAIClientOptions = {
  apiKey: string;
  model?: string;
  timeoutMs: number;
};

export class OpenAIModelClient implements ModelClient {
  readonly provider = "openai";
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(options: OpenAIClientOptions) {
    this.model = options.model || DEFAULT_OPENAI_MODEL;
    // one attempt only; the caller degrades on failure
    this.client = new OpenAI({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<string> {
    try {
      const response = await this.client.responses.create(
        {
          model: this.model,
          input: [
            { role: "system", content: request.system },
            ...request.messages.map((m) => ({ role: m.role, content: m.content }))
          ],
          max_output_tokens: request.maxOutputTokens ?? 160,
          temperature: request.temperature ?? 0.7
        },
        { signal }
      );
      return response.output_text?.trim() || "";
    } catch (err) {
      throw new UpstreamUnavailableError("openai request failed", { cause: err });
    }
  }
}
