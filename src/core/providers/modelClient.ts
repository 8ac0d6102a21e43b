import { ModelNotConfiguredError, UpstreamError, UpstreamTimeoutError, UpstreamUnavailableError } from "../errors";

export type ChatTurn = {
  role: "user" | "assistant";
  content: string;
};

export type CompletionRequest = {
  system: string;
  messages: ChatTurn[];
  maxOutputTokens?: number;
  temperature?: number;
};

/**
 * The only external capability the core depends on. Implementations keep no
 * conversational state: the full context arrives with every request.
 */
export interface ModelClient {
  readonly provider: string;
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<string>;
}

export class UnconfiguredModelClient implements ModelClient {
  readonly provider = "none";

  async complete(): Promise<string> {
    throw new ModelNotConfiguredError();
  }
}

export async function completeWithTimeout(
  client: ModelClient,
  request: CompletionRequest,
  timeoutMs: number
): Promise<string> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // settle first so the race reports the timeout, not the abort it causes
      reject(new UpstreamTimeoutError(timeoutMs));
      controller.abort();
    }, timeoutMs);
  });
  try {
    return await Promise.race([client.complete(request, controller.signal), timeout]);
  } catch (err) {
    if (err instanceof UpstreamError) throw err;
    throw new UpstreamUnavailableError(`${client.provider} call failed`, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

export function extractJson(text: string): unknown {
  if (!text) return null;
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end === -1 || end <= start) return null;
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    return null;
  }
}
