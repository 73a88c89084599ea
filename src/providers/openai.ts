import { isRetryableStatus, ProviderError } from "../lib/errors";
import type { Completion, CompletionRequest, LlmClient } from "../services/provider";

type FetchLike = (
  input: string,
  init?: { method?: string; headers?: Record<string, string>; body?: string }
) => Promise<{
  ok: boolean;
  status: number;
  json: () => Promise<unknown>;
}>;

export type OpenAiClientOptions = {
  apiKey: string;
  baseUrl?: string | undefined;
  fetchFn?: FetchLike | undefined;
};

const OPENAI_BASE_URL = "https://api.openai.com/v1";

type ChatCompletionPayload = {
  model?: unknown;
  choices?: Array<{ message?: { content?: unknown } }>;
  usage?: { prompt_tokens?: unknown; completion_tokens?: unknown };
  error?: { message?: unknown };
};

function toCount(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

/**
 * Chat Completions over plain fetch. Also works against OpenAI-compatible
 * servers via `baseUrl`.
 */
export class OpenAiLlmClient implements LlmClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchFn: FetchLike;

  constructor(options: OpenAiClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? OPENAI_BASE_URL).replace(/\/+$/, "");
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    const messages = [
      ...(request.system ? [{ role: "system", content: request.system }] : []),
      { role: "user", content: request.prompt },
    ];

    let response: Awaited<ReturnType<FetchLike>>;
    try {
      response = await this.fetchFn(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: request.model,
          max_completion_tokens: request.maxTokens,
          messages,
        }),
      });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new ProviderError(`OpenAI network error: ${msg}`, { retryable: true });
    }

    let parsed: unknown = null;
    try {
      parsed = await response.json();
    } catch (err) {
      if (response.ok) {
        const msg = err instanceof Error ? err.message : String(err);
        throw new ProviderError(`OpenAI returned malformed JSON: ${msg}`, { retryable: true });
      }
    }
    const payload: ChatCompletionPayload =
      typeof parsed === "object" && parsed !== null ? (parsed as ChatCompletionPayload) : {};

    if (!response.ok) {
      const detail =
        typeof payload.error?.message === "string" ? `: ${payload.error.message}` : "";
      throw new ProviderError(`OpenAI API ${response.status}${detail}`, {
        retryable: isRetryableStatus(response.status),
        status: response.status,
      });
    }

    const content = payload.choices?.[0]?.message?.content;
    return {
      text: typeof content === "string" ? content : "",
      inputTokens: toCount(payload.usage?.prompt_tokens),
      outputTokens: toCount(payload.usage?.completion_tokens),
      model: typeof payload.model === "string" ? payload.model : request.model,
    };
  }
}
