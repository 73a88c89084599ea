import Anthropic from "@anthropic-ai/sdk";
import { isRetryableStatus, ProviderError } from "../lib/errors";
import type { Completion, CompletionRequest, LlmClient } from "../services/provider";

/**
 * The slice of the SDK this client calls. The real `client.messages`
 * satisfies it; tests pass a stub.
 */
export type MessagesApi = {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<{
    content: Array<{ type: string; text?: string }>;
    usage: { input_tokens: number; output_tokens: number };
    model: string;
  }>;
};

function statusOf(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error) {
    if (typeof error.status === "number") return error.status;
  }
  return null;
}

export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) return error;
  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);
  if (status === null) {
    // No HTTP status: connection reset, DNS, timeout
    return new ProviderError(`Anthropic request failed: ${message}`, { retryable: true });
  }
  return new ProviderError(`Anthropic API ${status}: ${message}`, {
    retryable: isRetryableStatus(status),
    status,
  });
}

export class AnthropicLlmClient implements LlmClient {
  private readonly messages: MessagesApi;

  constructor(apiKey: string, messages?: MessagesApi) {
    // Retries are owned by withProviderRetry, not the SDK
    this.messages = messages ?? new Anthropic({ apiKey, maxRetries: 0 }).messages;
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    let response: Awaited<ReturnType<MessagesApi["create"]>>;
    try {
      response = await this.messages.create({
        model: request.model,
        max_tokens: request.maxTokens,
        messages: [{ role: "user", content: request.prompt }],
        ...(request.system ? { system: request.system } : {}),
      });
    } catch (error) {
      throw toProviderError(error);
    }

    const text = response.content
      .flatMap((block) => (block.type === "text" && typeof block.text === "string" ? [block.text] : []))
      .join("");

    return {
      text,
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      model: response.model,
    };
  }
}
