import type { AppConfig } from "../lib/config";
import { requireLlmCredentials } from "../lib/config";
import type { LlmClient } from "../services/provider";
import { AnthropicLlmClient } from "./anthropic";
import { OpenAiLlmClient } from "./openai";

export function createLlmClient(config: AppConfig): LlmClient {
  requireLlmCredentials(config);
  if (config.llm.provider === "openai") {
    return new OpenAiLlmClient({ apiKey: config.llm.api_key });
  }
  return new AnthropicLlmClient(config.llm.api_key);
}
